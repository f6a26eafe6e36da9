import type { DeviceProfile } from "./registry.js";

/** Index of the greatest key <= x, or -1 when x precedes every key. */
export function floorIndex(keys: readonly number[], x: number): number {
  let lo = 0;
  let hi = keys.length - 1;
  let found = -1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    if (keys[mid] <= x) {
      found = mid;
      lo = mid + 1;
    } else {
      hi = mid - 1;
    }
  }
  return found;
}

/**
 * Piecewise-linear lookup over ascending `keys`. Clamps to the first/last value
 * outside the domain and returns `fallback` for an empty curve.
 */
export function interpolateCurve(keys: readonly number[], values: readonly number[], x: number, fallback: number): number {
  if (keys.length === 0) return fallback;
  if (x <= keys[0]) return values[0];
  const last = keys.length - 1;
  if (x >= keys[last]) return values[last];

  const i = floorIndex(keys, x);
  if (keys[i] === x) return values[i];
  const x0 = keys[i];
  const x1 = keys[i + 1];
  if (x1 === x0) return values[i];
  return values[i] + ((values[i + 1] - values[i]) * (x - x0)) / (x1 - x0);
}

/** Minute offset inside the profile, wrapped for repeating profiles. */
export function profileOffset(profile: DeviceProfile, elapsedMinutes: number): number {
  const duration = profile.keys.length > 0 ? profile.keys[profile.keys.length - 1] : 0;
  if (profile.repeat && duration > 0) {
    const t = elapsedMinutes % duration;
    return t < 0 ? t + duration : t;
  }
  return elapsedMinutes;
}

/** Right-continuous step lookup: the draw set by the last key reached. */
export function stepConsumption(profile: DeviceProfile, elapsedMinutes: number): number {
  if (profile.keys.length === 0) return profile.standbyW;
  const i = floorIndex(profile.keys, profileOffset(profile, elapsedMinutes));
  return profile.values[i < 0 ? 0 : i];
}

export function interpolatedConsumption(profile: DeviceProfile, elapsedMinutes: number): number {
  return interpolateCurve(profile.keys, profile.values, profileOffset(profile, elapsedMinutes), profile.standbyW);
}

/** True once a non-repeating profile has run past its last key. */
export function isCycleFinished(profile: DeviceProfile, elapsedMinutes: number): boolean {
  if (profile.repeat || profile.keys.length === 0) return false;
  return elapsedMinutes > profile.keys[profile.keys.length - 1];
}
