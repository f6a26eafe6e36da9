import { interpolateCurve } from "../profiles/curve.js";
import { Series } from "../store/series.js";
import { MINUTES_PER_DAY, MINUTE_MS, WallClockMs, dayIndex, minuteOfDay } from "../utils/time.js";

export type ReplayKind = "temperature" | "power";

export interface SafetyRange {
  min: number;
  max: number;
}

export const SAFETY_RANGES: Record<ReplayKind, SafetyRange> = {
  temperature: { min: 15, max: 40 },
  power: { min: 0, max: 5000 }
};

export const INTRADAY_WINDOW_MINUTES = 30;
export const INTRADAY_MAX_DAYS = 7;
export const DAMPING_PER_MINUTE = 0.95;

/** Recorded history of one sensor, with times in minutes since its first sample. */
export interface ReplayHistory {
  timestamps: WallClockMs[];
  times: number[];
  values: number[];
}

export function toReplayHistory(series: Series): ReplayHistory | null {
  if (series.timestamps.length === 0) return null;
  const t0 = series.timestamps[0];
  return {
    timestamps: [...series.timestamps],
    times: series.timestamps.map((t) => (t - t0) / MINUTE_MS),
    values: [...series.values]
  };
}

export function clamp(value: number, range: SafetyRange): number {
  return Math.min(range.max, Math.max(range.min, value));
}

/** Slope of the last two samples, per minute; 0 with fewer than two. */
export function lastTwoSlope(h: ReplayHistory): number {
  const n = h.times.length;
  if (n < 2) return 0;
  const dt = h.times[n - 1] - h.times[n - 2];
  if (dt <= 0) return 0;
  return (h.values[n - 1] - h.values[n - 2]) / dt;
}

function circularDistance(a: number, b: number): number {
  const d = Math.abs(a - b) % MINUTES_PER_DAY;
  return Math.min(d, MINUTES_PER_DAY - d);
}

/**
 * Same time of day on earlier days: each day's samples within the window are
 * averaged, then the most recent days are blended with halving weights.
 */
export function intradayEstimate(h: ReplayHistory, m: number): number | null {
  if (h.timestamps.length === 0) return null;
  const target = h.timestamps[0] + m * MINUTE_MS;
  const targetDay = dayIndex(target);
  const targetMinute = minuteOfDay(target);

  const perDay = new Map<number, { sum: number; count: number }>();
  for (let i = 0; i < h.timestamps.length; i++) {
    const ts = h.timestamps[i];
    const day = dayIndex(ts);
    if (day >= targetDay) continue;
    if (circularDistance(minuteOfDay(ts), targetMinute) > INTRADAY_WINDOW_MINUTES) continue;
    const acc = perDay.get(day);
    if (acc) {
      acc.sum += h.values[i];
      acc.count += 1;
    } else {
      perDay.set(day, { sum: h.values[i], count: 1 });
    }
  }
  if (perDay.size === 0) return null;

  const recent = [...perDay.entries()].sort((a, b) => b[0] - a[0]).slice(0, INTRADAY_MAX_DAYS);
  let weighted = 0;
  let totalWeight = 0;
  recent.forEach(([, acc], rank) => {
    const w = 0.5 ** rank;
    weighted += (acc.sum / acc.count) * w;
    totalWeight += w;
  });
  return weighted / totalWeight;
}

export function dampedExtrapolation(h: ReplayHistory, m: number, range: SafetyRange): number {
  const n = h.values.length;
  const last = h.values[n - 1];
  const beyond = m - h.times[n - 1];
  return clamp(last + lastTwoSlope(h) * DAMPING_PER_MINUTE ** beyond, range);
}

/**
 * Value at `m` minutes after the first sample: first value before the
 * history, linear interpolation inside it, intraday pattern or damped trend
 * past its end.
 */
export function predictValue(h: ReplayHistory | null, m: number, kind: ReplayKind): number | null {
  if (!h || h.times.length === 0 || !Number.isFinite(m)) return null;
  const lastTime = h.times[h.times.length - 1];
  if (m <= lastTime) return interpolateCurve(h.times, h.values, m, h.values[0]);
  return intradayEstimate(h, m) ?? dampedExtrapolation(h, m, SAFETY_RANGES[kind]);
}

export interface FallbackParams {
  min: number;
  max: number;
  step: number;
}

/**
 * Temperature drift for a sensor with no recorded history: warms by
 * `step × heatingFactor` per minute while heating, otherwise cools by `step`
 * per minute; clamped and snapped to half degrees.
 */
export function temperatureFallbackStep(
  state: number,
  params: FallbackParams,
  deltaMinutes: number,
  heatingFactor: number
): number {
  const next = heatingFactor > 0 ? state + params.step * deltaMinutes * heatingFactor : state - params.step * deltaMinutes;
  return Math.round(clamp(next, params) * 2) / 2;
}
