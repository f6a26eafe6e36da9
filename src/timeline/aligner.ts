import { Series, emptySeries } from "../store/series.js";
import { DAY_MS, dayIndex, msOfDay, parseDay } from "../utils/time.js";

/** Day used when there is no simulated run to anchor the overlay on. */
export const FALLBACK_REFERENCE_DAY = parseDay("1900-01-01") ?? 0;

function copySeries(s: Series): Series {
  return { timestamps: [...s.timestamps], values: [...s.values] };
}

/**
 * Moves every sample onto `referenceDay`, keeping its time of day. A time of
 * day earlier than the previous sample's is a midnight rollover and moves the
 * rest of the series one day further.
 */
export function rebaseToDay(series: Series, referenceDay: number): Series {
  if (series.timestamps.length === 0) return emptySeries();

  const out = emptySeries();
  let day = referenceDay;
  let prev = msOfDay(series.timestamps[0]);
  series.timestamps.forEach((ts, i) => {
    const tod = msOfDay(ts);
    if (tod < prev) day += 1;
    prev = tod;
    out.timestamps.push(day * DAY_MS + tod);
    out.values.push(series.values[i]);
  });
  return out;
}

/** Shifts the simulated series so that it starts where the real one does. */
export function alignStart(simulated: Series, real: Series): Series {
  if (simulated.timestamps.length === 0 || real.timestamps.length === 0) return copySeries(simulated);
  const shift = real.timestamps[0] - simulated.timestamps[0];
  return {
    timestamps: simulated.timestamps.map((t) => t + shift),
    values: [...simulated.values]
  };
}

export interface Overlay {
  simulated: Series;
  real: Series;
}

/** Real history rebased onto the simulated run's first day, simulated start aligned to it. */
export function buildOverlay(simulated: Series, real: Series): Overlay {
  const referenceDay = simulated.timestamps.length > 0 ? dayIndex(simulated.timestamps[0]) : FALLBACK_REFERENCE_DAY;
  const rebased = rebaseToDay(real, referenceDay);
  return { simulated: alignStart(simulated, rebased), real: rebased };
}
