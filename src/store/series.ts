import path from "node:path";
import { logger } from "../utils/logger.js";
import { MINUTE_MS, WallClockMs, parseWallClock } from "../utils/time.js";
import { CsvRecord, ParsedLog, listLogs, readLog } from "./csvLog.js";

const log = logger.child({ component: "store" });

/** Uniform series: ascending timestamps, one entry per 1-minute bucket. */
export interface Series {
  timestamps: WallClockMs[];
  values: number[];
}

export interface RawPoint {
  timestamp: WallClockMs;
  value: number;
}

/**
 * `ffill` carries the last bucket's median across empty minutes (sparse
 * environment logs); `none` keeps populated buckets only (power logs).
 */
export type FillMode = "none" | "ffill";

export function emptySeries(): Series {
  return { timestamps: [], values: [] };
}

export function isEmpty(series: Series): boolean {
  return series.timestamps.length === 0;
}

export function coerceNumber(raw: string | undefined): number | null {
  const text = raw?.trim() ?? "";
  if (text === "") return null;
  const n = Number(text);
  return Number.isFinite(n) ? n : null;
}

export function median(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

export function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((acc, v) => acc + v, 0) / values.length;
}

/** Sorts by timestamp (stable) and keeps the last point written for each timestamp. */
export function sortAndDedupe(points: RawPoint[]): RawPoint[] {
  const sorted = points.map((p, idx) => ({ p, idx })).sort((a, b) => a.p.timestamp - b.p.timestamp || a.idx - b.idx);
  const out: RawPoint[] = [];
  for (const { p } of sorted) {
    const last = out[out.length - 1];
    if (last && last.timestamp === p.timestamp) out[out.length - 1] = p;
    else out.push(p);
  }
  return out;
}

export function resampleToMinutes(points: RawPoint[], fill: FillMode): Series {
  const clean = sortAndDedupe(points);
  if (clean.length === 0) return emptySeries();

  const buckets = new Map<number, number[]>();
  for (const p of clean) {
    const bucket = Math.floor(p.timestamp / MINUTE_MS) * MINUTE_MS;
    const list = buckets.get(bucket);
    if (list) list.push(p.value);
    else buckets.set(bucket, [p.value]);
  }

  const out = emptySeries();
  if (fill === "none") {
    for (const [bucket, values] of buckets) {
      out.timestamps.push(bucket);
      out.values.push(median(values));
    }
    return out;
  }

  const keys = [...buckets.keys()];
  const first = keys[0];
  const last = keys[keys.length - 1];
  let carried = 0;
  for (let t = first; t <= last; t += MINUTE_MS) {
    const values = buckets.get(t);
    if (values) carried = median(values);
    out.timestamps.push(t);
    out.values.push(carried);
  }
  return out;
}

export interface MatchQuery {
  dir: string;
  /** File-name glob inside `dir`; only `*` is special, e.g. `smartmeter_*.csv`. */
  pattern: string;
  predicate: (row: CsvRecord) => boolean;
  valueColumn: string;
  fill: FillMode;
  timestampColumn?: string;
}

function globToRegExp(pattern: string): RegExp {
  const body = pattern
    .split("*")
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
    .join(".*");
  return new RegExp(`^${body}$`);
}

async function matchingFiles(dir: string, pattern: string): Promise<string[]> {
  if (!pattern.includes("*")) return [path.join(dir, pattern)];
  const re = globToRegExp(pattern);
  const all = await listLogs(dir, "", "");
  return all.filter((p) => re.test(path.basename(p)));
}

/**
 * Scans every matching log, keeps rows accepted by the predicate and turns the
 * value column into a 1-minute series. Unreadable files and bad rows are
 * skipped; no match at all is an empty series.
 */
export async function loadMatching(query: MatchQuery): Promise<Series> {
  const tsColumn = query.timestampColumn ?? "timestamp_iso";
  const points: RawPoint[] = [];

  let files: string[];
  try {
    files = await matchingFiles(query.dir, query.pattern);
  } catch (err) {
    log.warn({ err, dir: query.dir }, "Unable to list log directory");
    return emptySeries();
  }

  for (const file of files) {
    let parsed: ParsedLog;
    try {
      parsed = await readLog(file);
    } catch (err) {
      log.warn({ err, path: file }, "Unable to read log file; skipping");
      continue;
    }

    let badTimestamps = 0;
    let blankValues = 0;
    for (const row of parsed.rows) {
      if (!query.predicate(row)) continue;
      const value = coerceNumber(row[query.valueColumn]);
      if (value === null) {
        blankValues++;
        continue;
      }
      const timestamp = parseWallClock(row[tsColumn] ?? "");
      if (timestamp === null) {
        badTimestamps++;
        continue;
      }
      points.push({ timestamp, value });
    }

    if (parsed.malformed > 0 || badTimestamps > 0) {
      log.warn({ path: file, malformed: parsed.malformed, badTimestamps }, "Skipped malformed log rows");
    }
    if (blankValues > 0) {
      log.debug({ path: file, column: query.valueColumn, blankValues }, "Skipped rows without a numeric value");
    }
  }

  return resampleToMinutes(points, query.fill);
}
