export const MINUTE_MS = 60_000;
export const DAY_MS = 86_400_000;
export const MINUTES_PER_DAY = 1440;

/**
 * Wall-clock instants are the naive local date/time written in the log files,
 * stored as epoch milliseconds as if that local time were UTC. Day boundaries
 * and time-of-day then come straight from the number, whatever the host zone.
 */
export type WallClockMs = number;

export function defaultTimezone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

export function toWallClock(date: Date, timezone: string): WallClockMs {
  const parts = new Intl.DateTimeFormat("en-CA", {
    timeZone: timezone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23"
  }).formatToParts(date);

  const get = (type: string) => Number(parts.find((p) => p.type === type)?.value ?? "0");

  return Date.UTC(get("year"), get("month") - 1, get("day"), get("hour"), get("minute"), get("second"), date.getMilliseconds());
}

const pad = (n: number, width = 2) => String(n).padStart(width, "0");

export function formatWallClock(ms: WallClockMs, opts: { millis?: boolean } = {}): string {
  const d = new Date(ms);
  const base =
    `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())} ` +
    `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`;
  return opts.millis ? `${base}.${pad(d.getUTCMilliseconds(), 3)}` : base;
}

const WALL_CLOCK_RE = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?$/;

/** Parses `YYYY-MM-DD HH:MM[:SS[.fff]]`; anything else is null. */
export function parseWallClock(raw: string): WallClockMs | null {
  const m = WALL_CLOCK_RE.exec(raw.trim());
  if (!m) return null;

  const [year, month, day, hour, minute] = [m[1], m[2], m[3], m[4], m[5]].map(Number);
  const second = m[6] ? Number(m[6]) : 0;
  const millis = m[7] ? Math.floor(Number(`0.${m[7]}`) * 1000) : 0;

  const ms = Date.UTC(year, month - 1, day, hour, minute, second, millis);
  const check = new Date(ms);
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day ||
    hour > 23 ||
    minute > 59 ||
    second > 59
  ) {
    return null;
  }
  return ms;
}

export function dayIndex(ms: WallClockMs): number {
  return Math.floor(ms / DAY_MS);
}

export function msOfDay(ms: WallClockMs): number {
  return ms - dayIndex(ms) * DAY_MS;
}

export function minuteOfDay(ms: WallClockMs): number {
  return msOfDay(ms) / MINUTE_MS;
}

export function parseDay(raw: string): number | null {
  const ms = parseWallClock(`${raw.trim()} 00:00`);
  return ms === null ? null : dayIndex(ms);
}

export function formatDay(day: number): string {
  return formatWallClock(day * DAY_MS).slice(0, 10);
}

/** Source of "now" as a wall-clock instant; injected so tests control time. */
export type Clock = () => WallClockMs;

export function systemClock(timezone: string = defaultTimezone()): Clock {
  return () => toWallClock(new Date(), timezone);
}
