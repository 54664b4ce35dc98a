// Timestamps are wall-clock values: the UTC fields of a Date carry the local
// time of day, matching `timestamp without time zone` in the store.

/** Calendar date formatted as YYYY-MM-DD */
export type IsoDate = string;

const MS_PER_MINUTE = 60_000;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;
const MS_PER_DAY = 24 * MS_PER_HOUR;

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const WALL_CLOCK_RE = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2}))?$/;

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

export function isIsoDate(value: string): boolean {
  const m = ISO_DATE_RE.exec(value);
  if (!m) return false;
  const [, y, mo, d] = m.map(Number);
  if (y === undefined || mo === undefined || d === undefined) return false;
  const utc = new Date(Date.UTC(y, mo - 1, d));
  return utc.getUTCFullYear() === y && utc.getUTCMonth() === mo - 1 && utc.getUTCDate() === d;
}

export function toIsoDate(ts: Date): IsoDate {
  return ts.toISOString().slice(0, 10);
}

/** Midnight of `date` plus the given wall-clock hour and minute. */
export function atWallClock(date: IsoDate, hour: number, minute = 0): Date {
  // Date.parse rolls 2024-02-30 over into March.
  if (!isIsoDate(date)) throw new RangeError(`invalid calendar date: ${date}`);
  const start = Date.parse(`${date}T00:00:00Z`);
  return new Date(start + hour * MS_PER_HOUR + minute * MS_PER_MINUTE);
}

export function addDays(date: IsoDate, days: number): IsoDate {
  return toIsoDate(new Date(atWallClock(date, 0).getTime() + days * MS_PER_DAY));
}

/** Whole days from `from` to `to`; negative when `to` is earlier. */
export function daysBetween(from: IsoDate, to: IsoDate): number {
  return Math.round((atWallClock(to, 0).getTime() - atWallClock(from, 0).getTime()) / MS_PER_DAY);
}

export function addHours(ts: Date, hours: number): Date {
  return new Date(ts.getTime() + Math.round(hours * MS_PER_HOUR));
}

export function addMinutes(ts: Date, minutes: number): Date {
  return new Date(ts.getTime() + Math.round(minutes * MS_PER_MINUTE));
}

/**
 * Parse `YYYY-MM-DDTHH:mm[:ss]` (or with a space separator) as a wall-clock
 * timestamp. Returns null for anything else, including values with an offset.
 */
export function parseWallClock(text: string): Date | null {
  const m = WALL_CLOCK_RE.exec(text.trim());
  if (!m) return null;
  const date = `${m[1]}-${m[2]}-${m[3]}`;
  if (!isIsoDate(date)) return null;
  const hour = Number(m[4]);
  const minute = Number(m[5]);
  const second = Number(m[6] ?? '0');
  if (!(hour <= 23 && minute <= 59 && second <= 59)) return null;
  return new Date(atWallClock(date, hour, minute).getTime() + second * 1000);
}

/** `YYYY-MM-DD HH:mm:ss`, the literal form the store expects. */
export function formatWallClock(ts: Date): string {
  return (
    `${toIsoDate(ts)} ${pad(ts.getUTCHours())}:${pad(ts.getUTCMinutes())}:` +
    pad(ts.getUTCSeconds())
  );
}
