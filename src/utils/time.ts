// src/utils/time.ts
import type { NaiveTimestamp } from "../types/trade";

const MS_PER_MINUTE = 60_000;
const MS_PER_DAY = 86_400_000;

// Excel serial 25569 == 1970-01-01
const EXCEL_EPOCH_OFFSET = 25569;
const EXCEL_MAX_SERIAL = 2958465; // 9999-12-31

// 2025.01.15 09:30:00 | 2025-01-15T09:30:00.000Z | 2025/01/15 09:30 | 2025-01-15
const YEAR_FIRST =
  /^(\d{4})[.\-/](\d{1,2})[.\-/](\d{1,2})(?:[ T]+(\d{1,2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?\s*(?:Z|[+-]\d{2}:?\d{2})?$/i;

const pad = (n: number, width = 2) => String(n).padStart(width, "0");

function formatUtcFields(d: Date): NaiveTimestamp {
  return (
    `${pad(d.getUTCFullYear(), 4)}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}` +
    `T${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`
  );
}

function fromParts(y: number, mo: number, d: number, h: number, mi: number, s: number): NaiveTimestamp | null {
  if (mo < 1 || mo > 12 || h > 23 || mi > 59 || s > 59) return null;
  const date = new Date(Date.UTC(y, mo - 1, d, h, mi, s));
  // rejects 2025-02-30 and friends
  if (date.getUTCDate() !== d || date.getUTCMonth() !== mo - 1) return null;
  return formatUtcFields(date);
}

/**
 * Parse a terminal timestamp into a wall-clock string.
 * The clock time is kept exactly as written: an explicit offset is ignored,
 * not applied.
 */
export function parseTimestamp(value: unknown): NaiveTimestamp | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : formatUtcFields(value);
  }

  if (typeof value === "number") {
    if (!Number.isFinite(value) || value <= 0 || value > EXCEL_MAX_SERIAL) return null;
    const seconds = Math.round((value - EXCEL_EPOCH_OFFSET) * 86400);
    return formatUtcFields(new Date(seconds * 1000));
  }

  if (typeof value !== "string") return null;
  const m = value.trim().match(YEAR_FIRST);
  if (!m) return null;

  const [, y, mo, d, h, mi, s] = m;
  return fromParts(Number(y), Number(mo), Number(d), Number(h ?? 0), Number(mi ?? 0), Number(s ?? 0));
}

export function toEpochMs(ts: NaiveTimestamp): number {
  const m = ts.match(/^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})$/);
  if (!m) return NaN;
  const [, y, mo, d, h, mi, s] = m.map(Number);
  return Date.UTC(y, mo - 1, d, h, mi, s);
}

/** Whole minutes from `open` to `close`, truncated toward zero; 0 if either is missing. */
export function minutesBetween(open: NaiveTimestamp | null, close: NaiveTimestamp | null): number {
  if (!open || !close) return 0;
  const diff = toEpochMs(close) - toEpochMs(open);
  if (!Number.isFinite(diff)) return 0;
  return Math.trunc(diff / MS_PER_MINUTE);
}

export function wholeDaysBetween(start: NaiveTimestamp, end: NaiveTimestamp): number {
  const diff = toEpochMs(end) - toEpochMs(start);
  return Number.isFinite(diff) ? Math.floor(diff / MS_PER_DAY) : 0;
}

export const dayOf = (ts: NaiveTimestamp) => ts.slice(0, 10);
export const monthOf = (ts: NaiveTimestamp) => ts.slice(0, 7);
export const hourOf = (ts: NaiveTimestamp) => Number(ts.slice(11, 13));

/** Monday (YYYY-MM-DD) of the week `ts` falls in. */
export function weekOf(ts: NaiveTimestamp): string {
  const ms = toEpochMs(`${dayOf(ts)}T00:00:00`);
  if (!Number.isFinite(ms)) return dayOf(ts);
  const date = new Date(ms);
  const sinceMonday = (date.getUTCDay() + 6) % 7;
  return formatUtcFields(new Date(ms - sinceMonday * MS_PER_DAY)).slice(0, 10);
}
