import type { Timestamp } from './shared/types.js';

/**
 * ISO-8601 extended form: date, optional time (`T` or space separated) with
 * optional seconds, fraction and UTC offset.
 */
const ISO_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2})(?::(\d{2})(?::(\d{2})(?:[.,](\d{1,6}))?)?)?(?:([+-])(\d{2}):?(\d{2}))?)?$/;

const MICROS_PER_MILLI = 1_000n;
const MICROS_PER_SECOND = 1_000_000n;
const MICROS_PER_MINUTE = 60n * MICROS_PER_SECOND;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

const isLeapYear = (year: number): boolean =>
  (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;

const daysInMonth = (year: number, month: number): number =>
  month === 2 && isLeapYear(year) ? 29 : DAYS_IN_MONTH[month - 1];

const toInt = (digits: string | undefined): number => (digits === undefined ? 0 : Number(digits));

/**
 * Parses an ISO-8601 timestamp into epoch microseconds
 *
 * A trailing `Z` is read as `+00:00`; a time without an offset is read as UTC.
 * Returns null for non-string input and for anything that is not a real
 * calendar instant. Never throws.
 */
export function parseTimestamp(value: unknown): Timestamp | null {
  if (typeof value !== 'string') {
    return null;
  }

  const normalized = value.endsWith('Z') ? `${value.slice(0, -1)}+00:00` : value;
  const match = ISO_TIMESTAMP.exec(normalized);
  if (!match) {
    return null;
  }

  const [, y, mo, d, h, mi, s, fraction, sign, offH, offM] = match;
  const year = toInt(y);
  const month = toInt(mo);
  const day = toInt(d);
  const hour = toInt(h);
  const minute = toInt(mi);
  const second = toInt(s);

  if (year < 1 || month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return null;
  }
  if (hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  const offsetHours = toInt(offH);
  const offsetMinutes = toInt(offM);
  if (offsetHours > 23 || offsetMinutes > 59) {
    return null;
  }

  // Date.UTC maps years 0-99 onto 1900-1999, so set the year explicitly
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, 0);

  const micros = fraction === undefined ? 0n : BigInt(fraction.padEnd(6, '0'));
  const offset = BigInt(offsetHours * 60 + offsetMinutes) * MICROS_PER_MINUTE;

  const local = BigInt(date.getTime()) * MICROS_PER_MILLI + micros;
  return sign === '-' ? local + offset : local - offset;
}

/**
 * Renders epoch microseconds as UTC ISO-8601 with a `Z` suffix
 *
 * The fraction is written with six digits, and only when non-zero:
 * `2025-08-04T10:04:00Z`, `2025-08-04T10:04:00.250000Z`.
 */
export function formatTimestamp(ts: Timestamp): string {
  let seconds = ts / MICROS_PER_SECOND;
  if (ts % MICROS_PER_SECOND < 0n) {
    seconds -= 1n;
  }
  const micros = ts - seconds * MICROS_PER_SECOND;

  const date = new Date(Number(seconds) * 1000);
  const pad = (n: number, width = 2): string => String(n).padStart(width, '0');

  const base =
    `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}` +
    `T${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;

  return micros === 0n ? `${base}Z` : `${base}.${micros.toString().padStart(6, '0')}Z`;
}

/**
 * Converts a whole number of seconds into a microsecond duration
 */
export function secondsToMicros(seconds: number): bigint {
  return BigInt(seconds) * MICROS_PER_SECOND;
}
