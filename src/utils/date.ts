import { InvalidDateFormatError } from '../errors.js';
import type { DateWindow } from '../types/capture.js';

const COMPACT_DATE = /^(\d{4})(\d{2})(\d{2})$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Midnight UTC of a `YYYYMMDD` date, or null if it is not a real calendar day. */
function toUtcMillis(compact: string): number | null {
  const match = COMPACT_DATE.exec(compact);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const millis = Date.UTC(year, month - 1, day);

  // Date.UTC rolls 20190231 over to March; reject instead.
  const check = new Date(millis);
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day
  ) {
    return null;
  }
  return millis;
}

function formatUtcMillis(millis: number): string {
  const date = new Date(millis);
  const year = String(date.getUTCFullYear()).padStart(4, '0');
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  return `${year}${month}${day}`;
}

/** Validates a `YYYYMMDD` target date and returns it unchanged. Surrounding whitespace is rejected. */
export function parseTargetDate(raw: string): string {
  if (toUtcMillis(raw) === null) {
    throw new InvalidDateFormatError(raw);
  }
  return raw;
}

/** Calendar arithmetic in UTC, so host timezone and DST never shift the result. */
export function shiftDate(compact: string, days: number): string {
  const millis = toUtcMillis(compact);
  if (millis === null) {
    throw new InvalidDateFormatError(compact);
  }
  return formatUtcMillis(millis + days * MS_PER_DAY);
}

export function computeWindow(compact: string, days = 90): DateWindow {
  return {
    from: shiftDate(compact, -days),
    to: shiftDate(compact, days),
  };
}

/** Expands a target date to the 14-digit capture timestamp at midnight. */
export function toTargetTimestamp(compact: string): string {
  return `${compact}000000`;
}

/** Current UTC time as ISO-8601 without milliseconds. */
export function nowIsoSeconds(): string {
  return new Date().toISOString().replace(/\.\d{3}Z$/, 'Z');
}
