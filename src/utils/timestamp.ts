// src/utils/timestamp.ts

/** Values below this are epoch seconds, values at or above it are already milliseconds. */
export const SECONDS_THRESHOLD = 1e11;

const DIGITS = /^\d+$/;

// Tried in order; the first pattern that matches wins.
const DATE_TIME_WITH_OFFSET =
  /^(\d{4})-(\d{1,2})-(\d{1,2})T(\d{1,2}):(\d{1,2}):(\d{1,2})(Z|[+-]\d{2}:?\d{2})$/;
const DATE_TIME = /^(\d{4})-(\d{1,2})-(\d{1,2})T(\d{1,2}):(\d{1,2}):(\d{1,2})$/;
const DATE_ONLY = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;

function fromEpoch(value: number): number {
  const integer = Math.trunc(value);
  return integer < SECONDS_THRESHOLD ? integer * 1000 : integer;
}

function offsetMinutes(offset: string): number {
  if (offset === 'Z') return 0;
  const sign = offset.startsWith('-') ? -1 : 1;
  const digits = offset.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  if (hours > 23 || minutes > 59) return Number.NaN;
  return sign * (hours * 60 + minutes);
}

/**
 * Build a UTC epoch from calendar fields, rejecting values that would roll over
 * (month 13, February 30, hour 24 and so on). Years below 100 are taken literally.
 */
function utcFromFields(fields: string[]): number | null {
  const [year, month, day, hour = 0, minute = 0, second = 0] = fields.map(Number);
  const check = new Date(0);
  check.setUTCFullYear(year, month - 1, day);
  check.setUTCHours(hour, minute, second, 0);
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day ||
    check.getUTCHours() !== hour ||
    check.getUTCMinutes() !== minute ||
    check.getUTCSeconds() !== second
  ) {
    return null;
  }
  return check.getTime();
}

function parseDateString(text: string): number | null {
  const withOffset = DATE_TIME_WITH_OFFSET.exec(text);
  if (withOffset) {
    const utc = utcFromFields(withOffset.slice(1, 7));
    const offset = offsetMinutes(withOffset[7]);
    if (utc !== null && !Number.isNaN(offset)) {
      return utc - offset * 60_000;
    }
  }

  const local = DATE_TIME.exec(text) ?? DATE_ONLY.exec(text);
  if (local) {
    return utcFromFields(local.slice(1));
  }

  return null;
}

/**
 * Parse a timestamp of unknown unit or format into epoch milliseconds.
 *
 * Accepts epoch seconds, epoch milliseconds (numbers or digit strings) and
 * ISO-8601 strings (`2023-10-15T12:34:56+0200`, `2023-10-15T12:34:56`,
 * `2023-10-15`). Strings without a zone are read as UTC.
 * Returns null for anything it cannot read; never throws.
 */
export function parseTimestamp(value: unknown): number | null {
  if (value === null || value === undefined) return null;

  if (typeof value === 'number') {
    return Number.isFinite(value) ? fromEpoch(value) : null;
  }

  if (typeof value !== 'string') return null;

  const stripped = value.trim();
  if (!stripped) return null;

  if (DIGITS.test(stripped)) {
    const parsed = Number(stripped);
    return Number.isFinite(parsed) ? fromEpoch(parsed) : null;
  }

  return parseDateString(stripped);
}
