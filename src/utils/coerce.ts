// src/utils/coerce.ts

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Truthiness used for alias fallback and targeting flags.
 * Empty strings, zero, empty arrays and empty objects count as absent.
 */
export function isTruthy(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  if (typeof value === 'string') return value.length > 0;
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
  if (typeof value === 'boolean') return value;
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === 'object') return Object.keys(value).length > 0;
  return true;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert any value to a string; null/undefined become ''.
 * Objects and arrays are written as JSON text.
 */
export function ensureString(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value);
    } catch {
      return String(value);
    }
  }
  return String(value);
}

/**
 * Convert a value to an integer, falling back on defaultValue when it cannot be read as one.
 */
export function ensureInteger(value: unknown, defaultValue: number = 0): number {
  if (value === null || value === undefined) return defaultValue;
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : defaultValue;
  }
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!INTEGER_PATTERN.test(trimmed)) return defaultValue;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : defaultValue;
  }
  return defaultValue;
}
