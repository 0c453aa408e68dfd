// src/core/normalizer/TargetingNormalizer.ts

import { ensureString, isPlainObject, isTruthy } from '../../utils/coerce';
import { AGE_BANDS } from './types';
import type {
  AgeTargeting,
  GenderTargeting,
  LocationTargeting,
  NormalizedTargeting,
} from './types';

function objectEntries(raw: Record<string, unknown>, key: string): Record<string, unknown>[] {
  const list = raw[key];
  if (!Array.isArray(list)) return [];
  return list.filter(isPlainObject);
}

function toLocation(entry: Record<string, unknown>): LocationTargeting {
  // A present "code" key wins even when its value is empty
  const region = 'code' in entry ? entry.code : entry.region;
  return {
    region: ensureString(region ?? ''),
    impressions: ensureString(entry.impressions ?? ''),
  };
}

function toAge(entry: Record<string, unknown>): AgeTargeting {
  const age: AgeTargeting = {
    region: ensureString(entry.region ?? ''),
    '13-17': false,
    '18-24': false,
    '25-34': false,
    '35-44': false,
    '45-54': false,
    '55+': false,
  };
  for (const band of AGE_BANDS) {
    age[band] = isTruthy(entry[band]);
  }
  return age;
}

function toGender(entry: Record<string, unknown>): GenderTargeting {
  return {
    region: ensureString(entry.region ?? ''),
    female: isTruthy(entry.female),
    male: isTruthy(entry.male),
    unknown: isTruthy(entry.unknown),
  };
}

/**
 * Normalize a raw targeting object into location, age and gender lists.
 * Missing or malformed lists yield empty arrays; input order is kept.
 */
export function normalizeTargeting(raw: unknown): NormalizedTargeting {
  const targeting = isPlainObject(raw) ? raw : {};

  return {
    targetingByLocation: objectEntries(targeting, 'locations').map(toLocation),
    targetingByAge: objectEntries(targeting, 'age').map(toAge),
    targetingByGender: objectEntries(targeting, 'gender').map(toGender),
  };
}
