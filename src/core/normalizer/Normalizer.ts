// src/core/normalizer/Normalizer.ts

import { z } from 'zod';
import type { CanonicalAdRecord, RawAdRecord } from './types';
import { pickAlias } from './FieldAliases';
import type { StringField } from './FieldAliases';
import { normalizeTargeting } from './TargetingNormalizer';
import { ensureInteger, ensureString, isPlainObject } from '../../utils/coerce';
import { parseTimestamp } from '../../utils/timestamp';
import { NormalizationError } from '../../utils/errors';

const epochMs = z.number().int().nullable();

// Validation schema (exported for JSON Schema generation)
export const CanonicalAdRecordSchema = z.object({
  adId: z.string(),
  adTitle: z.string(),
  adType: z.string(),
  adVideoUrl: z.string(),
  adVideoCover: z.string(),
  adStartDate: epochMs,
  adEndDate: epochMs,
  advertiserId: z.string(),
  advertiserName: z.string(),
  adImpressions: z.string(),
  advertiserPaidForBy: z.string(),
  adTotalRegions: z.number().int(),
  adEstimatedAudience: z.string(),
  targetingByLocation: z.array(
    z.object({
      region: z.string(),
      impressions: z.string(),
    })
  ),
  targetingByAge: z.array(
    z.object({
      region: z.string(),
      '13-17': z.boolean(),
      '18-24': z.boolean(),
      '25-34': z.boolean(),
      '35-44': z.boolean(),
      '45-54': z.boolean(),
      '55+': z.boolean(),
    })
  ),
  targetingByGender: z.array(
    z.object({
      region: z.string(),
      female: z.boolean(),
      male: z.boolean(),
      unknown: z.boolean(),
    })
  ),
});

export class AdNormalizer {
  /**
   * Map one raw ad onto the canonical schema.
   * Unexpected shapes degrade to defaults; this never throws for JSON input.
   */
  normalize(raw: RawAdRecord): CanonicalAdRecord {
    // Already-canonical records carry the normalized lists instead of a targeting object
    const rawTargeting = isPlainObject(raw.targeting)
      ? raw.targeting
      : { locations: raw.targetingByLocation, age: raw.targetingByAge, gender: raw.targetingByGender };
    const targeting = normalizeTargeting(rawTargeting);
    const text = (field: StringField): string => ensureString(pickAlias(raw, field) ?? '');
    const totalRegions = pickAlias(raw, 'adTotalRegions');

    return {
      adId: text('adId'),
      adTitle: text('adTitle'),
      adType: text('adType'),
      adVideoUrl: text('adVideoUrl'),
      adVideoCover: text('adVideoCover'),
      adStartDate: parseTimestamp(pickAlias(raw, 'adStartDate')),
      adEndDate: parseTimestamp(pickAlias(raw, 'adEndDate')),
      advertiserId: text('advertiserId'),
      advertiserName: text('advertiserName'),
      adImpressions: text('adImpressions'),
      advertiserPaidForBy: text('advertiserPaidForBy'),
      adTotalRegions:
        totalRegions === undefined
          ? targeting.targetingByLocation.length
          : ensureInteger(totalRegions),
      adEstimatedAudience: text('adEstimatedAudience'),
      ...targeting,
    };
  }

  /**
   * Normalize and validate against CanonicalAdRecordSchema.
   * Throws NormalizationError when the result does not satisfy the schema.
   */
  normalizeStrict(raw: RawAdRecord): CanonicalAdRecord {
    const normalized = this.normalize(raw);
    const result = CanonicalAdRecordSchema.safeParse(normalized);
    if (!result.success) {
      throw new NormalizationError('Schema validation failed for ad record', {
        adId: normalized.adId,
        issues: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
      });
    }
    return normalized;
  }
}
