// src/core/normalizer/FieldAliases.ts

import { isTruthy } from '../../utils/coerce';
import type { CanonicalAdRecord, RawAdRecord } from './types';

export type StringField = {
  [K in keyof CanonicalAdRecord]: CanonicalAdRecord[K] extends string ? K : never;
}[keyof CanonicalAdRecord];

type DateField = 'adStartDate' | 'adEndDate';

type IntegerField = 'adTotalRegions';

export type AliasedField = StringField | DateField | IntegerField;

/**
 * Raw keys accepted for each canonical field, in priority order.
 * The canonical name always comes first so canonical input maps onto itself.
 */
export const FIELD_ALIASES: Readonly<Record<AliasedField, readonly string[]>> = {
  adId: ['adId', 'ad_id', 'id'],
  adTitle: ['adTitle', 'title', 'ad_title'],
  adType: ['adType', 'type', 'ad_type'],
  adVideoUrl: ['adVideoUrl', 'video_url', 'creative_url'],
  adVideoCover: ['adVideoCover', 'thumbnail_url', 'cover_url'],
  adStartDate: ['adStartDate', 'start_time', 'startDate'],
  adEndDate: ['adEndDate', 'end_time', 'endDate'],
  advertiserId: ['advertiserId', 'advertiser_id', 'account_id'],
  advertiserName: ['advertiserName', 'advertiser_name', 'account_name'],
  adImpressions: ['adImpressions', 'impressions', 'impression_range'],
  advertiserPaidForBy: ['advertiserPaidForBy', 'paid_for_by'],
  adTotalRegions: ['adTotalRegions', 'total_regions'],
  adEstimatedAudience: ['adEstimatedAudience', 'estimated_audience'],
};

/**
 * Return the first truthy value found under any of the keys, or undefined.
 */
export function firstTruthy(raw: RawAdRecord, keys: readonly string[]): unknown {
  for (const key of keys) {
    const value = raw[key];
    if (isTruthy(value)) return value;
  }
  return undefined;
}

export function pickAlias(raw: RawAdRecord, field: AliasedField): unknown {
  return firstTruthy(raw, FIELD_ALIASES[field]);
}
