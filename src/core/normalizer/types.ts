// src/core/normalizer/types.ts

/** Un-normalized ad object as received from the source API. */
export type RawAdRecord = Record<string, unknown>;

export const AGE_BANDS = ['13-17', '18-24', '25-34', '35-44', '45-54', '55+'] as const;

export type AgeBand = (typeof AGE_BANDS)[number];

export interface LocationTargeting {
  region: string;
  impressions: string;
}

export type AgeTargeting = { region: string } & Record<AgeBand, boolean>;

export interface GenderTargeting {
  region: string;
  female: boolean;
  male: boolean;
  unknown: boolean;
}

export interface NormalizedTargeting {
  targetingByLocation: LocationTargeting[];
  targetingByAge: AgeTargeting[];
  targetingByGender: GenderTargeting[];
}

export interface CanonicalAdRecord extends NormalizedTargeting {
  adId: string;
  adTitle: string;
  adType: string;
  adVideoUrl: string;
  adVideoCover: string;
  adStartDate: number | null; // epoch milliseconds
  adEndDate: number | null; // epoch milliseconds
  advertiserId: string;
  advertiserName: string;
  adImpressions: string;
  advertiserPaidForBy: string;
  adTotalRegions: number;
  adEstimatedAudience: string;
}
