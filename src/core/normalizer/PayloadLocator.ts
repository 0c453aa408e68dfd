// src/core/normalizer/PayloadLocator.ts

import { isPlainObject } from '../../utils/coerce';

// Keys under which ad lists have been seen, in lookup order
export const AD_LIST_KEYS = ['ads', 'adList', 'items', 'records'] as const;

function findAdList(container: Record<string, unknown>): unknown[] | undefined {
  for (const key of AD_LIST_KEYS) {
    const value = container[key];
    if (Array.isArray(value)) return value;
  }
  return undefined;
}

/**
 * Extract the raw ad list from a page payload.
 *
 * Lists nested under `data` take priority over top-level lists with the same key;
 * a bare array payload is returned as-is. Anything else yields an empty list.
 */
export function locateAds(payload: unknown): unknown[] {
  if (isPlainObject(payload)) {
    if (isPlainObject(payload.data)) {
      const nested = findAdList(payload.data);
      if (nested) return nested;
    }
    return findAdList(payload) ?? [];
  }

  if (Array.isArray(payload)) return payload;

  return [];
}
