// src/exporters/serializers.ts

import { stringify } from 'csv-stringify/sync';
import { create } from 'xmlbuilder2';
import type { CanonicalAdRecord } from '../core/normalizer/types';

export const EXPORT_FORMATS = ['json', 'csv', 'xml'] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

/**
 * Text used for a single CSV cell or XML element.
 * Nested lists and objects are written as compact JSON in both formats.
 */
export function cellText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

export function serializeJson(records: readonly CanonicalAdRecord[]): string {
  return JSON.stringify(records, null, 2);
}

/**
 * CSV with a header made of the sorted union of record keys.
 * An empty record list produces an empty document.
 */
export function serializeCsv(records: readonly CanonicalAdRecord[]): string {
  if (records.length === 0) return '';

  const columns = new Set<string>();
  for (const record of records) {
    Object.keys(record).forEach((key) => columns.add(key));
  }
  const header = [...columns].sort();

  const rows = records.map((record) => {
    const entries: [string, unknown][] = Object.entries(record);
    const values = new Map(entries);
    return header.map((column) => cellText(values.get(column)));
  });

  return stringify([header, ...rows], {
    record_delimiter: 'windows',
  });
}

export function serializeXml(records: readonly CanonicalAdRecord[]): string {
  const root = create({ version: '1.0', encoding: 'UTF-8' }).ele('ads');

  for (const record of records) {
    const ad = root.ele('ad');
    for (const [key, value] of Object.entries(record)) {
      const field = ad.ele(key);
      const text = cellText(value);
      if (text) field.txt(text);
    }
  }

  return root.end({ prettyPrint: true });
}

export const SERIALIZERS: Readonly<
  Record<ExportFormat, (records: readonly CanonicalAdRecord[]) => string>
> = {
  json: serializeJson,
  csv: serializeCsv,
  xml: serializeXml,
};
