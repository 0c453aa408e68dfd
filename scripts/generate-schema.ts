#!/usr/bin/env tsx

/**
 * Generate JSON Schema from the Zod canonical ad record schema
 *
 * Converts the schema the normalizer validates against into a standard JSON
 * Schema document for consumers of the exported files.
 *
 * Usage:
 *   tsx scripts/generate-schema.ts
 *   npm run generate:schema
 */

import fs from 'fs';
import path from 'path';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { CanonicalAdRecordSchema } from '../src/core/normalizer/Normalizer';

const OUTPUT_PATH = path.join(__dirname, '../schema/canonical-ad-record.schema.json');

function generateSchema() {
  console.log('Generating JSON Schema from Zod...');

  const jsonSchema = zodToJsonSchema(CanonicalAdRecordSchema, {
    name: 'CanonicalAdRecord',
    $refStrategy: 'none',
    target: 'jsonSchema7',
    definitions: {},
    errorMessages: true,
  });

  const schemaWithMetadata = {
    $schema: 'http://json-schema.org/draft-07/schema#',
    title: 'CanonicalAdRecord',
    description: 'Normalized ad record written by the json, csv and xml exporters',
    version: '1.0.0',
    ...jsonSchema,
    examples: [
      {
        adId: '7301',
        adTitle: 'Spring collection',
        adType: 'video',
        adVideoUrl: 'https://cdn.example.com/v/7301.mp4',
        adVideoCover: 'https://cdn.example.com/c/7301.jpg',
        adStartDate: 1697373296000,
        adEndDate: null,
        advertiserId: 'adv-1',
        advertiserName: 'Example Outfitters',
        adImpressions: '10K-50K',
        advertiserPaidForBy: 'Example Outfitters Ltd',
        adTotalRegions: 1,
        adEstimatedAudience: '1M-5M',
        targetingByLocation: [{ region: 'GB', impressions: '10K-50K' }],
        targetingByAge: [],
        targetingByGender: [],
      },
    ],
  };

  fs.mkdirSync(path.dirname(OUTPUT_PATH), { recursive: true });
  fs.writeFileSync(OUTPUT_PATH, JSON.stringify(schemaWithMetadata, null, 2), 'utf-8');

  console.log(`JSON Schema generated: ${OUTPUT_PATH}`);
}

try {
  generateSchema();
  process.exit(0);
} catch (error: unknown) {
  console.error('Failed to generate JSON Schema:', error instanceof Error ? error.stack : error);
  process.exit(1);
}
