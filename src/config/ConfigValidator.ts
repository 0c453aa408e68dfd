// src/config/ConfigValidator.ts

import { z } from 'zod';
import { ConfigError } from '../utils/errors';
import { EXPORT_FORMATS } from '../exporters/serializers';

// HTTP Configuration Schema
const HttpConfigSchema = z
  .object({
    timeout: z.number().positive().optional(),
    keepAlive: z.boolean().optional(),
    userAgent: z.string().min(1).optional(),
    headers: z.record(z.string()).optional(),
  })
  .optional();

// Pagination Configuration Schema
const PaginationConfigSchema = z
  .object({
    requestIntervalMs: z.number().min(0, 'requestIntervalMs must not be negative').optional(),
  })
  .optional();

// Logger Configuration Schema
const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['json', 'pretty']).optional(),
  })
  .optional();

// Metrics Configuration Schema
const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
  })
  .optional();

// Complete Init Configuration Schema
export const InitConfigSchema = z.object({
  baseUrl: z.string().url('baseUrl must be a valid URL'),
  http: HttpConfigSchema,
  pagination: PaginationConfigSchema,
  metrics: MetricsConfigSchema,
  logging: LoggerConfigSchema,
});

export type ValidatedInitConfig = z.infer<typeof InitConfigSchema>;

/**
 * Settings file schema. Keys follow the settings file layout; every value has a default.
 */
export const SettingsSchema = z.object({
  base_url: z.string().default(''),
  default_query: z.string().default(''),
  default_region: z.string().default('GB'),
  default_pages: z.coerce.number().int().min(1, 'default_pages must be at least 1').default(1),
  default_output_format: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(EXPORT_FORMATS))
    .default('json'),
  output_dir: z.string().min(1).default('data'),
  sleep_between_requests: z.coerce.number().min(0).default(0.5), // seconds
  timeout: z.coerce.number().positive().default(10), // seconds
});

export type Settings = z.infer<typeof SettingsSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
}

/**
 * Validate SDK initialization configuration
 *
 * @param config - Configuration object to validate
 * @returns Validated configuration
 * @throws {ConfigError} If configuration is invalid, with one entry per issue in details.issues
 */
export function validateConfig(config: unknown): ValidatedInitConfig {
  const result = InitConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}

/**
 * Validate configuration and return user-friendly errors
 *
 * @param config - Configuration object to validate
 * @returns Object with { success: boolean, data?: Config, errors?: string[] }
 */
export function validateConfigSafe(
  config: unknown
): { success: true; data: ValidatedInitConfig } | { success: false; errors: string[] } {
  const result = InitConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: formatIssues(result.error),
  };
}

/**
 * Validate a parsed settings document, filling in defaults
 *
 * @throws {ConfigError} If a setting has the wrong type or value
 */
export function validateSettings(settings: unknown): Settings {
  const result = SettingsSchema.safeParse(settings);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(`Invalid settings: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}
