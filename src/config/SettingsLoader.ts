// src/config/SettingsLoader.ts

import { promises as fs } from 'fs';
import type { InitConfig } from '../sdk';
import type { Logger } from '../observability/Logger';
import type { LoggerConfig } from '../observability/Logger';
import { SettingsSchema, validateSettings } from './ConfigValidator';
import type { Settings } from './ConfigValidator';
import { ConfigError } from '../utils/errors';

export const DEFAULT_SETTINGS: Settings = SettingsSchema.parse({});

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Load the settings file.
 *
 * A missing file is not an error: built-in defaults are returned and a warning logged.
 *
 * @throws {ConfigError} If the file is unreadable or its contents are invalid
 */
export async function loadSettings(settingsPath: string, logger: Logger): Promise<Settings> {
  let text: string;
  try {
    text = await fs.readFile(settingsPath, 'utf-8');
  } catch (error: unknown) {
    if (isMissingFile(error)) {
      logger.warn('Settings file not found; using internal defaults', { settingsPath });
      return { ...DEFAULT_SETTINGS };
    }
    throw new ConfigError(`Failed to read settings file: ${settingsPath}`, {
      settingsPath,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error: unknown) {
    logger.error('Failed to parse settings file', { settingsPath });
    throw new ConfigError(`Settings file is not valid JSON: ${settingsPath}`, {
      settingsPath,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  return validateSettings(parsed);
}

/**
 * Map settings onto SDK configuration (seconds become milliseconds).
 */
export function settingsToInitConfig(settings: Settings, logging?: LoggerConfig): InitConfig {
  return {
    baseUrl: settings.base_url,
    http: {
      timeout: Math.round(settings.timeout * 1000),
    },
    pagination: {
      requestIntervalMs: Math.round(settings.sleep_between_requests * 1000),
    },
    logging,
  };
}
