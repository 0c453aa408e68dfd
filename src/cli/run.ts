// src/cli/run.ts

import * as path from 'path';
import { parseArgs } from 'util';
import dotenv from 'dotenv';
import { AdScraperSDK } from '../sdk';
import { Logger } from '../observability/Logger';
import type { LoggerConfig } from '../observability/Logger';
import { loadSettings, settingsToInitConfig } from '../config/SettingsLoader';
import { Exporter } from '../exporters/Exporter';
import { ScraperError } from '../utils/errors';

export const DEFAULT_SETTINGS_PATH = path.join(__dirname, '..', 'config', 'settings.example.json');

const USAGE = `Usage: ad-library-scraper [options]

Options:
  --settings <path>   Settings JSON file (default: bundled settings.example.json)
  --query <text>      Search query (advertiser name, domain, keyword)
  --region <code>     Region / country code, e.g. GB or US
  --pages <n>         Number of pages to scrape
  --format <fmt>      Output format: json, csv or xml
  --output <path>     Output file (default: <output_dir>/ads_<timestamp>.<format>)
  -v, --verbose       Increase logging verbosity (-vv for debug)
  -h, --help          Show this help`;

export interface CliOptions {
  /** Clock used for generated output names, in milliseconds. */
  now?: () => number;
  /** Where usage text goes. */
  print?: (text: string) => void;
}

export function levelForVerbosity(verbosity: number): NonNullable<LoggerConfig['level']> {
  if (verbosity >= 2) return 'debug';
  if (verbosity === 1) return 'info';
  return 'warn';
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: false,
    options: {
      settings: { type: 'string' },
      query: { type: 'string' },
      region: { type: 'string' },
      pages: { type: 'string' },
      format: { type: 'string' },
      output: { type: 'string' },
      verbose: { type: 'boolean', short: 'v', multiple: true },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

function parsePages(value: string | undefined, fallback: number): number | null {
  if (value === undefined) return fallback;
  const pages = Number(value);
  return Number.isInteger(pages) && pages >= 1 ? pages : null;
}

/**
 * Run the scraper from command-line arguments.
 *
 * @returns Process exit code (0 on success, 1 on bad arguments or settings)
 */
export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const now = options.now ?? Date.now;
  const print = options.print ?? ((text: string) => console.log(text));

  dotenv.config();

  let args: ReturnType<typeof parseCliArgs>['values'];
  try {
    args = parseCliArgs(argv).values;
  } catch (error: unknown) {
    print(`${error instanceof Error ? error.message : String(error)}\n\n${USAGE}`);
    return 1;
  }

  if (args.help) {
    print(USAGE);
    return 0;
  }

  const logging: LoggerConfig = {
    level: levelForVerbosity(args.verbose?.length ?? 0),
    format: process.env.LOG_FORMAT === 'json' ? 'json' : 'pretty',
  };
  const logger = new Logger(logging);

  const settingsPath = path.resolve(args.settings ?? DEFAULT_SETTINGS_PATH);
  logger.info('Loading settings', { settingsPath });

  try {
    const settings = await loadSettings(settingsPath, logger);
    const baseUrl = process.env.AD_LIBRARY_BASE_URL || settings.base_url;
    if (!baseUrl) {
      logger.error("Missing 'base_url' in settings");
      return 1;
    }

    const query = args.query ?? settings.default_query;
    const region = args.region ?? settings.default_region;
    const pages = parsePages(args.pages, settings.default_pages);
    if (pages === null) {
      logger.error('--pages must be a positive integer', { pages: args.pages });
      return 1;
    }

    const format = Exporter.resolveFormat(args.format ?? settings.default_output_format);
    const outputPath = args.output
      ? path.resolve(args.output)
      : path.resolve(settings.output_dir, `ads_${Math.floor(now() / 1000)}.${format}`);

    logger.info('Starting ads scraping', { query, region, pages, format });

    const sdk = await AdScraperSDK.init({ ...settingsToInitConfig(settings, logging), baseUrl });
    const ads = await sdk.scrape({ query, region, maxPages: pages });

    if (ads.length === 0) {
      logger.warn('No ads were scraped. Nothing to export.');
    } else {
      logger.info('Exporting ads', { count: ads.length, outputPath });
      await sdk.export(ads, format, outputPath);
      logger.info('Export completed successfully', { outputPath });
    }

    logger.info('Done');
    return 0;
  } catch (error: unknown) {
    if (error instanceof ScraperError) {
      logger.error(error.message, { code: error.code, details: error.details });
      return 1;
    }
    throw error;
  }
}
