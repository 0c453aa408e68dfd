// src/sdk.ts

import type { CanonicalAdRecord } from './core/normalizer/types';
import type { Connector, CoreDeps, PageFetcher, ScrapeParams } from './connectors/types';
import type { HttpConfig } from './core/http/types';
import { HttpCore } from './core/http/HttpCore';
import { AdNormalizer } from './core/normalizer/Normalizer';
import { Logger } from './observability/Logger';
import type { LoggerConfig } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import type { MetricsConfig } from './observability/MetricsCollector';
import { generateCorrelationId, withScrapeSpan } from './observability/tracing';
import { AdLibraryConnector } from './connectors/adlibrary/AdLibraryConnector';
import { FetcherConnector } from './connectors/fetcher/FetcherConnector';
import { Exporter } from './exporters/Exporter';
import { validateConfig } from './config/ConfigValidator';

export interface InitConfig {
  baseUrl: string;
  http?: HttpConfig;
  pagination?: {
    requestIntervalMs?: number;
  };
  metrics?: MetricsConfig;
  logging?: LoggerConfig;
}

export class AdScraperSDK {
  private connector: Connector;
  private core: CoreDeps;
  private exporter: Exporter;
  private requestIntervalMs?: number;

  private constructor(config: InitConfig) {
    // Build ALL dependencies FIRST
    const logger = new Logger(config.logging);
    const metrics = new MetricsCollector(config.metrics);
    const normalizer = new AdNormalizer();
    const http = new HttpCore(config.http ?? {}, metrics, logger);

    this.core = { logger, metrics, normalizer, http };
    this.exporter = new Exporter(logger, metrics);
    this.requestIntervalMs = config.pagination?.requestIntervalMs;

    this.connector = new AdLibraryConnector(this.core, {
      baseUrl: config.baseUrl,
      requestIntervalMs: this.requestIntervalMs,
    });
  }

  /**
   * Initialize the scraper SDK
   *
   * @param config - Endpoint, HTTP, pagination, metrics and logging configuration
   * @returns Initialized SDK instance
   * @throws {ConfigError} If the configuration is invalid
   *
   * @example
   * ```typescript
   * const sdk = await AdScraperSDK.init({
   *   baseUrl: 'https://ads.example.com/api/v1/ad-library/search',
   *   http: { timeout: 10000 },
   *   pagination: { requestIntervalMs: 500 },
   *   logging: { level: 'info', format: 'pretty' }
   * });
   * ```
   */
  static async init(config: InitConfig): Promise<AdScraperSDK> {
    // Validate configuration (fail-fast with clear errors)
    const validatedConfig = validateConfig(config);

    const sdk = new AdScraperSDK(validatedConfig);

    sdk.core.logger.info('SDK initialized', { connector: sdk.connector.name });

    return sdk;
  }

  /**
   * Scrape and normalize ads page by page
   *
   * Stops at maxPages, on the first failed page fetch, or on the first page
   * with no ads; the records gathered so far are returned in every case.
   *
   * @param params - Search query, region code and page limit
   * @returns Canonical ad records in page order
   *
   * @example
   * ```typescript
   * const ads = await sdk.scrape({ query: 'running shoes', region: 'GB', maxPages: 3 });
   * ads.forEach(ad => console.log(ad.adId, ad.advertiserName, ad.adStartDate));
   * ```
   */
  async scrape(params: ScrapeParams): Promise<CanonicalAdRecord[]> {
    const runId = params.runId ?? generateCorrelationId();
    const startTime = Date.now();

    const ads = await withScrapeSpan(runId, params.query, params.region, () =>
      this.connector.scrape({ ...params, runId })
    );

    this.core.metrics.recordLatency('scrape_duration', Date.now() - startTime);
    return ads;
  }

  /**
   * Export records to a file
   *
   * @param records - Records returned by scrape()
   * @param format - 'json', 'csv' or 'xml' (case-insensitive)
   * @param destination - File path; parent directories are created
   * @throws {UnsupportedExportFormatError} Before any file I/O if the format is unknown
   * @throws {ExportError} If the file cannot be written
   *
   * @example
   * ```typescript
   * await sdk.export(ads, 'csv', 'data/ads.csv');
   * ```
   */
  async export(
    records: readonly CanonicalAdRecord[],
    format: string,
    destination: string
  ): Promise<void> {
    await this.exporter.export(records, format, destination);
  }

  /**
   * Replace the page source
   *
   * @param connector - Connector implementation (typically extending BaseConnector)
   */
  registerConnector(connector: Connector): void {
    this.connector = connector;
    this.core.logger.info('Connector registered', { connector: connector.name });
  }

  /**
   * Use a plain page fetch function as the page source
   *
   * The SDK's pagination settings, normalizer, logger and metrics still apply.
   */
  useFetcher(fetcher: PageFetcher): void {
    this.registerConnector(
      new FetcherConnector(this.core, fetcher, { requestIntervalMs: this.requestIntervalMs })
    );
  }

  /**
   * Prometheus text exposition of the collected metrics
   */
  async getMetrics(): Promise<string> {
    return this.core.metrics.getMetrics();
  }
}
