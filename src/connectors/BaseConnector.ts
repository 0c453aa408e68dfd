// src/connectors/BaseConnector.ts

import type {
  Connector,
  CoreDeps,
  PageFetchResult,
  PageQuery,
  PaginationOptions,
  ScrapeParams,
} from './types';
import type { CanonicalAdRecord } from '../core/normalizer/types';
import { locateAds } from '../core/normalizer/PayloadLocator';
import { isPlainObject } from '../utils/coerce';
import { addSpanEvent } from '../observability/tracing';

export const DEFAULT_REQUEST_INTERVAL_MS = 500;

export abstract class BaseConnector implements Connector {
  abstract readonly name: string;

  protected requestIntervalMs: number;

  constructor(
    protected deps: CoreDeps,
    options: PaginationOptions = {}
  ) {
    this.requestIntervalMs = options.requestIntervalMs ?? DEFAULT_REQUEST_INTERVAL_MS;
  }

  abstract fetchPage(query: PageQuery): Promise<PageFetchResult>;

  /**
   * Fetch pages 1..maxPages, normalizing every ad found.
   *
   * Stops early on the first failed fetch or the first page without ads and
   * returns what was gathered up to then. No retries are made.
   */
  async scrape(params: ScrapeParams): Promise<CanonicalAdRecord[]> {
    const { query, region, maxPages, runId } = params;
    const ads: CanonicalAdRecord[] = [];

    this.deps.logger.info('Scraping ads', { connector: this.name, runId, query, region, maxPages });

    for (let page = 1; page <= maxPages; page++) {
      const result = await this.fetchPage({ searchTerm: query, page, region });

      if (!result.ok) {
        this.deps.metrics.incrementCounter('pages_fetched', { outcome: 'failed' });
        this.deps.logger.warn('Stopping pagination due to request failure', {
          runId,
          page,
          error: result.error.message,
        });
        addSpanEvent('pagination.stop', { reason: 'fetch_failed', page });
        break;
      }

      const rawAds = locateAds(result.payload);
      this.deps.logger.info('Page fetched', { runId, page, rawAds: rawAds.length });

      if (rawAds.length === 0) {
        this.deps.metrics.incrementCounter('pages_fetched', { outcome: 'empty' });
        this.deps.logger.info('No ads on page; stopping pagination', { runId, page });
        addSpanEvent('pagination.stop', { reason: 'empty_page', page });
        break;
      }

      this.deps.metrics.incrementCounter('pages_fetched', { outcome: 'ok' });
      ads.push(...this.normalizePage(rawAds, page, runId));

      if (page < maxPages) {
        await this.pause(this.requestIntervalMs);
      }
    }

    this.deps.logger.info('Total normalized ads', { runId, count: ads.length });
    return ads;
  }

  private normalizePage(rawAds: unknown[], page: number, runId?: string): CanonicalAdRecord[] {
    const normalized: CanonicalAdRecord[] = [];

    for (const [index, raw] of rawAds.entries()) {
      if (!isPlainObject(raw)) {
        this.deps.logger.debug('Skipping non-object ad entry', { runId, page, index });
        continue;
      }

      try {
        normalized.push(this.deps.normalizer.normalizeStrict(raw));
      } catch (error: unknown) {
        this.deps.metrics.incrementCounter('normalization_failures');
        this.deps.logger.error('Failed to normalize ad entry', {
          runId,
          page,
          index,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    this.deps.metrics.incrementCounter('ads_normalized', {}, normalized.length);
    return normalized;
  }

  protected async pause(ms: number): Promise<void> {
    if (ms <= 0) return;
    await new Promise((resolve) => setTimeout(resolve, ms));
  }
}
