// src/connectors/types.ts

import type { CanonicalAdRecord } from '../core/normalizer/types';
import type { AdNormalizer } from '../core/normalizer/Normalizer';
import type { HttpCore } from '../core/http/HttpCore';
import type { Logger } from '../observability/Logger';
import type { MetricsCollector } from '../observability/MetricsCollector';

export interface ScrapeParams {
  query: string;
  region: string;
  maxPages: number;
  runId?: string; // Correlation ID attached to log lines
}

/** Parameters for a single page request. */
export interface PageQuery {
  searchTerm: string;
  page: number; // 1-based
  region: string;
}

export type PageFetchResult =
  | { ok: true; payload: unknown }
  | { ok: false; error: Error };

/**
 * Page source contract: resolves to a failure result instead of rejecting
 * for HTTP errors, non-JSON bodies and network failures.
 */
export type PageFetcher = (query: PageQuery) => Promise<PageFetchResult>;

export interface Connector {
  readonly name: string;

  fetchPage(query: PageQuery): Promise<PageFetchResult>;
  scrape(params: ScrapeParams): Promise<CanonicalAdRecord[]>;
}

export interface PaginationOptions {
  requestIntervalMs?: number; // Pause between consecutive page requests
}

export interface CoreDeps {
  http: HttpCore;
  normalizer: AdNormalizer;
  logger: Logger;
  metrics: MetricsCollector;
}
