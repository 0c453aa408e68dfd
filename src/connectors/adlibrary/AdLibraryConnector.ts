import { BaseConnector } from '../BaseConnector';
import type { CoreDeps, PageFetchResult, PageQuery } from '../types';
import type { AdLibraryConnectorOptions, AdLibraryQueryParams } from './types';

/**
 * Ad library connector
 *
 * Pages through an ad library search endpoint:
 * `GET <baseUrl>?search_term=<query>&page=<n>&region=<code>`.
 * Response shapes vary between deployments; PayloadLocator and AdNormalizer
 * take care of that downstream.
 *
 * @example
 * ```typescript
 * const sdk = await AdScraperSDK.init({ baseUrl: 'https://ads.example.com/api/search' });
 * const ads = await sdk.scrape({ query: 'shoes', region: 'GB', maxPages: 3 });
 * ```
 */
export class AdLibraryConnector extends BaseConnector {
  readonly name = 'ad-library' as const;

  private baseUrl: string;

  constructor(deps: CoreDeps, options: AdLibraryConnectorOptions) {
    super(deps, options);
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  /**
   * Fetches one page of raw ads.
   *
   * Transport errors, error statuses and non-JSON bodies resolve to
   * `{ ok: false }` rather than rejecting.
   */
  async fetchPage(query: PageQuery): Promise<PageFetchResult> {
    const params: AdLibraryQueryParams = {
      search_term: query.searchTerm,
      page: query.page,
      region: query.region,
    };

    try {
      const response = await this.deps.http.getJson({ url: this.baseUrl, query: { ...params } });
      this.deps.logger.debug('Received payload', {
        page: query.page,
        status: response.status,
        keys: payloadKeys(response.data),
      });
      return { ok: true, payload: response.data };
    } catch (error: unknown) {
      const failure = error instanceof Error ? error : new Error(String(error));
      this.deps.logger.error('Failed to fetch page', {
        page: query.page,
        error: failure.message,
        code: 'code' in failure ? failure.code : undefined,
      });
      return { ok: false, error: failure };
    }
  }
}

function payloadKeys(payload: unknown): string[] {
  if (Array.isArray(payload)) return [];
  return payload && typeof payload === 'object' ? Object.keys(payload) : [];
}
