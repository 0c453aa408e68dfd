import { BaseConnector } from '../BaseConnector';
import type { CoreDeps, PageFetcher, PageFetchResult, PageQuery, PaginationOptions } from '../types';

/**
 * Connector backed by a caller-supplied page fetch function.
 *
 * Lets a custom transport (another HTTP stack, a recorded fixture, a
 * queue consumer) drive the same pagination and normalization.
 */
export class FetcherConnector extends BaseConnector {
  readonly name = 'fetcher' as const;

  constructor(
    deps: CoreDeps,
    private fetcher: PageFetcher,
    options: PaginationOptions = {}
  ) {
    super(deps, options);
  }

  async fetchPage(query: PageQuery): Promise<PageFetchResult> {
    try {
      return await this.fetcher(query);
    } catch (error: unknown) {
      // The contract says fetchers resolve failures; a rejection is treated the same way
      const failure = error instanceof Error ? error : new Error(String(error));
      this.deps.logger.error('Page fetcher rejected', { page: query.page, error: failure.message });
      return { ok: false, error: failure };
    }
  }
}
