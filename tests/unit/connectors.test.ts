// tests/unit/connectors.test.ts

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AdLibraryConnector } from '../../src/connectors/adlibrary/AdLibraryConnector';
import { FetcherConnector } from '../../src/connectors/fetcher/FetcherConnector';
import { AdNormalizer } from '../../src/core/normalizer/Normalizer';
import { ApiClientError, InvalidResponseError } from '../../src/utils/errors';
import type { CoreDeps, PageFetcher, PageQuery } from '../../src/connectors/types';

describe('AdLibraryConnector', () => {
  let getJson: ReturnType<typeof vi.fn>;
  let mockDeps: CoreDeps;

  beforeEach(() => {
    getJson = vi.fn();
    mockDeps = {
      http: { getJson } as any,
      normalizer: new AdNormalizer(),
      metrics: { incrementCounter: vi.fn(), recordLatency: vi.fn() } as any,
      logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } as any,
    };
  });

  it('should request the search endpoint with page parameters', async () => {
    getJson.mockResolvedValue({ data: { ads: [] }, status: 200, headers: {} });
    const connector = new AdLibraryConnector(mockDeps, {
      baseUrl: 'https://ads.example.com/api/search/',
    });

    const result = await connector.fetchPage({ searchTerm: 'shoes', page: 2, region: 'IE' });

    expect(result).toEqual({ ok: true, payload: { ads: [] } });
    expect(getJson).toHaveBeenCalledWith({
      url: 'https://ads.example.com/api/search',
      query: { search_term: 'shoes', page: 2, region: 'IE' },
    });
  });

  it('should resolve a failure result instead of rejecting', async () => {
    const error = new ApiClientError('Client error: 403', 403);
    getJson.mockRejectedValue(error);
    const connector = new AdLibraryConnector(mockDeps, { baseUrl: 'https://ads.example.com' });

    const result = await connector.fetchPage({ searchTerm: 'shoes', page: 1, region: 'GB' });

    expect(result).toEqual({ ok: false, error });
    expect(mockDeps.logger.error).toHaveBeenCalledWith('Failed to fetch page', {
      page: 1,
      error: 'Client error: 403',
      code: 'API_CLIENT_ERROR',
    });
  });

  it('should scrape through the HTTP client until a page fails', async () => {
    getJson
      .mockResolvedValueOnce({ data: { data: { ads: [{ ad_id: 'a' }] } }, status: 200, headers: {} })
      .mockRejectedValueOnce(new InvalidResponseError());
    const connector = new AdLibraryConnector(mockDeps, {
      baseUrl: 'https://ads.example.com',
      requestIntervalMs: 0,
    });

    const ads = await connector.scrape({ query: 'shoes', region: 'GB', maxPages: 3 });

    expect(ads.map((ad) => ad.adId)).toEqual(['a']);
    expect(getJson).toHaveBeenCalledTimes(2);
  });
});

describe('FetcherConnector', () => {
  let mockDeps: CoreDeps;

  beforeEach(() => {
    mockDeps = {
      http: {} as any,
      normalizer: new AdNormalizer(),
      metrics: { incrementCounter: vi.fn(), recordLatency: vi.fn() } as any,
      logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } as any,
    };
  });

  it('should drive pagination with the supplied fetcher', async () => {
    const fetcher: PageFetcher = vi.fn(async (query: PageQuery) =>
      query.page === 1
        ? { ok: true as const, payload: [{ title: 'First' }, { title: 'Second' }] }
        : { ok: true as const, payload: { items: [] } }
    );
    const connector = new FetcherConnector(mockDeps, fetcher, { requestIntervalMs: 0 });

    const ads = await connector.scrape({ query: 'q', region: 'GB', maxPages: 5 });

    expect(ads.map((ad) => ad.adTitle)).toEqual(['First', 'Second']);
    expect(fetcher).toHaveBeenCalledTimes(2);
  });

  it('should turn a rejected fetch into a failure result', async () => {
    const connector = new FetcherConnector(mockDeps, async () => {
      throw new Error('socket hang up');
    });

    const result = await connector.fetchPage({ searchTerm: 'q', page: 1, region: 'GB' });

    expect(result.ok).toBe(false);
    expect(mockDeps.logger.error).toHaveBeenCalledWith('Page fetcher rejected', {
      page: 1,
      error: 'socket hang up',
    });
  });
});
