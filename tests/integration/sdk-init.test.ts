// tests/integration/sdk-init.test.ts

import { describe, it, expect } from 'vitest';
import { AdScraperSDK } from '../../src/sdk';
import { ConfigError } from '../../src/utils/errors';

describe('AdScraperSDK Initialization', () => {
  const config = {
    baseUrl: 'https://ads.example.com/api/v1/ad-library/search',
    http: { timeout: 2000, keepAlive: false },
    pagination: { requestIntervalMs: 0 },
    logging: { level: 'error' as const },
  };

  it('should initialize without throwing', async () => {
    const sdk = await AdScraperSDK.init(config);
    expect(sdk).toBeDefined();
  });

  it('should reject invalid configuration', async () => {
    await expect(AdScraperSDK.init({ ...config, baseUrl: 'ads.example.com' })).rejects.toBeInstanceOf(
      ConfigError
    );
    await expect(
      AdScraperSDK.init({ ...config, pagination: { requestIntervalMs: -5 } })
    ).rejects.toThrow(/requestIntervalMs must not be negative/);
  });

  it('should expose Prometheus metrics', async () => {
    const sdk = await AdScraperSDK.init(config);

    const metrics = await sdk.getMetrics();

    expect(metrics).toContain('# TYPE pages_fetched_total counter');
  });

  it('should expose no metrics when disabled', async () => {
    const sdk = await AdScraperSDK.init({ ...config, metrics: { enabled: false } });

    expect(await sdk.getMetrics()).not.toContain('pages_fetched_total');
  });
});
