// tests/unit/Logger.test.ts

import { describe, it, expect, vi } from 'vitest';
import { Logger } from '../../src/observability/Logger';

describe('Logger', () => {
  const logger = new Logger({ level: 'debug', format: 'json' });

  it('should redact an apiKey in metadata', () => {
    const redacted = logger['redactSensitive']({
      runId: 'run-1',
      apiKey: 'test-secret',
    }) as Record<string, unknown>;

    expect(redacted.runId).toBe('run-1');
    expect(redacted.apiKey).toBe('[REDACTED]');
  });

  it('should redact cookies and authorization inside headers', () => {
    const redacted = logger['redactSensitive']({
      url: 'https://ads.example.com/search',
      headers: {
        Cookie: 'session=test-secret',
        Authorization: 'Bearer test-secret',
        'User-Agent': 'ad-scraper-test/1.0',
      },
    }) as Record<string, Record<string, unknown>>;

    expect(redacted.headers.Cookie).toBe('[REDACTED]');
    expect(redacted.headers.Authorization).toBe('[REDACTED]');
    expect(redacted.headers['User-Agent']).toBe('ad-scraper-test/1.0');
  });

  it('should not modify the caller object', () => {
    const meta = { headers: { cookie: 'session=test-secret' } };

    logger['redactSensitive'](meta);

    expect(meta.headers.cookie).toBe('session=test-secret');
  });

  it('should preserve non-sensitive data', () => {
    const data = {
      runId: 'run-1',
      page: 2,
      rawAds: 50,
      region: 'GB',
    };

    expect(logger['redactSensitive'](data)).toEqual(data);
  });

  it('should pass through values that are not objects', () => {
    expect(logger['redactSensitive'](null)).toBe(null);
    expect(logger['redactSensitive'](undefined)).toBe(undefined);
    expect(logger['redactSensitive']('string')).toBe('string');
  });

  it('should forward sanitized metadata to winston', () => {
    const warn = vi.spyOn(logger['logger'], 'warn');

    logger.warn('Stopping pagination due to request failure', { page: 2, apiKey: 'test-secret' });

    expect(warn).toHaveBeenCalledWith('Stopping pagination due to request failure', {
      page: 2,
      apiKey: '[REDACTED]',
    });
    warn.mockRestore();
  });

  it('should pass an empty object when no metadata is given', () => {
    const info = vi.spyOn(logger['logger'], 'info');

    logger.info('Total normalized ads');

    expect(info).toHaveBeenCalledWith('Total normalized ads', {});
    info.mockRestore();
  });

  it('should not throw when logging', () => {
    const quiet = new Logger({ level: 'error', format: 'pretty' });

    expect(() => {
      quiet.debug('Debug message', { key: 'value' });
      quiet.info('Info message', { key: 'value' });
      quiet.warn('Warn message', { key: 'value' });
    }).not.toThrow();
  });
});
