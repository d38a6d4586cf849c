import { describe, it, expect } from 'vitest';
import { ConfigError } from '@tessera/core';
import { loadConfig, requireCatalogAccess } from '@tessera/crawler';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadConfig({});
    expect(config.catalog).toMatchObject({
      token: undefined,
      enabled: true,
      pageSize: 50,
      resultWindow: 10000,
      rateLimitMs: 100,
      maxItems: undefined,
      maxSegmentDepth: 6,
    });
    expect(config.fetch).toEqual({
      timeoutMs: 30000,
      maxRetries: 3,
      retryDelayMs: 5000,
      rateLimitBackoffMs: 30000,
    });
    expect(config.enrich).toEqual({
      batchSize: 10,
      concurrency: 3,
      itemDelayMs: 500,
      cycleDelayMs: 30000,
      stateFile: 'data/enrich-state.json',
    });
  });

  it('coerces values and treats blank ones as unset', () => {
    const config = loadConfig({
      CATALOG_API_TOKEN: '  ',
      CATALOG_PAGE_SIZE: '',
      CATALOG_CRAWL_ENABLED: 'no',
      ENRICH_CONCURRENCY: '5',
      CATALOG_MAX_ITEMS: '200',
    });
    expect(config.catalog.token).toBeUndefined();
    expect(config.catalog.pageSize).toBe(50);
    expect(config.catalog.enabled).toBe(false);
    expect(config.catalog.maxItems).toBe(200);
    expect(config.enrich.concurrency).toBe(5);
  });

  it('names every invalid variable', () => {
    let error: unknown;
    try {
      loadConfig({ CATALOG_PAGE_SIZE: 'abc' });
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(ConfigError);
    expect(error instanceof ConfigError && error.problems).toEqual([
      'CATALOG_PAGE_SIZE: Expected number, received nan',
    ]);
  });
});

describe('requireCatalogAccess', () => {
  it('needs the crawl enabled and a token', () => {
    expect(() => requireCatalogAccess(loadConfig({ CATALOG_CRAWL_ENABLED: 'false' }))).toThrow(
      'Catalog crawl not configured. disabled by CATALOG_CRAWL_ENABLED',
    );
    expect(() => requireCatalogAccess(loadConfig({}))).toThrow(
      'Catalog crawl not configured. missing CATALOG_API_TOKEN',
    );
  });

  it('returns the endpoint and token', () => {
    const config = loadConfig({
      CATALOG_API_URL: 'https://catalog.test/search',
      CATALOG_API_TOKEN: 'test-secret',
    });
    expect(requireCatalogAccess(config)).toEqual({
      endpoint: 'https://catalog.test/search',
      token: 'test-secret',
    });
  });
});
