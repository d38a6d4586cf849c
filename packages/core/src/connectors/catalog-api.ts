/**
 * Catalog search API client. POSTs a search body with a bearer token and returns one page of
 * raw products plus the total hit count for the query.
 */

import { z } from 'zod';
import {
  FetchAuthInvalidError,
  FetchError,
  FetchRateLimitedError,
  FetchTransientError,
  describeError,
} from '../errors';
import { fetchWithTimeout } from './http';
import type { CatalogPage, CatalogProvider, CatalogQuery } from './types';

const SERVICE_NAME = 'Catalog API';
const DEFAULT_TIMEOUT_MS = 30000;

export type CatalogApiProduct = Record<string, unknown>;

export interface CatalogApiOptions {
  endpoint: string;
  token: string;
  timeoutMs?: number;
  region?: string;
}

const searchResponseSchema = z.object({
  products: z.array(z.record(z.unknown())).default([]),
  searchMetadata: z
    .object({ totalHits: z.number().int().nonnegative().default(0) })
    .passthrough()
    .default({}),
});

export function buildSearchBody(
  query: CatalogQuery,
  offset: number,
  pageSize: number,
  region = 'CH',
) {
  const { filters } = query;
  return {
    region,
    pagination: { resultPerPage: pageSize, resultsOffset: offset },
    sort: [
      { fieldName: 'underlying.shortName.keyword', sortOrder: 'ASC' },
      { fieldName: 'calendar.finalFixingDate', sortOrder: 'ASC' },
    ],
    conditions: {
      '-identification.status:EXPIRED': true,
      '+calendar.issueDateTime:[* TO now]': true,
    },
    currencies: filters.currencies,
    underlyings: [],
    productTypes: filters.productTypes,
    omni: query.prefix,
  };
}

function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds > 0 ? seconds * 1000 : undefined;
}

async function readSearchResponse(response: Response): Promise<CatalogPage<CatalogApiProduct>> {
  if (response.status === 401 || response.status === 403) {
    throw new FetchAuthInvalidError(SERVICE_NAME, response.status);
  }
  if (response.status === 429) {
    throw new FetchRateLimitedError(
      SERVICE_NAME,
      parseRetryAfter(response.headers.get('retry-after')),
    );
  }
  if (response.status >= 500) {
    throw new FetchTransientError(SERVICE_NAME, response.statusText, response.status);
  }
  if (!response.ok) {
    const body = await response.text();
    throw new FetchError(SERVICE_NAME, response.status, body.slice(0, 200));
  }

  const text = await response.text();
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new FetchTransientError(SERVICE_NAME, `invalid JSON: ${describeError(err)}`);
  }
  const parsed = searchResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new FetchError(SERVICE_NAME, response.status, 'unexpected response shape');
  }
  return { totalHits: parsed.data.searchMetadata.totalHits, items: parsed.data.products };
}

export class CatalogApiClient implements CatalogProvider<CatalogApiProduct> {
  readonly name = 'catalog_api';
  private endpoint: string;
  private token: string;
  private timeoutMs: number;
  private region: string;

  constructor(options: CatalogApiOptions) {
    this.endpoint = options.endpoint;
    this.token = options.token;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.region = options.region ?? 'CH';
  }

  async fetchPage(
    query: CatalogQuery,
    offset: number,
    pageSize: number,
  ): Promise<CatalogPage<CatalogApiProduct>> {
    return fetchWithTimeout(
      SERVICE_NAME,
      this.endpoint,
      {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.token}`,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: JSON.stringify(buildSearchBody(query, offset, pageSize, this.region)),
      },
      this.timeoutMs,
      (response) => readSearchResponse(response),
    );
  }

  /** Hit count for a query, from a one-item page. */
  async probeCount(query: CatalogQuery): Promise<number> {
    const page = await this.fetchPage(query, 0, 1);
    return page.totalHits;
  }
}
