import type { CrawlFilters, NormalizedRecord, ScalarFieldName } from '@tessera/schemas';

/** One catalog search: a search prefix combined with the crawl's filters. */
export interface CatalogQuery {
  prefix: string;
  filters: CrawlFilters;
}

export interface CatalogPage<T> {
  totalHits: number;
  items: T[];
}

/**
 * A paginated remote catalog. Implementations throw the fetch errors from `../errors`
 * so callers can tell retryable failures from fatal ones.
 */
export interface CatalogProvider<T> {
  readonly name: string;
  fetchPage(query: CatalogQuery, offset: number, pageSize: number): Promise<CatalogPage<T>>;
  probeCount(query: CatalogQuery): Promise<number>;
}

/** A secondary source consulted to fill in stored records, looked up by ISIN. */
export interface EnrichmentSource {
  readonly name: string;
  /** Slots where this source's value replaces a differing stored value. */
  readonly authoritativeFields: readonly ScalarFieldName[];
  lookup(isin: string): Promise<NormalizedRecord | null>;
}
