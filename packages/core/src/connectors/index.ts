export type {
  CatalogPage,
  CatalogProvider,
  CatalogQuery,
  EnrichmentSource,
} from './types';
export {
  CatalogApiClient,
  buildSearchBody,
  type CatalogApiOptions,
  type CatalogApiProduct,
} from './catalog-api';
export {
  CATALOG_SOURCE,
  catalogProductSchema,
  parseCatalogProduct,
  type CatalogProduct,
} from './catalog-parser';
export {
  QUOTE_PAGE_SOURCE,
  QuotePageSource,
  extractLabelTable,
  isNotFoundPage,
  parseQuotePage,
  type QuotePageOptions,
} from './quote-page';
