/**
 * Crawl the structured-product catalog into the products table.
 *
 * Run: npm run crawl -- [--product-type CODE]... [--currency CHF]... [--symbol NESN]...
 *                       [--resume RUN_ID] [--max-items N] [--name LABEL]
 */
import './load-env';

import { parseArgs } from 'node:util';
import { createPgStores, getDb } from '@tessera/db';
import { CrawlRunRegistry, crawlCatalog, loadConfig } from '@tessera/crawler';
import { runScript } from './run-script';

runScript(async () => {
  const { values } = parseArgs({
    options: {
      'product-type': { type: 'string', multiple: true },
      currency: { type: 'string', multiple: true },
      symbol: { type: 'string', multiple: true },
      resume: { type: 'string' },
      'max-items': { type: 'string' },
      name: { type: 'string' },
    },
  });

  const config = loadConfig();
  const stores = createPgStores(getDb(config.databaseUrl));
  const maxItems = values['max-items'] ? Number(values['max-items']) : undefined;
  if (maxItems !== undefined && !(Number.isInteger(maxItems) && maxItems > 0)) {
    throw new Error(`--max-items must be a positive integer, got ${values['max-items']}`);
  }

  const result = await crawlCatalog(
    { registry: new CrawlRunRegistry(stores.crawlRuns), products: stores.products, config },
    {
      name: values.name,
      resumeRunId: values.resume,
      maxItems,
      filters: {
        productTypes: values['product-type'] ?? [],
        currencies: (values.currency ?? []).map((c) => c.toUpperCase()),
        symbols: values.symbol ?? [],
      },
    },
  );

  console.log(
    `Run ${result.runId}: ${result.status}. ${result.succeeded} saved, ${result.failed} failed.`,
  );
  for (const error of result.errors) console.log(`  ${error.item}: ${error.message}`);
  if (result.status === 'failed') process.exitCode = 1;
});
