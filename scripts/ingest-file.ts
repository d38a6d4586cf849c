/**
 * Ingest a document from disk into the products table.
 *
 * Run: npm run ingest -- FILE --kind termsheet_text|quote_page|catalog_api|record_json
 *                        [--isin ISIN] [--merge FILE --merge-kind KIND [--prefer FIELD]...]
 */
import './load-env';

import * as fs from 'fs/promises';
import * as path from 'path';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { createPgStores, getDb } from '@tessera/db';
import { scalarFieldsSchema } from '@tessera/schemas';
import { ingestDocument } from '@tessera/crawler';
import { runScript } from './run-script';

const kindSchema = z.enum(['catalog_api', 'quote_page', 'termsheet_text', 'record_json']);
const preferSchema = z.array(scalarFieldsSchema.keyof());

runScript(async () => {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      kind: { type: 'string', default: 'termsheet_text' },
      isin: { type: 'string' },
      merge: { type: 'string' },
      'merge-kind': { type: 'string', default: 'quote_page' },
      prefer: { type: 'string', multiple: true },
    },
  });
  const [file] = positionals;
  if (!file) throw new Error('Usage: ingest-file.ts FILE --kind KIND');

  const filePath = path.resolve(process.cwd(), file);
  const raw = await fs.readFile(filePath, 'utf8');
  const secondary = values.merge
    ? {
        raw: await fs.readFile(path.resolve(process.cwd(), values.merge), 'utf8'),
        sourceHint: kindSchema.parse(values['merge-kind']),
        preferSecondary: preferSchema.parse(values.prefer ?? []),
      }
    : undefined;

  const { products } = createPgStores(getDb());
  const result = await ingestDocument(products, {
    raw,
    sourceHint: kindSchema.parse(values.kind),
    isin: values.isin,
    fileName: path.basename(filePath),
    filePath,
    secondary,
  });

  console.log(result.id ? `Stored product ${result.id}` : 'Nothing stored.');
  for (const issue of result.issues) console.log(`  issue: ${issue.message}`);
  for (const entry of result.auditEntries) {
    console.log(`  ${entry.field}: ${entry.from} → ${entry.to} (${entry.reason})`);
  }
});
