import type { NormalizedRecord } from '@tessera/schemas';
import type { ParseFailure } from '../errors';

/** What every parser returns. Parsers never throw; problems are reported in `issues`. */
export interface ParseOutcome {
  record: NormalizedRecord;
  issues: ParseFailure[];
}
