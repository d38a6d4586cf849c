/** Counts every driver reports. Each attempted item lands in exactly one of succeeded/failed. */
export interface ItemOutcome {
  processed: number;
  succeeded: number;
  failed: number;
  /** First failures, at most ERROR_SAMPLE_SIZE of them. */
  errors: ItemError[];
}

export interface ItemError {
  item: string;
  message: string;
}

export const ERROR_SAMPLE_SIZE = 20;

export function emptyOutcome(): ItemOutcome {
  return { processed: 0, succeeded: 0, failed: 0, errors: [] };
}

export function recordItemSuccess(outcome: ItemOutcome): void {
  outcome.processed++;
  outcome.succeeded++;
}

export function recordItemFailure(outcome: ItemOutcome, item: string, message: string): void {
  outcome.processed++;
  outcome.failed++;
  if (outcome.errors.length < ERROR_SAMPLE_SIZE) outcome.errors.push({ item, message });
}
