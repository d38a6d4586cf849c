import { crawlRunStatusEnum, type CrawlRunStatus } from '@tessera/schemas';

/** Allowed status changes for a crawl run. Terminal states accept none. */
export const RUN_TRANSITIONS: Readonly<Record<CrawlRunStatus, readonly CrawlRunStatus[]>> = {
  running: ['completed', 'failed', 'paused', 'cancelled'],
  paused: ['running', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
};

export const TERMINAL_STATUSES: readonly CrawlRunStatus[] = ['completed', 'failed', 'cancelled'];

export function isTerminal(status: CrawlRunStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function canTransition(from: CrawlRunStatus, to: CrawlRunStatus): boolean {
  return RUN_TRANSITIONS[from].includes(to);
}

/** Statuses from which `to` can be reached; used as the WHERE clause of a conditional update. */
export function allowedSources(to: CrawlRunStatus): CrawlRunStatus[] {
  return crawlRunStatusEnum.options.filter((from) => canTransition(from, to));
}

export class RunTransitionError extends Error {
  constructor(
    public runId: string,
    public from: CrawlRunStatus,
    public to: CrawlRunStatus,
  ) {
    super(`Crawl run ${runId} cannot move from ${from} to ${to}`);
    this.name = 'RunTransitionError';
  }
}

export class RunNotFoundError extends Error {
  constructor(public runId: string) {
    super(`Crawl run ${runId} not found`);
    this.name = 'RunNotFoundError';
  }
}
