/**
 * Crawl run lifecycle on top of a CrawlRunStore. Status lives only in storage: every read goes
 * to the store, and every transition is a conditional update so racing writers cannot both win.
 */

import type { CrawlFilters, CrawlRun, CrawlRunStatus, SegmentPosition } from '@tessera/schemas';
import type { CrawlRunStore } from '@tessera/db';
import { RunNotFoundError, RunTransitionError, allowedSources } from '@tessera/core';
import { crawlLog } from './logs';

const LOG = 'Registry';
const MAX_ERROR_LENGTH = 500;

/** Why a worker should stop dispatching, or null to continue. */
export type StopReason = 'paused' | 'cancelled' | 'completed' | 'failed' | 'missing';

export class CrawlRunRegistry {
  constructor(private store: CrawlRunStore) {}

  async create(name: string, filters?: CrawlFilters | null): Promise<CrawlRun> {
    const run = await this.store.create({ name, filters });
    crawlLog(LOG, `Created crawl run ${run.id}`, { detail: name });
    return run;
  }

  async get(id: string): Promise<CrawlRun | null> {
    return this.store.get(id);
  }

  async require(id: string): Promise<CrawlRun> {
    const run = await this.store.get(id);
    if (!run) throw new RunNotFoundError(id);
    return run;
  }

  async list(limit = 50): Promise<CrawlRun[]> {
    return this.store.list(limit);
  }

  private async transition(
    id: string,
    to: CrawlRunStatus,
    lastError?: string | null,
  ): Promise<CrawlRun> {
    const updated = await this.store.transition(id, to, allowedSources(to), lastError);
    if (updated) {
      crawlLog(LOG, `Run ${id} → ${to}`, { level: to === 'failed' ? 'error' : 'info' });
      return updated;
    }
    const current = await this.require(id);
    throw new RunTransitionError(id, current.status, to);
  }

  pause(id: string): Promise<CrawlRun> {
    return this.transition(id, 'paused');
  }

  resume(id: string): Promise<CrawlRun> {
    return this.transition(id, 'running');
  }

  cancel(id: string): Promise<CrawlRun> {
    return this.transition(id, 'cancelled');
  }

  complete(id: string): Promise<CrawlRun> {
    return this.transition(id, 'completed');
  }

  fail(id: string, error: string): Promise<CrawlRun> {
    return this.transition(id, 'failed', error.slice(0, MAX_ERROR_LENGTH));
  }

  /**
   * Fail the run if it is still running. When another writer already paused, cancelled or
   * finished it, that status stands and is returned.
   */
  async tryFail(id: string, error: string): Promise<CrawlRunStatus> {
    try {
      return (await this.fail(id, error)).status;
    } catch (err) {
      if (!(err instanceof RunTransitionError)) throw err;
      crawlLog(LOG, `Run ${id} left as ${err.from}`, { level: 'warn', detail: error });
      return err.from;
    }
  }

  async setTotal(id: string, total: number): Promise<void> {
    await this.store.setTotal(id, total);
  }

  async recordSuccess(id: string, n = 1): Promise<void> {
    await this.store.increment(id, { completed: n });
  }

  async recordError(id: string, message: string): Promise<void> {
    await this.store.increment(id, { errors: 1 }, message.slice(0, MAX_ERROR_LENGTH));
  }

  async saveCheckpoint(id: string, position: SegmentPosition): Promise<void> {
    await this.store.saveCheckpoint(id, position);
  }

  /** Fresh status check for workers between items. */
  async pollStop(id: string): Promise<StopReason | null> {
    const run = await this.store.get(id);
    if (!run) return 'missing';
    return run.status === 'running' ? null : run.status;
  }
}
