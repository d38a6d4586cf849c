/**
 * Segmented pager for catalogs that refuse results beyond a fixed window. A query segment whose
 * hit count reaches the window is split into `prefix + symbol` sub-segments until every segment
 * fits, then each segment is paged from offset 0. Items are handed to `onItem` as soon as their
 * page arrives.
 */

import type { CrawlFilters, SegmentPosition } from '@tessera/schemas';
import {
  describeError,
  isFatalError,
  type CatalogProvider,
  type CatalogQuery,
} from '@tessera/core';
import { crawlLog } from './logs';
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy } from './retry';
import { sleep as defaultSleep, type Sleep } from './sleep';

const LOG = 'Pager';

export const DEFAULT_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';
export const DEFAULT_RESULT_WINDOW = 10000;
export const DEFAULT_PAGE_SIZE = 50;
export const DEFAULT_RATE_LIMIT_MS = 100;
export const DEFAULT_MAX_DEPTH = 6;

export interface PagerOptions<T> {
  provider: CatalogProvider<T>;
  filters: CrawlFilters;
  onItem: (item: T, segment: string) => Promise<void> | void;
  pageSize?: number;
  resultWindow?: number;
  rateLimitMs?: number;
  /** Symbols appended to a prefix when its segment is too large. */
  alphabet?: string;
  /** First-level segments; defaults to `filters.symbols`, or the alphabet when none are given. */
  rootSegments?: readonly string[];
  maxDepth?: number;
  maxItems?: number;
  retry?: RetryPolicy;
  sleep?: Sleep;
  /** Polled before every request; true stops the crawl where it is. */
  shouldStop?: () => boolean | Promise<boolean>;
  resumeFrom?: SegmentPosition;
  /** Hit count of the whole crawl; called again as each caller-supplied root segment is probed. */
  onTotal?: (total: number) => Promise<void> | void;
  /** Position after each fully emitted page, for checkpointing. */
  onProgress?: (position: SegmentPosition) => Promise<void> | void;
}

export interface SegmentError {
  segment: string;
  kind: 'fetch' | 'truncated';
  message: string;
}

export interface PagerResult {
  itemsEmitted: number;
  pagesFetched: number;
  segmentsCompleted: number;
  errors: SegmentError[];
  /** Stopped by `shouldStop` before the crawl finished. */
  stopped: boolean;
  /** Stopped because `maxItems` was reached. */
  limitReached: boolean;
  position: SegmentPosition;
}

class StopCrawl extends Error {
  constructor() {
    super('crawl stopped');
    this.name = 'StopCrawl';
  }
}

export class SegmentedPager<T> {
  private pageSize: number;
  private window: number;
  private rateLimitMs: number;
  private alphabet: string;
  private rootSegments: readonly string[] | null;
  private maxDepth: number;
  private retry: RetryPolicy;
  private sleep: Sleep;

  private requests = 0;
  private itemsEmitted = 0;
  private pagesFetched = 0;
  private segmentsCompleted = 0;
  private rootTotal = 0;
  private errors: SegmentError[] = [];
  private completed: Set<string>;
  private resumeSegment: string | null;
  private resumeOffset: number;
  private current: { segment: string | null; offset: number } = { segment: null, offset: 0 };

  constructor(private options: PagerOptions<T>) {
    this.pageSize = Math.max(1, options.pageSize ?? DEFAULT_PAGE_SIZE);
    this.window = Math.max(1, options.resultWindow ?? DEFAULT_RESULT_WINDOW);
    this.rateLimitMs = options.rateLimitMs ?? DEFAULT_RATE_LIMIT_MS;
    this.alphabet = options.alphabet ?? DEFAULT_ALPHABET;
    const roots = options.rootSegments ?? options.filters.symbols;
    this.rootSegments = roots.length > 0 ? roots : null;
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.sleep = options.sleep ?? defaultSleep;
    this.retry = { ...(options.retry ?? DEFAULT_RETRY_POLICY), sleep: this.sleep, label: LOG };
    this.completed = new Set(options.resumeFrom?.completedSegments ?? []);
    this.resumeSegment = options.resumeFrom?.segment ?? null;
    this.resumeOffset = options.resumeFrom?.offset ?? 0;
  }

  async run(): Promise<PagerResult> {
    let stopped = false;
    let limitReached = false;
    try {
      if (this.rootSegments) {
        for (const root of this.rootSegments) await this.fetchSegment(root, 1);
        if (this.rootSegments.every((root) => this.isCompleted(root))) this.markCompleted('');
      } else {
        await this.fetchSegment('', 0);
      }
    } catch (err) {
      if (!(err instanceof StopCrawl)) throw err;
      limitReached = this.limitReached();
      stopped = !limitReached;
    }
    return {
      itemsEmitted: this.itemsEmitted,
      pagesFetched: this.pagesFetched,
      segmentsCompleted: this.segmentsCompleted,
      errors: this.errors,
      stopped,
      limitReached,
      position: this.position(),
    };
  }

  /** Emit every item matching `prefix`. Segment failures are recorded, not thrown. */
  async fetchSegment(prefix: string, depth: number): Promise<void> {
    if (this.isCompleted(prefix)) return;

    let count: number;
    try {
      count = await this.request(() => this.options.provider.probeCount(this.query(prefix)));
    } catch (err) {
      this.recordFailure(prefix, err);
      return;
    }
    if (depth === 0 || (this.rootSegments && depth === 1)) await this.reportTotal(count);

    if (count === 0) {
      this.markCompleted(prefix);
      return;
    }

    if (count < this.window) {
      if (await this.pageThrough(prefix, count)) this.markCompleted(prefix);
      return;
    }

    if (depth >= this.maxDepth || this.alphabet.length === 0) {
      const reason = this.alphabet.length === 0 ? 'no symbols to subdivide with' : `depth ${depth}`;
      crawlLog(LOG, `Segment '${prefix}' cannot be subdivided; paging the first ${this.window}`, {
        level: 'warn',
        detail: `${count} hits, ${reason}`,
      });
      this.errors.push({
        segment: prefix,
        kind: 'truncated',
        message: `${count} hits exceed the ${this.window} window and cannot be subdivided (${reason})`,
      });
      if (await this.pageThrough(prefix, this.window)) this.markCompleted(prefix);
      return;
    }

    crawlLog(LOG, `Segment '${prefix}' has ${count} hits; subdividing`, { detail: `depth ${depth}` });
    for (const symbol of this.alphabet) {
      await this.fetchSegment(prefix + symbol, depth + 1);
    }
    if (this.allChildrenCompleted(prefix)) this.markCompleted(prefix);
  }

  /** Page a segment known to fit the window. Returns false when a page failed. */
  private async pageThrough(prefix: string, count: number): Promise<boolean> {
    const limit = Math.min(count, this.window);
    let offset = 0;
    if (this.resumeSegment === prefix) {
      offset = this.resumeOffset;
      this.resumeSegment = null;
      crawlLog(LOG, `Resuming segment '${prefix}' at offset ${offset}`);
    }

    while (offset < limit) {
      const size = Math.min(this.pageSize, this.window - offset);
      let items: T[];
      try {
        const page = await this.request(() =>
          this.options.provider.fetchPage(this.query(prefix), offset, size),
        );
        items = page.items;
      } catch (err) {
        this.recordFailure(prefix, err, offset);
        return false;
      }
      this.pagesFetched++;

      for (const item of items) {
        if (this.limitReached()) throw new StopCrawl();
        await this.options.onItem(item, prefix);
        this.itemsEmitted++;
      }

      offset += items.length;
      this.current = { segment: prefix, offset };
      await this.options.onProgress?.(this.position());
      if (items.length < size) break;
    }
    return true;
  }

  private async request<R>(call: () => Promise<R>): Promise<R> {
    if (this.options.shouldStop && (await this.options.shouldStop())) throw new StopCrawl();
    if (this.limitReached()) throw new StopCrawl();
    if (this.requests > 0 && this.rateLimitMs > 0) await this.sleep(this.rateLimitMs);
    this.requests++;
    return withRetry(call, this.retry);
  }

  private query(prefix: string): CatalogQuery {
    return { prefix, filters: this.options.filters };
  }

  private recordFailure(prefix: string, err: unknown, offset?: number): void {
    if (err instanceof StopCrawl || isFatalError(err)) throw err;
    const message = describeError(err);
    const where = offset === undefined ? 'probe' : `offset ${offset}`;
    crawlLog(LOG, `Segment '${prefix}' failed at ${where}`, { level: 'error', detail: message });
    this.errors.push({ segment: prefix, kind: 'fetch', message });
  }

  private async reportTotal(count: number): Promise<void> {
    if (!this.options.onTotal) return;
    this.rootTotal = this.rootSegments ? this.rootTotal + count : count;
    await this.options.onTotal(this.rootTotal);
  }

  private limitReached(): boolean {
    const max = this.options.maxItems;
    return max !== undefined && this.itemsEmitted >= max;
  }

  private isCompleted(prefix: string): boolean {
    for (let i = prefix.length; i >= 0; i--) {
      if (this.completed.has(prefix.slice(0, i))) return true;
    }
    return false;
  }

  private allChildrenCompleted(prefix: string): boolean {
    return [...this.alphabet].every((symbol) => this.completed.has(prefix + symbol));
  }

  // A finished segment replaces its descendants in the completed list.
  private markCompleted(prefix: string): void {
    for (const done of this.completed) {
      if (done.length > prefix.length && done.startsWith(prefix)) this.completed.delete(done);
    }
    this.completed.add(prefix);
    this.segmentsCompleted++;
    if (this.current.segment === prefix) this.current = { segment: null, offset: 0 };
  }

  private position(): SegmentPosition {
    return {
      completedSegments: [...this.completed].sort(),
      segment: this.current.segment,
      offset: this.current.offset,
    };
  }
}

export function crawlSegmented<T>(options: PagerOptions<T>): Promise<PagerResult> {
  return new SegmentedPager(options).run();
}
