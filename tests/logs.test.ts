import { describe, it, expect, beforeEach } from 'vitest';
import {
  clearCrawlLogs,
  crawlLog,
  formatLogEntry,
  getCrawlLogs,
  onCrawlLog,
  type CrawlLogEntry,
} from '@tessera/crawler';

beforeEach(() => {
  clearCrawlLogs();
});

describe('crawl log buffer', () => {
  it('stores entries and returns those after a given id', () => {
    const first = crawlLog('Pager', 'one');
    crawlLog('Pager', 'two', { level: 'warn', detail: 'slow' });

    expect(getCrawlLogs().map((e) => e.message)).toEqual(['one', 'two']);
    expect(getCrawlLogs(first.id)).toMatchObject([
      { component: 'Pager', level: 'warn', message: 'two', detail: 'slow' },
    ]);
  });

  it('keeps only the most recent 500 entries', () => {
    for (let i = 0; i < 510; i++) crawlLog('Test', `entry ${i}`);
    const logs = getCrawlLogs();
    expect(logs).toHaveLength(500);
    expect(logs[0].message).toBe('entry 10');
  });

  it('notifies listeners until they unsubscribe', () => {
    const received: string[] = [];
    const unsubscribe = onCrawlLog((entry) => received.push(entry.message));
    crawlLog('Test', 'seen');
    unsubscribe();
    crawlLog('Test', 'missed');
    expect(received).toEqual(['seen']);
  });
});

describe('formatLogEntry', () => {
  const base: CrawlLogEntry = {
    id: 'log-1',
    ts: Date.UTC(2024, 0, 1, 12, 34, 56),
    component: 'Pager',
    level: 'info',
    message: 'Segment done',
  };

  it('omits the level tag for info lines', () => {
    expect(formatLogEntry(base)).toBe('[12:34:56] [Pager] Segment done');
  });

  it('shows the level and detail otherwise', () => {
    expect(formatLogEntry({ ...base, level: 'warn', detail: '3 retries' })).toBe(
      '[12:34:56] WARN [Pager] Segment done (3 retries)',
    );
  });
});
