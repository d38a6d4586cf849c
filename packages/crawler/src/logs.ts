/**
 * In-memory crawl log buffer. Stores recent entries with timestamps and component names;
 * CLI scripts subscribe to mirror them to the terminal.
 */

export type LogLevel = 'info' | 'warn' | 'error' | 'success';

export interface CrawlLogEntry {
  id: string;
  ts: number;
  component: string;
  level: LogLevel;
  message: string;
  detail?: string;
}

export type CrawlLogListener = (entry: CrawlLogEntry) => void;

const MAX_LOGS = 500;
const logs: CrawlLogEntry[] = [];
const listeners = new Set<CrawlLogListener>();
let nextId = 1;

export function crawlLog(
  component: string,
  message: string,
  options?: { level?: LogLevel; detail?: string },
) {
  const entry: CrawlLogEntry = {
    id: `log-${nextId++}`,
    ts: Date.now(),
    component,
    level: options?.level ?? 'info',
    message,
    detail: options?.detail,
  };
  logs.push(entry);
  if (logs.length > MAX_LOGS) logs.shift();
  for (const listener of listeners) listener(entry);
  return entry;
}

export function getCrawlLogs(afterId?: string): CrawlLogEntry[] {
  if (!afterId) return [...logs];
  const idx = logs.findIndex((l) => l.id === afterId);
  if (idx < 0) return [...logs];
  return logs.slice(idx + 1);
}

export function clearCrawlLogs(): void {
  logs.length = 0;
}

/** Returns an unsubscribe function. */
export function onCrawlLog(listener: CrawlLogListener): () => void {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
}

export function formatLogEntry(entry: CrawlLogEntry): string {
  const time = new Date(entry.ts).toISOString().slice(11, 19);
  const tag = entry.level === 'info' ? '' : ` ${entry.level.toUpperCase()}`;
  const detail = entry.detail ? ` (${entry.detail})` : '';
  return `[${time}]${tag} [${entry.component}] ${entry.message}${detail}`;
}
