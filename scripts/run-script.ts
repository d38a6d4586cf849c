/**
 * Shared script plumbing: mirror crawl logs to the console, print readable database errors,
 * and close the pool on the way out.
 */
import { closeDb, DATABASE_ERROR_MESSAGE, isDatabaseConnectionError } from '@tessera/db';
import { describeError } from '@tessera/core';
import { formatLogEntry, onCrawlLog } from '@tessera/crawler';

export function runScript(main: () => Promise<void>): void {
  const unsubscribe = onCrawlLog((entry) => {
    const line = formatLogEntry(entry);
    if (entry.level === 'error') console.error(line);
    else console.log(line);
  });

  main()
    .catch((err) => {
      console.error(isDatabaseConnectionError(err) ? DATABASE_ERROR_MESSAGE : describeError(err));
      process.exitCode = 1;
    })
    .finally(() => {
      unsubscribe();
      return closeQuietly(closeDb);
    });
}

/** Run a shutdown step; a failure is printed and marks the process as failed instead of escaping. */
export async function closeQuietly(close: () => Promise<void>): Promise<void> {
  try {
    await close();
  } catch (err) {
    console.error(describeError(err));
    process.exitCode = 1;
  }
}
