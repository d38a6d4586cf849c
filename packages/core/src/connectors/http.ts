import { FetchTransientError, TesseraError, describeError } from '../errors';

/**
 * Fetch and read the response under one timeout. The timer covers the body read as well as the
 * headers, so a stalled stream cannot hang the caller. Failures that `read` does not classify
 * itself (aborts, resets, stream errors) become FetchTransientError.
 */
export async function fetchWithTimeout<R>(
  serviceName: string,
  url: string,
  init: RequestInit,
  timeoutMs: number,
  read: (response: Response) => Promise<R>,
): Promise<R> {
  const controller = new AbortController();
  const timeoutMessage = `timed out after ${timeoutMs}ms`;
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timedOut = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(new FetchTransientError(serviceName, timeoutMessage));
    }, timeoutMs);
  });

  try {
    return await Promise.race([
      fetch(url, { ...init, signal: controller.signal }).then(read),
      timedOut,
    ]);
  } catch (err) {
    if (err instanceof TesseraError) throw err;
    throw new FetchTransientError(
      serviceName,
      controller.signal.aborted ? timeoutMessage : describeError(err),
    );
  } finally {
    clearTimeout(timeoutId);
  }
}
