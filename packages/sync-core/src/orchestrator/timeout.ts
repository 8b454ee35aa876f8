import { SyncError, SyncErrorCodes } from "../errors.js";

/**
 * Run `operation` with an abort signal that fires after `timeoutMs`.
 *
 * The returned promise rejects with `FETCH_TIMEOUT` as soon as the time is
 * up, whether or not the operation honours the signal.
 *
 * @example
 * ```typescript
 * const records = await withTimeout(
 *   (signal) => connector.fetchInventory({ eans, signal }),
 *   120_000,
 *   "acme inventory fetch"
 * );
 * ```
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new SyncError(
        SyncErrorCodes.FETCH_TIMEOUT,
        `${label} timed out after ${timeoutMs} ms`,
        { timeoutMs }
      );
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });
  try {
    return await Promise.race([operation(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
