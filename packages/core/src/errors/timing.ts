// ============================================
// Abortable Timing Utilities
// ============================================

import { CancelledError } from "./types.js";

/**
 * Throws CancelledError when the signal has already fired.
 */
export function throwIfAborted(signal: AbortSignal | undefined, message = "Operation cancelled"): void {
  if (signal?.aborted) {
    throw new CancelledError(message, { cause: signal.reason });
  }
}

/**
 * Sleeps for the specified duration with abort signal support.
 *
 * @throws CancelledError if the signal is aborted before or during the sleep
 */
export async function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  throwIfAborted(signal);

  return new Promise((resolve, reject) => {
    let abortHandler: (() => void) | undefined;

    const timeoutId = setTimeout(() => {
      if (signal && abortHandler) {
        signal.removeEventListener("abort", abortHandler);
      }
      resolve();
    }, ms);

    if (signal) {
      abortHandler = (): void => {
        clearTimeout(timeoutId);
        reject(new CancelledError("Operation cancelled", { cause: signal.reason }));
      };
      signal.addEventListener("abort", abortHandler, { once: true });
    }
  });
}

export interface WithTimeoutOptions {
  /**
   * Checked once before `fn` starts. Work already started is never aborted
   * by it; callers discard the result instead.
   */
  signal?: AbortSignal;
  /** Error to reject with when the timeout fires */
  onTimeout: () => Error;
}

/**
 * Runs `fn` with a signal that aborts after `timeoutMs`.
 *
 * @example
 * ```typescript
 * const response = await withTimeout(
 *   (signal) => adapter.send(request, { signal }),
 *   30_000,
 *   { signal: callerSignal, onTimeout: () => new AttemptTimeoutError(modelId, attempt, 30_000) }
 * );
 * ```
 *
 * @throws the `onTimeout` error when the timeout is exceeded
 * @throws CancelledError when `options.signal` fired before `fn` started
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  options: WithTimeoutOptions
): Promise<T> {
  const { signal: outer, onTimeout } = options;
  throwIfAborted(outer);

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const settle = (finish: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutId);
      finish();
    };

    const timeoutId = setTimeout(() => {
      const error = onTimeout();
      controller.abort(error);
      settle(() => reject(error));
    }, timeoutMs);

    fn(controller.signal).then(
      (value) => settle(() => resolve(value)),
      (error: unknown) => settle(() => reject(error))
    );
  });
}
