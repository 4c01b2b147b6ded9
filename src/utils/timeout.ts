import { TimeoutError } from '../core/errors.js';

export interface TimeoutOptions {
  /** Aborted when the deadline passes so the underlying work can stop early. */
  controller?: AbortController;
  /** Builds the rejection raised on timeout. Defaults to {@link TimeoutError}. */
  onTimeout?: () => Error;
}

/**
 * Race `operation` against a deadline. The timer is always cleared once the race settles.
 * A non-positive `timeoutMs` disables the deadline.
 */
export async function withTimeout<T>(
  operation: Promise<T>,
  timeoutMs: number,
  label: string,
  options: TimeoutOptions = {},
): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return operation;
  }

  let timeoutHandle: NodeJS.Timeout | null = null;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      // Settle the race before aborting, so work that rejects on abort cannot win it.
      reject(options.onTimeout ? options.onTimeout() : new TimeoutError(label, timeoutMs));
      options.controller?.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation, timeoutPromise]);
  } finally {
    if (timeoutHandle) {
      clearTimeout(timeoutHandle);
    }
  }
}

/** Resolve after `ms`, or reject early with the signal's reason when it aborts. */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const handle = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(handle);
      reject(signal?.reason);
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
