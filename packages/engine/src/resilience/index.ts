/**
 * Bounded external calls: independent timeout, at most one retry with
 * backoff, and cancellation through an AbortSignal.
 */

import {
  InvalidInputError,
  NotFoundError,
  RetrievalCancelledError,
  TimeoutError,
} from "../errors/index.js";

export interface ExternalCallOptions {
  /** Dependency name used in logs and timeout errors ("index", "graph", ...) */
  dependency: string;
  timeoutMs: number;
  /** Delay before the single retry (0 disables the delay, not the retry) */
  retryBackoffMs: number;
  /** Cancels the call and any pending retry */
  signal?: AbortSignal;
  /** Hash of the query being served, for log correlation */
  queryHash?: string;
  /** Errors for which this returns false are surfaced without a retry */
  isRetryable?: (err: unknown) => boolean;
}

/** Maximum attempts per external call: the first try plus one retry */
export const MAX_ATTEMPTS = 2;

/** Caller mistakes and cancellations are never worth a second attempt */
export function isTransientFailure(err: unknown): boolean {
  return !(
    err instanceof InvalidInputError ||
    err instanceof NotFoundError ||
    err instanceof RetrievalCancelledError
  );
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new RetrievalCancelledError();
}

/** Resolve after `ms`, rejecting early with RetrievalCancelledError on abort. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RetrievalCancelledError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new RetrievalCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Run one attempt under a timeout. The attempt gets its own AbortSignal,
 * which fires on timeout or when the outer signal aborts.
 */
export function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  dependency: string,
  timeoutMs: number,
  outer?: AbortSignal,
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const finish = (settle: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      outer?.removeEventListener("abort", onAbort);
      settle();
    };

    const onAbort = (): void => {
      controller.abort();
      finish(() => reject(new RetrievalCancelledError()));
    };

    const timer = setTimeout(() => {
      controller.abort();
      finish(() => reject(new TimeoutError(dependency, timeoutMs)));
    }, timeoutMs);

    if (outer?.aborted) {
      onAbort();
      return;
    }
    outer?.addEventListener("abort", onAbort, { once: true });

    fn(controller.signal).then(
      (value) => finish(() => resolve(value)),
      (err: unknown) => finish(() => reject(err)),
    );
  });
}

/**
 * Call an external dependency with a timeout and at most one retry.
 *
 * Failures are logged with the dependency, attempt, elapsed time and
 * query hash. Cancellation is never retried and never logged as a failure.
 */
export async function callExternal<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  options: ExternalCallOptions,
): Promise<T> {
  const isRetryable = options.isRetryable ?? isTransientFailure;
  const hash = options.queryHash ?? "-";

  for (let attempt = 1; ; attempt++) {
    throwIfAborted(options.signal);
    const start = Date.now();
    try {
      return await withTimeout(fn, options.dependency, options.timeoutMs, options.signal);
    } catch (err) {
      if (err instanceof RetrievalCancelledError) throw err;

      const elapsed = Date.now() - start;
      const message = err instanceof Error ? err.message : String(err);
      const willRetry = attempt < MAX_ATTEMPTS && isRetryable(err);
      console.warn(
        `[${options.dependency}] attempt ${attempt}/${MAX_ATTEMPTS} failed after ${elapsed}ms ` +
          `(query ${hash}): ${message}` +
          (willRetry ? ` - retrying in ${options.retryBackoffMs}ms` : ""),
      );
      if (!willRetry) throw err;
      if (options.retryBackoffMs > 0) {
        await sleep(options.retryBackoffMs, options.signal);
      }
    }
  }
}
