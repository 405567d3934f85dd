/**
 * @fileoverview Async Utilities
 *
 * Bounded waits for calls into collaborators the ranker does not own.
 *
 * @packageDocumentation
 */

/**
 * Options for withTimeout function.
 */
export interface WithTimeoutOptions {
  /** Context string for error messages */
  context?: string;
}

/**
 * Error thrown when a promise times out.
 */
export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, context?: string) {
    const message = context
      ? `Timeout after ${timeoutMs}ms: ${context}`
      : `Operation timed out after ${timeoutMs}ms`;
    super(message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Wrap a promise with a timeout.
 *
 * @param timeoutMs - Timeout in milliseconds (if <= 0 or undefined, returns promise as-is)
 * @throws TimeoutError if the promise does not settle within timeoutMs
 *
 * @example
 * ```typescript
 * const vector = await withTimeout(index.embed(text), 5000, { context: 'embedding query' });
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs?: number,
  options?: WithTimeoutOptions
): Promise<T> {
  if (!timeoutMs || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }

  let timeoutId: ReturnType<typeof setTimeout> | null = null;

  try {
    return await Promise.race([
      promise,
      new Promise<T>((_, reject) => {
        timeoutId = setTimeout(() => {
          reject(new TimeoutError(timeoutMs, options?.context));
        }, timeoutMs);
      }),
    ]);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }
}

export interface Deadline {
  /** Resolves once the deadline passes; never settles for a non-positive budget */
  readonly expired: Promise<void>;
  cancel(): void;
}

/**
 * Start a wall-clock deadline. Call `cancel` once the guarded work settles so
 * the timer does not keep the process alive.
 *
 * @example
 * ```typescript
 * const deadline = startDeadline(200);
 * try {
 *   await Promise.race([pool, deadline.expired]);
 * } finally {
 *   deadline.cancel();
 * }
 * ```
 */
export function startDeadline(timeoutMs: number): Deadline {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return { expired: new Promise<void>(() => undefined), cancel: () => undefined };
  }

  let timeoutId: ReturnType<typeof setTimeout> | null = null;
  const expired = new Promise<void>((resolve) => {
    timeoutId = setTimeout(resolve, timeoutMs);
  });
  return {
    expired,
    cancel: () => {
      if (timeoutId) clearTimeout(timeoutId);
    },
  };
}

/**
 * Run `worker` over `items` with at most `concurrency` calls in flight.
 * Workers pull the next index from a shared cursor; `shouldContinue` is
 * consulted before each item is taken, so one check gates every worker.
 * Results are written by index, keeping output order independent of
 * completion order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  shouldContinue: () => boolean = () => true
): Promise<Array<R | undefined>> {
  const results: Array<R | undefined> = new Array<R | undefined>(items.length).fill(undefined);
  let cursor = 0;

  const runWorker = async (): Promise<void> => {
    while (cursor < items.length) {
      if (!shouldContinue()) return;
      const index = cursor++;
      results[index] = await worker(items[index], index);
    }
  };

  const lanes = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: lanes }, () => runWorker()));
  return results;
}
