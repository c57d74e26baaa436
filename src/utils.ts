/**
 * Shared utility functions used across the deckhand codebase.
 *
 * @module utils
 */

/**
 * Type guard to check if a value is a non-null object (Record).
 *
 * @param v - Value to check
 * @returns true if v is a non-null, non-array object
 */
export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/**
 * Type guard to check if a value is a non-empty string.
 *
 * @param v - Value to check
 * @returns true if v is a string with length > 0 after trimming
 */
export function isNonEmptyString(v: unknown): v is string {
  return typeof v === "string" && v.trim().length > 0;
}

/**
 * Render an unknown thrown value as a short message.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ============================================================================
// Concurrency Utilities
// ============================================================================

/**
 * Raised by {@link withTimeout} when the wrapped operation does not settle in time.
 *
 * A timeout is an expected outcome for device enumeration, so callers usually
 * check for this class and treat it as "no new information".
 */
export class TimeoutError extends Error {
  public readonly timeoutMs: number;

  public constructor(message: string, timeoutMs: number) {
    super(message);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Race a promise against a timer.
 *
 * The underlying operation is not cancelled when the timer wins; its eventual
 * result is simply ignored. When `timeoutMs` is undefined the promise is
 * returned unbounded.
 *
 * @param promise - Operation to bound
 * @param timeoutMs - Budget in milliseconds
 * @param label - Included in the TimeoutError message
 * @throws TimeoutError when the budget is exceeded
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number | undefined,
  label: string
): Promise<T> {
  if (timeoutMs === undefined) {
    return promise;
  }

  let timer: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      promise,
      new Promise<never>((_, reject) => {
        timer = setTimeout(
          () => reject(new TimeoutError(`${label} timed out after ${timeoutMs}ms`, timeoutMs)),
          timeoutMs
        );
      }),
    ]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * A promise together with the functions that settle it.
 */
export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  /** True once `resolve` has been called. */
  readonly settled: boolean;
}

/**
 * Create a {@link Deferred}. Only the first `resolve` call takes effect.
 */
export function createDeferred<T>(): Deferred<T> {
  let settled = false;
  let resolveFn!: (value: T) => void;
  const promise = new Promise<T>((resolve) => {
    resolveFn = resolve;
  });
  return {
    promise,
    resolve: (value: T) => {
      if (settled) return;
      settled = true;
      resolveFn(value);
    },
    get settled() {
      return settled;
    },
  };
}

/**
 * A keyed lock for serializing async operations.
 *
 * Operations on the same key are serialized (run one at a time).
 * Operations on different keys run concurrently.
 *
 * Each caller chains onto the current promise synchronously (before any await),
 * so no two callers can enter the critical section simultaneously and waiters
 * run in FIFO order.
 *
 * @example
 * ```typescript
 * const lock = new KeyedLock();
 *
 * // These run serially (same key):
 * await lock.withLock("populate", async () => { ... });
 * await lock.withLock("populate", async () => { ... });
 * ```
 */
export class KeyedLock {
  private readonly locks = new Map<string, Promise<void>>();

  /**
   * Execute an async function while holding the lock for the given key.
   *
   * @param key - The key to lock on
   * @param fn - The async function to execute
   * @returns The result of the function
   * @throws Re-throws any error from the function after releasing the lock
   */
  public async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    // Capture predecessor BEFORE registering (synchronous - no race window)
    const predecessor = this.locks.get(key) ?? Promise.resolve();

    let release!: () => void;
    const ourLock = new Promise<void>((resolve) => {
      release = resolve;
    });

    // Register synchronously before any await.
    this.locks.set(key, ourLock);

    try {
      await predecessor;
      return await fn();
    } finally {
      release();
      // Only cleanup if we're still the tail (no one chained after us)
      if (this.locks.get(key) === ourLock) {
        this.locks.delete(key);
      }
    }
  }
}
