/**
 * Async Utility Functions
 *
 * Deferred promises, a FIFO mutex, and abort-signal helpers.
 *
 * @module
 */

// =============================================================================
// Deferred Promise
// =============================================================================

/**
 * A Promise with externally accessible resolve/reject methods.
 * Used by the mutation queue to hand each caller its own outcome.
 */
export class Deferred<T> {
  readonly promise: Promise<T>;
  resolve!: (value: T | PromiseLike<T>) => void;
  reject!: (reason?: unknown) => void;

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolve = resolve;
      this.reject = reject;
    });
  }
}

// =============================================================================
// Mutex
// =============================================================================

/**
 * A simple async mutex for serializing access to a shared resource.
 * Waiters are served in FIFO order.
 */
export class Mutex {
  private locked = false;
  private waiters: Array<() => void> = [];

  /** Acquires the mutex, waiting if it's currently held. */
  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** Releases the mutex, handing it straight to the next waiter if any. */
  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }

  /** Runs a function while holding the mutex, releasing on completion. */
  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

// =============================================================================
// Scheduling
// =============================================================================

/**
 * Runs `fn` on a later macrotask so it never delays the caller.
 * Errors are passed to `onError` rather than thrown into the event loop.
 */
export function runDetached(fn: () => void, onError: (error: unknown) => void): void {
  setImmediate(() => {
    try {
      fn();
    } catch (error) {
      onError(error);
    }
  });
}

/**
 * Resolves on the next macrotask, after everything already queued.
 */
export function nextTick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
