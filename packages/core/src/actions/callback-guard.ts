/**
 * CallbackGuard: runs user-supplied callbacks in isolation.
 *
 * A callback that throws is reported once through the logger (keyed by the
 * function itself) and then silenced; subsequent failures of the same
 * function are dropped. The guard never rethrows.
 */

import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";

export class CallbackGuard {
  private readonly logger: Logger;
  private readonly reported = new WeakSet<object>();

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Invoke `callback` with `args`.
   *
   * @param label - Where the callback came from, e.g. `"MoveUntil.onBoundaryEnter"`.
   * @returns `true` when the callback returned normally.
   */
  invoke<A extends readonly unknown[]>(
    label: string,
    callback: (...args: A) => unknown,
    ...args: A
  ): boolean {
    try {
      callback(...args);
      return true;
    } catch (error) {
      this.report(label, callback, error);
      return false;
    }
  }

  /**
   * Call a value-producing callback, returning `fallback` if it throws.
   * Used for conditions and velocity providers.
   */
  evaluate<R>(label: string, callback: () => R, fallback: R): R {
    try {
      return callback();
    } catch (error) {
      this.report(label, callback, error);
      return fallback;
    }
  }

  /** Whether a failure of `callback` has already been reported. */
  hasReported(callback: object): boolean {
    return this.reported.has(callback);
  }

  private report(label: string, callback: object, error: unknown): void {
    if (this.reported.has(callback)) {
      return;
    }
    this.reported.add(callback);
    const reason = error instanceof Error ? error.message : String(error);
    this.logger.warn(`${label} threw and will not be reported again: ${reason}`);
  }
}

/** Guard used by actions that run without a scheduler (e.g. driven by hand in tests). */
export const detachedCallbackGuard = new CallbackGuard(createConsoleLogger("Action"));
