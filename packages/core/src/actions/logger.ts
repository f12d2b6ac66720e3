/**
 * Logging seam for the action runtime.
 *
 * The runtime never writes to the console directly; it goes through a
 * Logger so hosts can route diagnostics elsewhere and tests can assert on
 * them with plain mocks.
 */

/** Minimal logger used by the scheduler and the callback guard. */
export interface Logger {
  debug(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

/**
 * Console-backed logger. Every line is prefixed with `[scope]`.
 *
 * @example
 * ```ts
 * const logger = createConsoleLogger("Scheduler");
 * logger.warn("conflict on Body"); // console.warn("[Scheduler] conflict on Body")
 * ```
 */
export function createConsoleLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (message) => console.debug(`${prefix} ${message}`),
    warn: (message) => console.warn(`${prefix} ${message}`),
    error: (message, error) => {
      if (error === undefined) {
        console.error(`${prefix} ${message}`);
      } else {
        console.error(`${prefix} ${message}`, error);
      }
    },
  };
}
