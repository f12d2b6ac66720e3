/**
 * Error types raised by the action runtime.
 *
 * Only configuration mistakes are thrown. Failures inside user callbacks
 * and velocity providers are logged and absorbed so that one faulty action
 * never stalls the rest of the world.
 */

import type { z, ZodTypeAny } from "zod";

/**
 * Invalid action or scheduler configuration.
 *
 * Raised synchronously from constructors and `apply()`, or re-thrown by
 * `updateAll()` when a composite binds a misconfigured child mid-tick.
 */
export class ConfigurationError extends Error {
  /** Individual problems, one per failed check. */
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [message]) {
    super(message);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

/**
 * Parse `value` with a zod schema, converting a failure into a
 * {@link ConfigurationError} whose issues carry the offending paths.
 *
 * @param label - Human-readable name of what is being parsed, used in the message.
 */
export function parseOptions<S extends ZodTypeAny>(
  schema: S,
  value: unknown,
  label: string,
): z.output<S> {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }
  const issues = result.error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
  throw new ConfigurationError(`Invalid ${label}: ${issues.join("; ")}`, issues);
}
