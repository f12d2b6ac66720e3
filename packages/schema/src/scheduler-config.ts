/**
 * Scheduler configuration: schema, defaults and environment overrides.
 */

import { z } from "zod";

/**
 * Diagnostic verbosity.
 * 0 = warnings only, 1 = active-action summaries, 2 = every start and stop.
 */
export const debugLevelSchema = z.union([z.literal(0), z.literal(1), z.literal(2)]);

export const schedulerConfigSchema = z.object({
  /** Report overlapping attribute writes on the same target. */
  warnConflicts: z.boolean().default(false),
  debugLevel: debugLevelSchema.default(0),
});

export type DebugLevel = z.infer<typeof debugLevelSchema>;

/** Fully-resolved scheduler configuration. */
export type SchedulerConfig = z.output<typeof schedulerConfigSchema>;

/** Partial configuration as accepted from callers. */
export type SchedulerConfigInput = z.input<typeof schedulerConfigSchema>;

/** Environment variable enabling conflict warnings (`1` or `true`). */
export const WARN_CONFLICTS_ENV = "KINETICA_WARN_CONFLICTS";

/** Environment variable selecting the debug level (`0`, `1` or `2`). */
export const DEBUG_LEVEL_ENV = "KINETICA_DEBUG_LEVEL";

const TRUTHY = new Set(["1", "true", "yes", "on"]);

/**
 * Build scheduler configuration from environment variables.
 *
 * Values given in `overrides` win over the environment. Unset or empty
 * variables fall back to the schema defaults; an unparseable debug level
 * is rejected by the schema.
 *
 * @example
 * ```ts
 * const config = schedulerConfigFromEnv(process.env, { debugLevel: 1 });
 * ```
 */
export function schedulerConfigFromEnv(
  env: Readonly<Record<string, string | undefined>>,
  overrides: SchedulerConfigInput = {},
): SchedulerConfig {
  const fromEnv: Record<string, unknown> = {};

  const warn = env[WARN_CONFLICTS_ENV]?.trim().toLowerCase();
  if (warn) {
    fromEnv["warnConflicts"] = TRUTHY.has(warn);
  }

  const level = env[DEBUG_LEVEL_ENV]?.trim();
  if (level) {
    fromEnv["debugLevel"] = Number(level);
  }

  return schedulerConfigSchema.parse({ ...fromEnv, ...overrides });
}
