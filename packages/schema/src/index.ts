/**
 * @kinetica/schema: validation schemas and types shared by Kinetica packages.
 *
 * Schemas are the source of truth; TypeScript types are inferred from them.
 */

export {
  velocitySchema,
  boundsSchema,
  boundaryBehaviorSchema,
  frameCountSchema,
  callbackIntervalSchema,
  angularVelocitySchema,
  easingNameSchema,
  moveOptionsSchema,
  easeOptionsSchema,
} from "./action-options.js";

export type {
  Velocity,
  Bounds,
  BoundaryBehavior,
  MoveOptionsInput,
  EasingName,
} from "./action-options.js";

export {
  debugLevelSchema,
  schedulerConfigSchema,
  schedulerConfigFromEnv,
  WARN_CONFLICTS_ENV,
  DEBUG_LEVEL_ENV,
} from "./scheduler-config.js";

export type {
  DebugLevel,
  SchedulerConfig,
  SchedulerConfigInput,
} from "./scheduler-config.js";
