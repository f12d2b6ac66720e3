/**
 * @kinetica/core actions module: public API exports.
 */

// Lifecycle
export { Action } from "./action.js";
export type { ActionOptions, ApplyOptions, Condition, StopCallback } from "./action.js";
export { ActionScheduler } from "./scheduler.js";
export type { ActionSchedulerOptions } from "./scheduler.js";
export { CallbackGuard } from "./callback-guard.js";

// Targets and entities
export type { ActionTarget, TargetAdapter } from "./target.js";
export { adaptTarget, isIterable } from "./target.js";
export type { Axis, Side, Movable, Rotatable } from "./entity.js";
export { isMovable, isRotatable } from "./entity.js";
export { Body, BodyGroup } from "./body.js";
export type { BodyInit } from "./body.js";

// Movement
export { MoveUntil, MoveXUntil, MoveYUntil } from "./move-until.js";
export type { MoveUntilOptions, VelocityProvider, BoundaryCallback } from "./move-until.js";
export { RotateUntil } from "./rotate-until.js";
export {
  BoundaryStateMachine,
  reactiveSide,
  predictedSide,
  effectiveSide,
} from "./boundary.js";
export type { AxisState, BoundaryHooks, BoundaryStateMachineOptions } from "./boundary.js";

// Composition
export { Sequence, Parallel, Repeat, sequence, parallel, repeat } from "./composite.js";

// Timing
export { CallbackUntil, DelayUntil } from "./callback-until.js";
export type { CallbackUntilOptions, TargetCallback } from "./callback-until.js";
export { Ease } from "./ease.js";
export type { EaseOptions } from "./ease.js";
export type { EasingFn, EasingName } from "./easing.js";
export {
  linear,
  easeIn,
  easeOut,
  easeInOut,
  arc,
  getEasing,
  resolveEasing,
  EASING_FUNCTIONS,
} from "./easing.js";
export {
  afterFrames,
  withinFrames,
  everyFrames,
  infinite,
  framesToSeconds,
  secondsToFrames,
  cloneCondition,
  isFrameCondition,
  FRAMES_PER_SECOND,
} from "./conditions.js";
export type { FrameCondition, FrameWindow } from "./conditions.js";

// Diagnostics
export { Attribute, POSITION, VELOCITY, describeAttributes, findConflicts } from "./conflicts.js";
export type { AttributeSet, ConflictReport } from "./conflicts.js";
export type {
  ActionInstrumentation,
  ActionEvent,
  ActionEventKind,
  ConditionEvaluation,
  FrameRecord,
  ActionErrorRecord,
} from "./instrumentation.js";
export { ConfigurationError, parseOptions } from "./errors.js";
export type { Logger } from "./logger.js";
export { createConsoleLogger } from "./logger.js";

// Frame loop
export type { Clock, CancelHandle } from "./clock.js";
export { BrowserClock } from "./browser-clock.js";
export { FrameLoop } from "./frame-loop.js";
export type { FrameLoopOptions } from "./frame-loop.js";

// Test utilities
export { TestClock } from "./test-clock.js";
export { RecordingInstrumentation } from "./recording-instrumentation.js";
