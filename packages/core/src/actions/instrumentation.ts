/**
 * Instrumentation hooks for observing the action runtime.
 *
 * Every member is optional and every call is fire-and-forget: a hook that
 * throws is reported once and otherwise ignored. Nothing in the runtime
 * depends on an instrumentation being present.
 */

import type { Action } from "./action.js";
import type { ConflictReport } from "./conflicts.js";

/** Lifecycle transitions reported for every action, children included. */
export type ActionEventKind = "created" | "started" | "completed" | "stopped";

export interface ActionEvent {
  readonly kind: ActionEventKind;
  readonly action: Action;
  readonly frame: number;
  readonly tag: string | undefined;
  /** Description of the target at the time of the event. */
  readonly target: string;
}

export interface ConditionEvaluation {
  readonly action: Action;
  readonly frame: number;
  readonly result: unknown;
  readonly satisfied: boolean;
}

export interface FrameRecord {
  readonly frame: number;
  readonly activeCount: number;
}

export interface ActionErrorRecord {
  readonly action: Action;
  readonly frame: number;
  readonly error: unknown;
}

/** Observer attached to an ActionScheduler. */
export interface ActionInstrumentation {
  onEvent?(event: ActionEvent): void;
  onConditionEvaluated?(evaluation: ConditionEvaluation): void;
  onFrame?(record: FrameRecord): void;
  onConflict?(report: ConflictReport): void;
  onError?(record: ActionErrorRecord): void;
}
