/**
 * RecordingInstrumentation: captures runtime observations for test assertions.
 */

import type { ConflictReport } from "./conflicts.js";
import type {
  ActionErrorRecord,
  ActionEvent,
  ActionInstrumentation,
  ConditionEvaluation,
  FrameRecord,
} from "./instrumentation.js";

/**
 * An instrumentation that stores everything it observes in typed arrays.
 *
 * @example
 * ```ts
 * const recorder = new RecordingInstrumentation();
 * const scheduler = new ActionScheduler({ instrumentation: recorder });
 * new DelayUntil(afterFrames(2)).apply(scheduler, null);
 * scheduler.updateAll(1 / 60);
 * scheduler.updateAll(1 / 60);
 *
 * expect(recorder.eventKinds()).toEqual(["created", "started", "completed"]);
 * ```
 */
export class RecordingInstrumentation implements ActionInstrumentation {
  readonly events: ActionEvent[] = [];
  readonly conditions: ConditionEvaluation[] = [];
  readonly frames: FrameRecord[] = [];
  readonly conflicts: ConflictReport[] = [];
  readonly errors: ActionErrorRecord[] = [];

  onEvent(event: ActionEvent): void {
    this.events.push(event);
  }

  onConditionEvaluated(evaluation: ConditionEvaluation): void {
    this.conditions.push(evaluation);
  }

  onFrame(record: FrameRecord): void {
    this.frames.push(record);
  }

  onConflict(report: ConflictReport): void {
    this.conflicts.push(report);
  }

  onError(record: ActionErrorRecord): void {
    this.errors.push(record);
  }

  /** Event kinds in emission order, optionally for one action only. */
  eventKinds(action?: object): string[] {
    return this.events
      .filter((event) => action === undefined || event.action === action)
      .map((event) => event.kind);
  }

  /** Clear all recorded observations. */
  clear(): void {
    this.events.length = 0;
    this.conditions.length = 0;
    this.frames.length = 0;
    this.conflicts.length = 0;
    this.errors.length = 0;
  }
}
