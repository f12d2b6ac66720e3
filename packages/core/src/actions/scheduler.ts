/**
 * ActionScheduler: owns the active actions of one world and advances them.
 *
 * The host calls `updateAll(dt)` once per frame. Every action that was
 * active when the frame began is updated exactly once, in registration
 * order (wrappers first); actions applied during the frame are queued and
 * start after the sweep, so they see their first update on the next frame.
 */

import { schedulerConfigSchema } from "@kinetica/schema";
import type { SchedulerConfig, SchedulerConfigInput } from "@kinetica/schema";
import type { Action, ApplyOptions } from "./action.js";
import { CallbackGuard } from "./callback-guard.js";
import { findConflicts } from "./conflicts.js";
import { ConfigurationError, parseOptions } from "./errors.js";
import type { ActionEventKind, ActionInstrumentation } from "./instrumentation.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";
import type { ActionTarget } from "./target.js";

/** Options for creating an {@link ActionScheduler}. */
export interface ActionSchedulerOptions {
  /** Destination for diagnostics. Defaults to a console logger scoped `Scheduler`. */
  readonly logger?: Logger;
  /** Optional observer of lifecycle events, conditions and frames. */
  readonly instrumentation?: ActionInstrumentation;
  readonly config?: SchedulerConfigInput;
}

/**
 * The per-world action registry and frame driver.
 *
 * @example
 * ```ts
 * const scheduler = new ActionScheduler();
 * new MoveUntil([5, 0], { condition: afterFrames(60) }).apply(scheduler, player, { tag: "walk" });
 *
 * // each frame:
 * scheduler.updateAll(dt);
 * bodies.update();
 * ```
 */
export class ActionScheduler {
  readonly logger: Logger;
  readonly guard: CallbackGuard;
  readonly config: SchedulerConfig;

  private readonly instrumentation: ActionInstrumentation | undefined;
  private readonly active: Action[] = [];
  private readonly pending: Action[] = [];
  private frameCounter = 0;
  private updating = false;
  private stepping = false;
  private instrumentationFailed = false;
  private lastSummary = "";

  constructor(options: ActionSchedulerOptions = {}) {
    this.logger = options.logger ?? createConsoleLogger("Scheduler");
    this.guard = new CallbackGuard(this.logger);
    this.config = parseOptions(schedulerConfigSchema, options.config ?? {}, "scheduler config");
    this.instrumentation = options.instrumentation;
  }

  /** True while `updateAll` is sweeping. Registrations are queued meanwhile. */
  get isUpdating(): boolean {
    return this.updating;
  }

  /** True while `stepAll` is running. */
  get isStepping(): boolean {
    return this.stepping;
  }

  /** Number of active actions, excluding queued ones. */
  get activeCount(): number {
    return this.active.length;
  }

  /** Snapshot of the active actions in update order. */
  get activeActions(): readonly Action[] {
    return [...this.active];
  }

  /** Frames advanced so far. Frozen while the whole world is paused. */
  currentFrame(): number {
    return this.frameCounter;
  }

  // ---------------------------------------------------------------------------
  // Registration
  // ---------------------------------------------------------------------------

  /** Apply `action` to `target`; same as `action.apply(this, target, options)`. */
  apply<A extends Action>(action: A, target: ActionTarget, options: ApplyOptions = {}): A {
    return action.apply(this, target, options);
  }

  /**
   * Bind and admit an action. Called by {@link Action.apply}.
   * @internal
   */
  register(action: Action, target: ActionTarget, options: ApplyOptions): void {
    const { tag, replace = false } = options;
    action.bind(this, target, tag);

    if (replace && tag !== undefined && target !== null) {
      for (const existing of this.matching(target, tag, true)) {
        existing.stop();
      }
    }

    if (this.config.warnConflicts) {
      this.reportConflicts(action);
    }
    this.recordEvent("created", action);

    if (this.updating) {
      this.pending.push(action);
      return;
    }

    this.active.push(action);
    try {
      action.start();
    } catch (error) {
      this.detach(action);
      throw error;
    }
    this.logLifecycle("started", action);
  }

  /**
   * Remove an action from the active and pending lists without touching its
   * state. Called by {@link Action.stop}.
   * @internal
   */
  detach(action: Action): void {
    removeFrom(this.active, action);
    removeFrom(this.pending, action);
  }

  /**
   * Whether `action` was applied to this scheduler directly, as opposed to
   * being driven by a composite.
   * @internal
   */
  isRegistered(action: Action): boolean {
    return this.active.includes(action) || this.pending.includes(action);
  }

  /**
   * Whether every other active action is paused. An action starting in a
   * frozen world joins the pause.
   * @internal
   */
  isFrozenFor(action: Action): boolean {
    const others = this.active.filter((other) => other !== action);
    return others.length > 0 && others.every((other) => other.isPaused);
  }

  // ---------------------------------------------------------------------------
  // Frame
  // ---------------------------------------------------------------------------

  /**
   * Advance every active action by one frame.
   *
   * Exceptions thrown by an action are logged and the action is stopped.
   * A {@link ConfigurationError} is re-thrown once the frame has been fully
   * reconciled.
   *
   * @param dt - Seconds since the previous frame.
   */
  updateAll(dt: number): void {
    if (this.updating) {
      this.logger.warn("updateAll() called while a frame is in progress; ignoring nested call");
      return;
    }

    if (!this.isPaused()) {
      this.frameCounter++;
    }

    this.updating = true;
    let configurationError: ConfigurationError | undefined;
    try {
      for (const action of this.active) {
        if (action.done) {
          action.callbacksActive = false;
        }
      }

      const snapshot = [...this.active];
      const ordered = [
        ...snapshot.filter((action) => action.wrappedAction !== null),
        ...snapshot.filter((action) => action.wrappedAction === null),
      ];
      for (const action of ordered) {
        const error = this.runSafely(action, () => action.update(dt));
        configurationError ??= error;
      }

      const survivors = this.active.filter((action) => !action.done);
      for (const action of this.active) {
        if (action.done) {
          this.logLifecycle("stopped", action);
        }
      }
      this.active.splice(0, this.active.length, ...survivors);

      while (this.pending.length > 0) {
        const action = this.pending.shift();
        if (action === undefined || action.done) {
          continue;
        }
        this.active.push(action);
        const error = this.runSafely(action, () => action.start());
        configurationError ??= error;
        if (!action.done) {
          this.logLifecycle("started", action);
        }
      }
    } finally {
      this.updating = false;
    }

    this.instrument((instrumentation) =>
      instrumentation.onFrame?.({ frame: this.frameCounter, activeCount: this.active.length }),
    );
    this.logSummary();

    if (configurationError) {
      throw configurationError;
    }
  }

  // ---------------------------------------------------------------------------
  // Pause / step
  // ---------------------------------------------------------------------------

  pauseAll(): void {
    for (const action of this.active) {
      action.pause();
    }
  }

  resumeAll(): void {
    for (const action of this.active) {
      action.resume();
    }
  }

  /** True only when there are active actions and every one of them is paused. */
  isPaused(): boolean {
    return this.active.length > 0 && this.active.every((action) => action.isPaused);
  }

  /** Resume, advance exactly one frame, and pause again. */
  stepAll(dt: number): void {
    this.stepping = true;
    try {
      this.resumeAll();
      this.updateAll(dt);
      this.pauseAll();
    } finally {
      this.stepping = false;
    }
  }

  // ---------------------------------------------------------------------------
  // Queries and bulk stop
  // ---------------------------------------------------------------------------

  /** Active actions bound to `target`, optionally only those with `tag`. */
  getActionsForTarget(target: ActionTarget, tag?: string): Action[] {
    return this.matching(target, tag, false);
  }

  /** Stop every active action bound to `target` (and `tag`, if given). */
  stopActionsForTarget(target: ActionTarget, tag?: string): void {
    for (const action of this.matching(target, tag, false)) {
      action.stop();
    }
  }

  /** Stop every active and queued action. */
  stopAll(): void {
    for (const action of [...this.active, ...this.pending]) {
      action.stop();
    }
  }

  /** Stop everything and reset the frame counter. */
  clear(): void {
    this.stopAll();
    this.active.length = 0;
    this.pending.length = 0;
    this.frameCounter = 0;
    this.lastSummary = "";
  }

  // ---------------------------------------------------------------------------
  // Diagnostics
  // ---------------------------------------------------------------------------

  /** @internal */
  recordEvent(kind: ActionEventKind, action: Action): void {
    this.instrument((instrumentation) =>
      instrumentation.onEvent?.({
        kind,
        action,
        frame: this.frameCounter,
        tag: action.tag,
        target: action.targetAdapter.describe(),
      }),
    );
  }

  /** @internal */
  recordCondition(action: Action, result: unknown): void {
    this.instrument((instrumentation) =>
      instrumentation.onConditionEvaluated?.({
        action,
        frame: this.frameCounter,
        result,
        satisfied: Boolean(result),
      }),
    );
  }

  private matching(target: ActionTarget, tag: string | undefined, includePending: boolean): Action[] {
    const pool = includePending ? [...this.active, ...this.pending] : this.active;
    return pool.filter(
      (action) => action.target === target && (tag === undefined || action.tag === tag),
    );
  }

  /** Run one action step, returning a configuration error instead of throwing it. */
  private runSafely(action: Action, step: () => void): ConfigurationError | undefined {
    try {
      step();
      return undefined;
    } catch (error) {
      if (error instanceof ConfigurationError) {
        this.logger.error(`${action.describe()} is misconfigured; stopping it`, error);
      } else {
        this.logger.error(`${action.describe()} threw during frame ${this.frameCounter}; stopping it`, error);
      }
      this.instrument((instrumentation) =>
        instrumentation.onError?.({ action, frame: this.frameCounter, error }),
      );
      if (!action.done) {
        action.stop();
      }
      this.detach(action);
      return error instanceof ConfigurationError ? error : undefined;
    }
  }

  private reportConflicts(action: Action): void {
    for (const report of findConflicts(action, [...this.active, ...this.pending])) {
      this.logger.warn(`Conflict: ${report.message}`);
      this.instrument((instrumentation) => instrumentation.onConflict?.(report));
    }
  }

  private instrument(call: (instrumentation: ActionInstrumentation) => void): void {
    const instrumentation = this.instrumentation;
    if (instrumentation === undefined) {
      return;
    }
    try {
      call(instrumentation);
    } catch (error) {
      if (!this.instrumentationFailed) {
        this.instrumentationFailed = true;
        const reason = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Instrumentation hook threw and will not be reported again: ${reason}`);
      }
    }
  }

  private logLifecycle(what: "started" | "stopped", action: Action): void {
    if (this.config.debugLevel >= 2) {
      this.logger.debug(`${what} ${action.describe()} on ${action.targetAdapter.describe()}`);
    }
  }

  /** At debug level 1+, log per-type counts whenever they change. */
  private logSummary(): void {
    if (this.config.debugLevel < 1) {
      return;
    }
    const counts = new Map<string, number>();
    for (const action of this.active) {
      const name = action.constructor.name;
      counts.set(name, (counts.get(name) ?? 0) + 1);
    }
    const parts = [...counts.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([name, count]) => `${name}: ${count}`);
    const summary = `Active actions: ${this.active.length} (${parts.join(", ")})`;
    if (summary !== this.lastSummary) {
      this.lastSummary = summary;
      this.logger.debug(summary);
    }
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function removeFrom(list: Action[], action: Action): void {
  const index = list.indexOf(action);
  if (index !== -1) {
    list.splice(index, 1);
  }
}
