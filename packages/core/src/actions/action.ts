/**
 * Action: the lifecycle unit of the runtime.
 *
 * An action does something to its target every frame until its condition
 * is satisfied or it is stopped. Concrete actions implement three hooks:
 *
 * - `applyEffect()` once, when the action starts (or first resumes, if it
 *   started while the world was paused)
 * - `updateEffect(dt)` every unpaused frame
 * - `removeEffect()` once, when the action completes or is stopped
 *
 * The base class owns the state machine around those hooks: activation,
 * pausing, condition evaluation, the stop callback and scheduler bookkeeping.
 */

import type { Velocity } from "@kinetica/schema";
import type { CallbackGuard } from "./callback-guard.js";
import { detachedCallbackGuard } from "./callback-guard.js";
import { cloneCondition } from "./conditions.js";
import type { AttributeSet } from "./conflicts.js";
import { Attribute } from "./conflicts.js";
import type { ActionEventKind } from "./instrumentation.js";
import type { ActionScheduler } from "./scheduler.js";
import type { ActionTarget, TargetAdapter } from "./target.js";
import { adaptTarget } from "./target.js";

/**
 * Stop condition, evaluated once per unpaused frame after `updateEffect`.
 * Any truthy result satisfies it; the result is handed to the stop callback.
 */
export type Condition = () => unknown;

/**
 * Called once when the condition is satisfied. Receives the condition's
 * result, or nothing when the condition returned exactly `true`.
 */
export type StopCallback = (data?: unknown) => void;

/** Options shared by every action constructor. */
export interface ActionOptions {
  readonly condition?: Condition | null;
  readonly onStop?: StopCallback;
}

/** Options for {@link Action.apply}. */
export interface ApplyOptions {
  /** Target-scoped label used for lookup and replacement. */
  readonly tag?: string;
  /** Stop every running action with the same target and tag first. */
  readonly replace?: boolean;
}

export abstract class Action {
  /** Entity attributes this action writes. */
  readonly conflicts: AttributeSet = Attribute.None;

  condition: Condition | null;
  onStop: StopCallback | undefined;
  tag: string | undefined = undefined;
  target: ActionTarget = null;

  /** True once the action has completed or been stopped. Never reset by the scheduler. */
  done = false;
  /** Cleared on stop so that no callback fires after cancellation. */
  callbacksActive = true;
  conditionMet = false;
  conditionData: unknown = undefined;

  protected scheduler: ActionScheduler | null = null;
  private adapter: TargetAdapter = adaptTarget(null);
  private active = false;
  private paused = false;
  private effectDeferred = false;
  private speedFactor = 1;

  constructor(options: ActionOptions = {}) {
    this.condition = options.condition ?? null;
    this.onStop = options.onStop;
  }

  get isActive(): boolean {
    return this.active;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  /** Speed multiplier; 1 is normal speed, 0 is stopped. */
  get factor(): number {
    return this.speedFactor;
  }

  /** The resolved target. */
  get targetAdapter(): TargetAdapter {
    return this.adapter;
  }

  /**
   * The action this one drives, if it is a wrapper. Wrappers are updated
   * before everything else in a frame.
   */
  get wrappedAction(): Action | null {
    return null;
  }

  // ---------------------------------------------------------------------------
  // Registration
  // ---------------------------------------------------------------------------

  /**
   * Register this action with a scheduler against a target.
   *
   * Starts it immediately, or on the next drain if the scheduler is in the
   * middle of a frame. Throws {@link ConfigurationError} if the target is
   * unsuitable.
   */
  apply(scheduler: ActionScheduler, target: ActionTarget, options: ApplyOptions = {}): this {
    scheduler.register(this, target, options);
    return this;
  }

  /**
   * Attach the action to a scheduler and a target without starting it.
   * Called by the scheduler on registration and by composites for their
   * children.
   */
  bind(scheduler: ActionScheduler | null, target: ActionTarget, tag?: string): void {
    const adapter = adaptTarget(target);
    this.validateTarget(adapter);
    this.scheduler = scheduler;
    this.target = target;
    this.adapter = adapter;
    this.tag = tag;
  }

  /** Reject unsuitable targets. Throws {@link ConfigurationError}. */
  protected validateTarget(_adapter: TargetAdapter): void {
    // Any target is acceptable by default.
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Activate the action. If every other action in the scheduler is paused,
   * the action joins the pause and its effect waits for `resume()`.
   */
  start(): void {
    this.active = true;
    if (this.scheduler?.isFrozenFor(this)) {
      this.paused = true;
      this.effectDeferred = true;
      this.emit("started");
      return;
    }
    this.emit("started");
    this.applyEffect();
  }

  /** Advance one frame. No-op unless active, unpaused and not done. */
  update(dt: number): void {
    if (!this.active || this.done || this.paused) {
      return;
    }

    this.updateEffect(dt);
    if (this.done || this.conditionMet || this.condition === null) {
      return;
    }

    const condition = this.condition;
    const result = this.guard.evaluate(`${this.constructor.name}.condition`, condition, false);
    this.scheduler?.recordCondition(this, result);
    if (result) {
      this.complete(result);
    }
  }

  /**
   * Forced termination. Idempotent; no callback fires once this is called.
   * An action that already completed is only detached.
   */
  stop(): void {
    this.callbacksActive = false;
    const wasDone = this.done;
    this.done = true;
    this.active = false;
    this.scheduler?.detach(this);
    if (!wasDone) {
      this.emit("stopped");
      this.removeEffect();
    }
  }

  pause(): void {
    this.paused = true;
  }

  resume(): void {
    this.paused = false;
    if (this.effectDeferred && this.active && !this.done) {
      this.effectDeferred = false;
      this.applyEffect();
    }
  }

  setFactor(factor: number): void {
    this.speedFactor = factor;
  }

  /** Replace the velocity of velocity-driven actions. Ignored by others. */
  setCurrentVelocity(_velocity: Velocity): void {
    // Only movement actions carry a velocity.
  }

  /**
   * Return the action to its constructed state so it can be applied again.
   * Frame-counting conditions restart from zero.
   */
  reset(): void {
    this.done = false;
    this.active = false;
    this.paused = false;
    this.effectDeferred = false;
    this.callbacksActive = true;
    this.conditionMet = false;
    this.conditionData = undefined;
    this.speedFactor = 1;
    this.condition = cloneCondition(this.condition);
  }

  /** A fresh, unapplied copy with independent state. */
  abstract clone(): Action;

  /** Short label for logs, e.g. `MoveUntil(tag=player)`. */
  describe(): string {
    return this.tag === undefined
      ? this.constructor.name
      : `${this.constructor.name}(tag=${this.tag})`;
  }

  // ---------------------------------------------------------------------------
  // Hooks
  // ---------------------------------------------------------------------------

  protected applyEffect(): void {
    // Overridden by actions with a start-time effect.
  }

  protected updateEffect(_dt: number): void {
    // Overridden by actions with a per-frame effect.
  }

  protected removeEffect(): void {
    // Overridden by actions that must undo their effect.
  }

  // ---------------------------------------------------------------------------
  // Helpers for subclasses
  // ---------------------------------------------------------------------------

  /**
   * Finish the action as if its condition had been satisfied with `result`.
   */
  protected complete(result: unknown = true): void {
    this.conditionMet = true;
    this.conditionData = result;
    this.removeEffect();
    this.done = true;
    this.active = false;
    this.emit("completed");

    const onStop = this.onStop;
    if (onStop === undefined) {
      return;
    }
    if (result === true) {
      this.invokeCallback("onStop", onStop);
    } else {
      this.invokeCallback("onStop", onStop, result);
    }
  }

  /** Run a user callback through the guard, unless callbacks were deactivated. */
  protected invokeCallback<A extends readonly unknown[]>(
    name: string,
    callback: ((...args: A) => unknown) | undefined,
    ...args: A
  ): void {
    if (!this.callbacksActive || callback === undefined) {
      return;
    }
    this.guard.invoke(`${this.constructor.name}.${name}`, callback, ...args);
  }

  protected get guard(): CallbackGuard {
    return this.scheduler?.guard ?? detachedCallbackGuard;
  }

  /** Iterate the target's current members. */
  protected entities(): Iterable<unknown> {
    return this.adapter.entities();
  }

  private emit(kind: ActionEventKind): void {
    this.scheduler?.recordEvent(kind, this);
  }
}
