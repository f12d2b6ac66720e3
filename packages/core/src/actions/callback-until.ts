/**
 * Timing actions with no effect on entity attributes.
 *
 * - {@link CallbackUntil} runs a callback every frame, or every N seconds of
 *   simulated time, until its condition holds.
 * - {@link DelayUntil} does nothing until its condition holds; useful as a
 *   spacer inside a Sequence.
 */

import { callbackIntervalSchema } from "@kinetica/schema";
import type { ActionOptions } from "./action.js";
import { Action } from "./action.js";
import { cloneCondition } from "./conditions.js";
import { parseOptions } from "./errors.js";
import type { ActionTarget } from "./target.js";

/** Receives the action's target (`null` for target-less actions). */
export type TargetCallback = (target: ActionTarget) => void;

export interface CallbackUntilOptions extends ActionOptions {
  /**
   * Seconds of simulated time between calls. Omitted means every frame.
   * The interval shrinks as the factor grows; a factor of 0 suspends calls.
   */
  readonly secondsBetweenCalls?: number;
}

/** Tolerance for accumulated floating-point time. */
const TIME_EPSILON = 1e-9;

export class CallbackUntil extends Action {
  readonly callback: TargetCallback;
  readonly secondsBetweenCalls: number | undefined;

  private elapsed = 0;
  private nextCallAt: number | null = null;
  private interval: number | undefined;

  constructor(callback: TargetCallback, options: CallbackUntilOptions = {}) {
    super(options);
    this.callback = callback;
    this.secondsBetweenCalls =
      options.secondsBetweenCalls === undefined
        ? undefined
        : parseOptions(callbackIntervalSchema, options.secondsBetweenCalls, "secondsBetweenCalls");
    this.interval = this.secondsBetweenCalls;
  }

  protected override applyEffect(): void {
    this.elapsed = 0;
    this.nextCallAt = null;
    this.applyInterval();
  }

  protected override updateEffect(dt: number): void {
    this.elapsed += dt;

    const interval = this.interval;
    if (interval === undefined) {
      this.invokeCallback("callback", this.callback, this.target);
      return;
    }
    if (!Number.isFinite(interval)) {
      return;
    }

    this.nextCallAt ??= interval;
    if (this.elapsed >= this.nextCallAt - TIME_EPSILON) {
      this.invokeCallback("callback", this.callback, this.target);
      this.nextCallAt += interval;
    }
  }

  override setFactor(factor: number): void {
    super.setFactor(factor);
    this.applyInterval();
    if (this.nextCallAt !== null && this.interval !== undefined && Number.isFinite(this.interval)) {
      this.nextCallAt = this.elapsed + this.interval;
    }
  }

  override reset(): void {
    super.reset();
    this.elapsed = 0;
    this.nextCallAt = null;
    this.applyInterval();
  }

  override clone(): CallbackUntil {
    return new CallbackUntil(this.callback, {
      condition: cloneCondition(this.condition),
      onStop: this.onStop,
      secondsBetweenCalls: this.secondsBetweenCalls,
    });
  }

  private applyInterval(): void {
    const base = this.secondsBetweenCalls;
    if (base === undefined) {
      this.interval = undefined;
    } else {
      this.interval = this.factor > 0 ? base / this.factor : Number.POSITIVE_INFINITY;
    }
  }
}

export class DelayUntil extends Action {
  override clone(): DelayUntil {
    return new DelayUntil({ condition: cloneCondition(this.condition), onStop: this.onStop });
  }
}
