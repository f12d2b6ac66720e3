/**
 * Ease: ramps another action's factor along an easing curve.
 *
 * Applied directly, the Ease registers the wrapped action with the same
 * scheduler and target. Each frame the Ease, being a wrapper, is updated
 * first and sets the wrapped action's factor from the curve; when the
 * duration has elapsed the Ease completes and the wrapped action keeps the
 * final factor. Stopping the Ease mid-ramp stops the wrapped action too.
 *
 * Inside a composite the Ease owns the wrapped action instead: it updates
 * it every frame and stops it when the ramp ends or the Ease is stopped.
 *
 * @example
 * ```ts
 * const walk = new MoveUntil([4, 0], { condition: infinite });
 * new Ease(walk, { seconds: 0.5, easing: "easeOut" }).apply(scheduler, player, { tag: "walk" });
 * ```
 */

import { easeOptionsSchema } from "@kinetica/schema";
import { Action } from "./action.js";
import type { EasingFn, EasingName } from "./easing.js";
import { easeInOut, resolveEasing } from "./easing.js";
import { parseOptions } from "./errors.js";

export interface EaseOptions {
  /** Ramp duration in seconds of simulated time. Must be positive. */
  readonly seconds: number;
  /** Curve or built-in curve name. Defaults to `easeInOut`. */
  readonly easing?: EasingName | EasingFn;
  /** Called once when the ramp finishes. */
  readonly onComplete?: () => void;
}

/** Tolerance for accumulated floating-point time. */
const TIME_EPSILON = 1e-9;

export class Ease extends Action {
  readonly wrapped: Action;
  readonly seconds: number;
  readonly easing: EasingFn;
  readonly onComplete: (() => void) | undefined;

  private elapsed = 0;
  private progress = 0;
  private owned = false;

  constructor(wrapped: Action, options: EaseOptions) {
    super({ onStop: options.onComplete });
    const { seconds, easing } = parseOptions(
      easeOptionsSchema,
      {
        seconds: options.seconds,
        easing: typeof options.easing === "string" ? options.easing : undefined,
      },
      "ease options",
    );
    this.wrapped = wrapped;
    this.seconds = seconds;
    this.easing = resolveEasing(easing ?? options.easing ?? easeInOut);
    this.onComplete = options.onComplete;
    this.condition = () => this.progress >= 1;
  }

  override get wrappedAction(): Action {
    return this.wrapped;
  }

  /** Normalized time in [0, 1]. */
  get easeProgress(): number {
    return this.progress;
  }

  protected override applyEffect(): void {
    this.elapsed = 0;
    this.progress = 0;
    const scheduler = this.scheduler;
    this.owned = scheduler === null || !scheduler.isRegistered(this);
    if (this.wrapped.isActive || this.wrapped.done) {
      this.wrapped.setFactor(this.easing(0));
      return;
    }
    if (this.owned) {
      this.wrapped.bind(scheduler, this.target, this.tag);
      this.wrapped.setFactor(this.easing(0));
      this.wrapped.start();
      return;
    }
    if (scheduler !== null) {
      const tag = this.tag === undefined ? undefined : `${this.tag}_wrapped`;
      scheduler.apply(this.wrapped, this.target, { tag });
    }
    this.wrapped.setFactor(this.easing(0));
  }

  protected override updateEffect(dt: number): void {
    this.elapsed += dt;
    this.progress =
      this.elapsed + TIME_EPSILON >= this.seconds ? 1 : this.elapsed / this.seconds;
    this.wrapped.setFactor(this.easing(this.progress));
    if (this.owned) {
      this.wrapped.update(dt);
    }
  }

  protected override removeEffect(): void {
    if (this.owned && !this.wrapped.done) {
      this.wrapped.stop();
    }
  }

  override pause(): void {
    super.pause();
    if (this.owned) {
      this.wrapped.pause();
    }
  }

  override resume(): void {
    super.resume();
    if (this.owned) {
      this.wrapped.resume();
    }
  }

  /** Stops the wrapped action as well, unless the ramp had already finished. */
  override stop(): void {
    const finished = this.done;
    super.stop();
    if (!finished) {
      this.wrapped.stop();
    }
  }

  override reset(): void {
    super.reset();
    this.condition = () => this.progress >= 1;
    this.elapsed = 0;
    this.progress = 0;
    this.owned = false;
    this.wrapped.reset();
  }

  override clone(): Ease {
    return new Ease(this.wrapped.clone(), {
      seconds: this.seconds,
      easing: this.easing,
      onComplete: this.onComplete,
    });
  }
}
