/**
 * RotateUntil: spin entities at a constant angular velocity until a
 * condition is satisfied.
 */

import { angularVelocitySchema } from "@kinetica/schema";
import type { ActionOptions } from "./action.js";
import { Action } from "./action.js";
import { cloneCondition } from "./conditions.js";
import type { AttributeSet } from "./conflicts.js";
import { Attribute } from "./conflicts.js";
import { isRotatable } from "./entity.js";
import { ConfigurationError, parseOptions } from "./errors.js";
import type { TargetAdapter } from "./target.js";

export class RotateUntil extends Action {
  override readonly conflicts: AttributeSet = Attribute.Rotation;

  /** Degrees per frame at factor 1. */
  readonly targetAngularVelocity: number;
  currentAngularVelocity: number;

  constructor(angularVelocity: number, options: ActionOptions = {}) {
    super(options);
    const parsed = parseOptions(angularVelocitySchema, angularVelocity, "angular velocity");
    this.targetAngularVelocity = parsed;
    this.currentAngularVelocity = parsed;
  }

  protected override validateTarget(adapter: TargetAdapter): void {
    for (const entity of adapter.entities()) {
      if (!isRotatable(entity)) {
        throw new ConfigurationError(
          `RotateUntil cannot target ${adapter.describe()}: entity has no angular velocity`,
        );
      }
    }
  }

  protected override applyEffect(): void {
    this.write(this.currentAngularVelocity);
  }

  protected override updateEffect(_dt: number): void {
    this.write(this.currentAngularVelocity);
  }

  protected override removeEffect(): void {
    this.write(0);
  }

  override pause(): void {
    super.pause();
    if (!this.done) {
      this.write(0);
    }
  }

  override resume(): void {
    super.resume();
    if (this.isActive && !this.done) {
      this.write(this.currentAngularVelocity);
    }
  }

  override setFactor(factor: number): void {
    super.setFactor(factor);
    this.currentAngularVelocity = this.targetAngularVelocity * factor;
    if (this.isActive && !this.isPaused && !this.done) {
      this.write(this.currentAngularVelocity);
    }
  }

  override reset(): void {
    super.reset();
    this.currentAngularVelocity = this.targetAngularVelocity;
  }

  override clone(): RotateUntil {
    return new RotateUntil(this.targetAngularVelocity, {
      condition: cloneCondition(this.condition),
      onStop: this.onStop,
    });
  }

  private write(angularVelocity: number): void {
    for (const entity of this.entities()) {
      if (isRotatable(entity)) {
        entity.changeAngle = angularVelocity;
      }
    }
  }
}
