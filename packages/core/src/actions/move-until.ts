/**
 * MoveUntil: set an entity's velocity until a condition is satisfied.
 *
 * The action owns velocity, not position: it writes `changeX`/`changeY`
 * every frame and the host integrates them. With bounds and a boundary
 * behavior, a {@link BoundaryStateMachine} keeps entities inside the
 * rectangle and reports enter/exit transitions.
 */

import { boundsSchema, moveOptionsSchema, velocitySchema } from "@kinetica/schema";
import type { BoundaryBehavior, Bounds, MoveOptionsInput, Velocity } from "@kinetica/schema";
import type { ActionOptions } from "./action.js";
import { Action } from "./action.js";
import { BoundaryStateMachine } from "./boundary.js";
import { cloneCondition } from "./conditions.js";
import type { AttributeSet } from "./conflicts.js";
import { Attribute, POSITION, VELOCITY } from "./conflicts.js";
import type { Axis, Movable, Side } from "./entity.js";
import { isMovable, setVelocityOn, velocityOn } from "./entity.js";
import { ConfigurationError, parseOptions } from "./errors.js";
import type { TargetAdapter } from "./target.js";

/** Supplies the velocity afresh every frame. */
export type VelocityProvider = () => Velocity;

/** Called with the entity, the axis, and the side that was entered or left. */
export type BoundaryCallback = (entity: Movable, axis: Axis, side: Side) => void;

/** `bounds` is `[left, bottom, right, top]` and only used together with `boundaryBehavior`. */
export interface MoveUntilOptions extends ActionOptions, Readonly<MoveOptionsInput> {
  /**
   * Replaces the constructor velocity every frame. A provider that throws
   * leaves the last good velocity in place.
   */
  readonly velocityProvider?: VelocityProvider;
  readonly onBoundaryEnter?: BoundaryCallback;
  readonly onBoundaryExit?: BoundaryCallback;
}

/** Velocities closer than this are treated as equal. */
const VELOCITY_EPSILON = 1e-3;

const BOTH_AXES: readonly Axis[] = ["x", "y"];

function component(velocity: Velocity, axis: Axis): number {
  return axis === "x" ? velocity[0] : velocity[1];
}

function negated(velocity: Velocity, axis: Axis): Velocity {
  return axis === "x" ? [-velocity[0], velocity[1]] : [velocity[0], -velocity[1]];
}

export class MoveUntil extends Action {
  override readonly conflicts: AttributeSet = POSITION | VELOCITY;

  /** Velocity at factor 1. Bounce and `reverseMovement` flip it. */
  targetVelocity: Velocity;
  /** Velocity being written to entities: `targetVelocity` scaled by the factor. */
  currentVelocity: Velocity;
  bounds: Bounds | undefined;
  readonly boundaryBehavior: BoundaryBehavior | undefined;
  readonly velocityProvider: VelocityProvider | undefined;
  onBoundaryEnter: BoundaryCallback | undefined;
  onBoundaryExit: BoundaryCallback | undefined;

  private readonly boundary: BoundaryStateMachine | null;

  constructor(velocity: Velocity, options: MoveUntilOptions = {}) {
    super(options);
    const parsedVelocity = parseOptions(velocitySchema, velocity, "velocity");
    const boundary = parseOptions(
      moveOptionsSchema,
      { bounds: options.bounds, boundaryBehavior: options.boundaryBehavior },
      "boundary options",
    );

    this.targetVelocity = parsedVelocity;
    this.currentVelocity = [parsedVelocity[0], parsedVelocity[1]];
    this.bounds = boundary.bounds;
    this.boundaryBehavior = boundary.boundaryBehavior;
    this.velocityProvider = options.velocityProvider;
    this.onBoundaryEnter = options.onBoundaryEnter;
    this.onBoundaryExit = options.onBoundaryExit;

    this.boundary =
      boundary.bounds !== undefined && boundary.boundaryBehavior !== undefined
        ? new BoundaryStateMachine({
            bounds: boundary.bounds,
            behavior: boundary.boundaryBehavior,
            axes: this.axes,
            hooks: {
              enter: (entity, axis, side) =>
                this.invokeCallback("onBoundaryEnter", this.onBoundaryEnter, entity, axis, side),
              exit: (entity, axis, side) =>
                this.invokeCallback("onBoundaryExit", this.onBoundaryExit, entity, axis, side),
              reversed: (axis) => {
                this.targetVelocity = negated(this.targetVelocity, axis);
                this.currentVelocity = negated(this.currentVelocity, axis);
              },
            },
          })
        : null;
  }

  /** Axes this action writes and checks. */
  protected get axes(): readonly Axis[] {
    return BOTH_AXES;
  }

  /** Tracked boundary sides for `entity`; all `null` without bounds. */
  boundaryStateOf(entity: Movable): { x: Side | null; y: Side | null } {
    return this.boundary ? this.boundary.stateOf(entity) : { x: null, y: null };
  }

  // ---------------------------------------------------------------------------
  // Lifecycle hooks
  // ---------------------------------------------------------------------------

  protected override validateTarget(adapter: TargetAdapter): void {
    const issues: string[] = [];
    for (const entity of adapter.entities()) {
      if (!isMovable(entity)) {
        issues.push("target entity does not expose edges, size and velocity");
        continue;
      }
      if (this.boundary) {
        issues.push(...this.boundary.validate(entity));
      }
    }
    if (issues.length > 0) {
      throw new ConfigurationError(
        `${this.constructor.name} cannot target ${adapter.describe()}: ${issues.join("; ")}`,
        issues,
      );
    }
  }

  protected override applyEffect(): void {
    this.refreshFromProvider();
    this.boundary?.beginFrame();
    for (const body of this.bodies()) {
      this.writeVelocity(body);
      if (this.boundaryBehavior === "limit") {
        this.boundary?.process(body);
      }
    }
  }

  protected override updateEffect(_dt: number): void {
    this.refreshFromProvider();
    this.boundary?.beginFrame();
    for (const body of this.bodies()) {
      this.reapplyVelocity(body);
      this.boundary?.process(body);
    }
  }

  protected override removeEffect(): void {
    this.boundary?.clear();
    if (this.isBoundaryHandlerOnly()) {
      return;
    }
    for (const body of this.bodies()) {
      for (const axis of this.axes) {
        setVelocityOn(body, axis, 0);
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Pause, factor and velocity control
  // ---------------------------------------------------------------------------

  /** Freezes entities in place; `resume()` gives them their velocity back. */
  override pause(): void {
    if (this.isPaused) {
      return;
    }
    super.pause();
    if (this.done || this.isBoundaryHandlerOnly()) {
      return;
    }
    for (const body of this.bodies()) {
      for (const axis of this.axes) {
        setVelocityOn(body, axis, 0);
      }
    }
  }

  override resume(): void {
    if (!this.isPaused) {
      return;
    }
    super.resume();
    this.writeAll();
  }

  override setFactor(factor: number): void {
    super.setFactor(factor);
    this.currentVelocity = [this.targetVelocity[0] * factor, this.targetVelocity[1] * factor];
    this.writeAll();
  }

  override setCurrentVelocity(velocity: Velocity): void {
    this.currentVelocity = [velocity[0], velocity[1]];
    this.writeAll();
  }

  /** Flip the direction of travel on one axis, keeping the speed. */
  reverseMovement(axis: Axis): void {
    this.targetVelocity = negated(this.targetVelocity, axis);
    this.currentVelocity = negated(this.currentVelocity, axis);
    this.writeAll();
  }

  /** Move the bounding rectangle. Tracked sides are kept. */
  setBounds(bounds: Bounds): void {
    const parsed = parseOptions(boundsSchema, bounds, "bounds");
    this.bounds = parsed;
    if (this.boundary) {
      this.boundary.bounds = parsed;
    }
  }

  override reset(): void {
    super.reset();
    this.currentVelocity = [this.targetVelocity[0], this.targetVelocity[1]];
    this.boundary?.clear();
  }

  override clone(): MoveUntil {
    return new MoveUntil(this.targetVelocity, this.cloneOptions());
  }

  /** Constructor options reproducing this action, with a fresh condition. */
  protected cloneOptions(): MoveUntilOptions {
    return {
      condition: cloneCondition(this.condition),
      onStop: this.onStop,
      bounds: this.bounds,
      boundaryBehavior: this.boundaryBehavior,
      velocityProvider: this.velocityProvider,
      onBoundaryEnter: this.onBoundaryEnter,
      onBoundaryExit: this.onBoundaryExit,
    };
  }

  // ---------------------------------------------------------------------------
  // Velocity plumbing
  // ---------------------------------------------------------------------------

  protected *bodies(): Generator<Movable> {
    for (const entity of this.entities()) {
      if (isMovable(entity)) {
        yield entity;
      }
    }
  }

  /** A zero-velocity bounce/wrap action only polices the bounds. */
  private isBoundaryHandlerOnly(): boolean {
    return (
      (this.boundaryBehavior === "bounce" || this.boundaryBehavior === "wrap") &&
      this.axes.every((axis) => Math.abs(component(this.targetVelocity, axis)) < VELOCITY_EPSILON)
    );
  }

  private refreshFromProvider(): void {
    const provider = this.velocityProvider;
    if (provider === undefined) {
      return;
    }
    const next = this.guard.evaluate(`${this.constructor.name}.velocityProvider`, provider, this.targetVelocity);
    this.targetVelocity = [next[0], next[1]];
    this.currentVelocity = [next[0] * this.factor, next[1] * this.factor];
  }

  private writeAll(): void {
    if (!this.isActive || this.isPaused || this.done) {
      return;
    }
    for (const body of this.bodies()) {
      this.writeVelocity(body);
    }
  }

  private writeVelocity(body: Movable): void {
    if (this.isBoundaryHandlerOnly()) {
      return;
    }
    for (const axis of this.axes) {
      setVelocityOn(body, axis, component(this.currentVelocity, axis));
    }
  }

  /**
   * Per-frame velocity write. Without a provider, a limited entity that is
   * touching a bound and was given a velocity pointing away from it by
   * someone else keeps that velocity.
   */
  private reapplyVelocity(body: Movable): void {
    if (this.isBoundaryHandlerOnly()) {
      return;
    }
    for (const axis of this.axes) {
      const own = component(this.currentVelocity, axis);
      const actual = velocityOn(body, axis);
      const external = Math.abs(actual - own) > VELOCITY_EPSILON;
      if (
        this.velocityProvider === undefined &&
        this.boundaryBehavior === "limit" &&
        external &&
        this.boundary?.isLeaving(body, axis, actual)
      ) {
        continue;
      }
      setVelocityOn(body, axis, own);
    }
  }
}

/** MoveUntil restricted to the x axis. The y velocity is never touched. */
export class MoveXUntil extends MoveUntil {
  override readonly conflicts: AttributeSet = Attribute.PositionX | Attribute.VelocityX;

  constructor(dx: number, options: MoveUntilOptions = {}) {
    super([dx, 0], options);
  }

  protected override get axes(): readonly Axis[] {
    return ["x"];
  }

  override clone(): MoveXUntil {
    return new MoveXUntil(this.targetVelocity[0], this.cloneOptions());
  }
}

/** MoveUntil restricted to the y axis. The x velocity is never touched. */
export class MoveYUntil extends MoveUntil {
  override readonly conflicts: AttributeSet = Attribute.PositionY | Attribute.VelocityY;

  constructor(dy: number, options: MoveUntilOptions = {}) {
    super([0, dy], options);
  }

  protected override get axes(): readonly Axis[] {
    return ["y"];
  }

  override clone(): MoveYUntil {
    return new MoveYUntil(this.targetVelocity[1], this.cloneOptions());
  }
}
