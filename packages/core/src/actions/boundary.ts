/**
 * BoundaryStateMachine: per-entity, per-axis boundary tracking.
 *
 * For each axis the machine derives two candidate sides every frame:
 *
 * - the reactive side, from where the entity is now (an edge at or past a bound)
 * - the predicted side, from where one more frame of velocity would take it
 *
 * Bounce and wrap act on the predicted side so that an entity never renders
 * outside its bounds; limit clamps reactively and predictively. Enter and
 * exit transitions are reported through hooks supplied by the owning action.
 */

import type { BoundaryBehavior, Bounds } from "@kinetica/schema";
import type { Axis, Movable, Side } from "./entity.js";
import {
  AXIS_SIDES,
  highEdge,
  lowEdge,
  setHighEdge,
  setLowEdge,
  setVelocityOn,
  sizeOn,
  velocityOn,
} from "./entity.js";

/** Last known side per axis for one entity. `null` means inside the bounds. */
export interface AxisState {
  x: Side | null;
  y: Side | null;
}

/** Callbacks from the machine to its owner. */
export interface BoundaryHooks {
  enter(entity: Movable, axis: Axis, side: Side): void;
  exit(entity: Movable, axis: Axis, side: Side): void;
  /** Bounce negated `axis`; the owner mirrors it into its own velocity. */
  reversed(axis: Axis): void;
}

export interface BoundaryStateMachineOptions {
  readonly bounds: Bounds;
  readonly behavior: BoundaryBehavior;
  /** Axes to check. Both by default. */
  readonly axes?: readonly Axis[];
  readonly hooks: BoundaryHooks;
}

// ---------------------------------------------------------------------------
// Side derivation
// ---------------------------------------------------------------------------

/** Side the entity is touching or past right now, if any. Low bound wins ties. */
export function reactiveSide(
  axis: Axis,
  low: number,
  high: number,
  lowBound: number,
  highBound: number,
): Side | null {
  const [lowSide, highSide] = AXIS_SIDES[axis];
  if (low <= lowBound) {
    return lowSide;
  }
  if (high >= highBound) {
    return highSide;
  }
  return null;
}

/** Side the entity would cross during the next frame of `velocity`, if any. */
export function predictedSide(
  axis: Axis,
  low: number,
  high: number,
  velocity: number,
  lowBound: number,
  highBound: number,
): Side | null {
  const [lowSide, highSide] = AXIS_SIDES[axis];
  if (velocity > 0 && high + velocity > highBound) {
    return highSide;
  }
  if (velocity < 0 && low + velocity < lowBound) {
    return lowSide;
  }
  return null;
}

/** Side used for enter/exit bookkeeping. */
export function effectiveSide(
  behavior: BoundaryBehavior,
  predicted: Side | null,
  reactive: Side | null,
): Side | null {
  if ((behavior === "bounce" || behavior === "wrap") && predicted !== null) {
    return predicted;
  }
  return reactive;
}

// ---------------------------------------------------------------------------
// Machine
// ---------------------------------------------------------------------------

export class BoundaryStateMachine {
  bounds: Bounds;
  readonly behavior: BoundaryBehavior;
  readonly axes: readonly Axis[];

  private readonly hooks: BoundaryHooks;
  private readonly states = new Map<Movable, AxisState>();
  /** Enter events already fired this frame, per entity, as `axis:side`. */
  private readonly enteredThisFrame = new Map<Movable, Set<string>>();

  constructor(options: BoundaryStateMachineOptions) {
    this.bounds = options.bounds;
    this.behavior = options.behavior;
    this.axes = options.axes ?? ["x", "y"];
    this.hooks = options.hooks;
  }

  /** Start a new frame: enter events may fire again. */
  beginFrame(): void {
    this.enteredThisFrame.clear();
  }

  /** Drop all per-entity state. */
  clear(): void {
    this.states.clear();
    this.enteredThisFrame.clear();
  }

  /** A copy of the tracked state for `entity`. */
  stateOf(entity: Movable): AxisState {
    const state = this.states.get(entity);
    return state ? { ...state } : { x: null, y: null };
  }

  /** Problems that make `entity` unable to fit inside the bounds. */
  validate(entity: Movable): string[] {
    const issues: string[] = [];
    for (const axis of this.axes) {
      const [lowBound, highBound] = this.range(axis);
      const span = highBound - lowBound;
      const size = sizeOn(entity, axis);
      if (span < size) {
        const dimension = axis === "x" ? "width" : "height";
        issues.push(`${axis} bounds span ${span} is smaller than entity ${dimension} ${size}`);
      }
    }
    return issues;
  }

  /** Whether `entity` touches a bound on `axis` and `velocity` points away from it. */
  isLeaving(entity: Movable, axis: Axis, velocity: number): boolean {
    const [lowBound, highBound] = this.range(axis);
    if (lowEdge(entity, axis) <= lowBound) {
      return velocity > 0;
    }
    if (highEdge(entity, axis) >= highBound) {
      return velocity < 0;
    }
    return false;
  }

  /** Apply the behavior to one entity for the current frame. */
  process(entity: Movable): void {
    for (const axis of this.axes) {
      if (this.behavior === "limit") {
        this.limitAxis(entity, axis);
      } else {
        this.crossAxis(entity, axis);
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Bounce / wrap
  // ---------------------------------------------------------------------------

  private crossAxis(entity: Movable, axis: Axis): void {
    const [lowBound, highBound] = this.range(axis);
    const low = lowEdge(entity, axis);
    const high = highEdge(entity, axis);
    const velocity = velocityOn(entity, axis);

    const reactive = reactiveSide(axis, low, high, lowBound, highBound);
    const predicted = predictedSide(axis, low, high, velocity, lowBound, highBound);
    this.transition(entity, axis, effectiveSide(this.behavior, predicted, reactive));

    if (predicted === null) {
      return;
    }
    const towardLow = predicted === AXIS_SIDES[axis][0];
    if (this.behavior === "bounce") {
      setVelocityOn(entity, axis, -velocity);
      this.hooks.reversed(axis);
      if (towardLow) {
        setLowEdge(entity, axis, lowBound);
      } else {
        setHighEdge(entity, axis, highBound);
      }
    } else if (towardLow) {
      setHighEdge(entity, axis, highBound);
    } else {
      setLowEdge(entity, axis, lowBound);
    }
  }

  // ---------------------------------------------------------------------------
  // Limit
  // ---------------------------------------------------------------------------

  private limitAxis(entity: Movable, axis: Axis): void {
    const [lowBound, highBound] = this.range(axis);
    const [lowSide, highSide] = AXIS_SIDES[axis];
    const low = lowEdge(entity, axis);
    const high = highEdge(entity, axis);
    const velocity = velocityOn(entity, axis);

    const contact = reactiveSide(axis, low, high, lowBound, highBound);
    if (contact !== null) {
      const atLow = contact === lowSide;
      if (atLow) {
        setLowEdge(entity, axis, lowBound);
      } else {
        setHighEdge(entity, axis, highBound);
      }
      const towardBound = atLow ? velocity <= 0 : velocity >= 0;
      if (towardBound) {
        setVelocityOn(entity, axis, 0);
        this.transition(entity, axis, contact);
      } else if (this.stateFor(entity)[axis] === contact) {
        this.transition(entity, axis, null);
      }
      return;
    }

    if (velocity > 0 && high + velocity > highBound) {
      setHighEdge(entity, axis, highBound);
      setVelocityOn(entity, axis, 0);
      this.transition(entity, axis, highSide);
    } else if (velocity < 0 && low + velocity < lowBound) {
      setLowEdge(entity, axis, lowBound);
      setVelocityOn(entity, axis, 0);
      this.transition(entity, axis, lowSide);
    } else {
      this.transition(entity, axis, null);
    }
  }

  // ---------------------------------------------------------------------------
  // Bookkeeping
  // ---------------------------------------------------------------------------

  private transition(entity: Movable, axis: Axis, next: Side | null): void {
    const state = this.stateFor(entity);
    const previous = state[axis];
    if (previous === next) {
      return;
    }
    state[axis] = next;
    if (previous !== null) {
      this.hooks.exit(entity, axis, previous);
    }
    if (next !== null) {
      this.enter(entity, axis, next);
    }
  }

  private enter(entity: Movable, axis: Axis, side: Side): void {
    let fired = this.enteredThisFrame.get(entity);
    if (!fired) {
      fired = new Set();
      this.enteredThisFrame.set(entity, fired);
    }
    const key = `${axis}:${side}`;
    if (fired.has(key)) {
      return;
    }
    fired.add(key);
    this.hooks.enter(entity, axis, side);
  }

  private stateFor(entity: Movable): AxisState {
    let state = this.states.get(entity);
    if (!state) {
      state = { x: null, y: null };
      this.states.set(entity, state);
    }
    return state;
  }

  private range(axis: Axis): readonly [low: number, high: number] {
    const [left, bottom, right, top] = this.bounds;
    return axis === "x" ? [left, right] : [bottom, top];
  }
}
