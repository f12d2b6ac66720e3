/**
 * Composite actions: Sequence, Parallel and Repeat.
 *
 * Composites own their children: the children are bound to the
 * composite's target and scheduler but are never registered in the
 * scheduler's active list. The composite updates them, forwards pause,
 * resume and factor changes, and stops whatever is still running when it
 * is stopped itself.
 */

import type { Velocity } from "@kinetica/schema";
import type { ActionOptions } from "./action.js";
import { Action } from "./action.js";
import { cloneCondition } from "./conditions.js";

// ---------------------------------------------------------------------------
// Sequence
// ---------------------------------------------------------------------------

/** Runs children one after another; done after the last one. */
export class Sequence extends Action {
  readonly actions: readonly Action[];

  private index = 0;
  private current: Action | null = null;

  constructor(actions: readonly Action[], options: ActionOptions = {}) {
    super(options);
    this.actions = [...actions];
  }

  /** The child currently running, if any. */
  get currentAction(): Action | null {
    return this.current;
  }

  protected override applyEffect(): void {
    this.index = 0;
    this.startFrom(0);
  }

  protected override updateEffect(dt: number): void {
    const child = this.current;
    if (child === null) {
      return;
    }
    child.update(dt);
    if (child.done) {
      this.startFrom(this.index + 1);
    }
  }

  protected override removeEffect(): void {
    const child = this.current;
    this.current = null;
    if (child !== null && !child.done) {
      child.stop();
    }
  }

  override pause(): void {
    super.pause();
    this.current?.pause();
  }

  override resume(): void {
    super.resume();
    this.current?.resume();
  }

  override setFactor(factor: number): void {
    super.setFactor(factor);
    this.current?.setFactor(factor);
  }

  override setCurrentVelocity(velocity: Velocity): void {
    this.current?.setCurrentVelocity(velocity);
  }

  override reset(): void {
    super.reset();
    this.index = 0;
    this.current = null;
    for (const child of this.actions) {
      child.reset();
    }
  }

  override clone(): Sequence {
    return new Sequence(
      this.actions.map((child) => child.clone()),
      { condition: cloneCondition(this.condition), onStop: this.onStop },
    );
  }

  /** Start children from `index`, skipping any that finish on start. */
  private startFrom(index: number): void {
    for (let i = index; i < this.actions.length; i++) {
      const child = this.actions[i];
      if (child === undefined) {
        continue;
      }
      this.index = i;
      this.current = child;
      child.bind(this.scheduler, this.target, this.tag);
      if (this.factor !== 1) {
        child.setFactor(this.factor);
      }
      child.start();
      if (!child.done) {
        return;
      }
    }
    this.current = null;
    this.complete();
  }
}

// ---------------------------------------------------------------------------
// Parallel
// ---------------------------------------------------------------------------

/** Runs all children at once; done when every child is done. */
export class Parallel extends Action {
  readonly actions: readonly Action[];

  constructor(actions: readonly Action[], options: ActionOptions = {}) {
    super(options);
    this.actions = [...actions];
  }

  protected override applyEffect(): void {
    for (const child of this.actions) {
      child.bind(this.scheduler, this.target, this.tag);
      if (this.factor !== 1) {
        child.setFactor(this.factor);
      }
      child.start();
    }
    this.completeIfAllDone();
  }

  protected override updateEffect(dt: number): void {
    for (const child of this.actions) {
      if (!child.done) {
        child.update(dt);
      }
    }
    this.completeIfAllDone();
  }

  protected override removeEffect(): void {
    for (const child of this.running()) {
      child.stop();
    }
  }

  override pause(): void {
    super.pause();
    for (const child of this.running()) {
      child.pause();
    }
  }

  override resume(): void {
    super.resume();
    for (const child of this.running()) {
      child.resume();
    }
  }

  override setFactor(factor: number): void {
    super.setFactor(factor);
    for (const child of this.running()) {
      child.setFactor(factor);
    }
  }

  override setCurrentVelocity(velocity: Velocity): void {
    for (const child of this.running()) {
      child.setCurrentVelocity(velocity);
    }
  }

  override reset(): void {
    super.reset();
    for (const child of this.actions) {
      child.reset();
    }
  }

  override clone(): Parallel {
    return new Parallel(
      this.actions.map((child) => child.clone()),
      { condition: cloneCondition(this.condition), onStop: this.onStop },
    );
  }

  private running(): Action[] {
    return this.actions.filter((child) => child.isActive && !child.done);
  }

  private completeIfAllDone(): void {
    if (!this.done && this.actions.every((child) => child.done)) {
      this.complete();
    }
  }
}

// ---------------------------------------------------------------------------
// Repeat
// ---------------------------------------------------------------------------

/**
 * Runs a fresh clone of `template` over and over. Never completes on its
 * own; stop it, or give it a condition.
 */
export class Repeat extends Action {
  readonly template: Action | null;

  private current: Action | null = null;
  private started = 0;

  constructor(template: Action | null, options: ActionOptions = {}) {
    super(options);
    this.template = template;
  }

  /** The running iteration, if any. */
  get currentAction(): Action | null {
    return this.current;
  }

  /** Number of iterations started so far. */
  get iterations(): number {
    return this.started;
  }

  protected override applyEffect(): void {
    if (this.template === null) {
      this.complete();
      return;
    }
    this.started = 0;
    this.startIteration(this.template);
  }

  protected override updateEffect(dt: number): void {
    const template = this.template;
    if (template === null) {
      return;
    }
    const child = this.current;
    if (child !== null && !child.done) {
      child.update(dt);
    }
    if (child === null || child.done) {
      this.startIteration(template);
    }
  }

  protected override removeEffect(): void {
    const child = this.current;
    this.current = null;
    if (child !== null && !child.done) {
      child.stop();
    }
  }

  override pause(): void {
    super.pause();
    this.current?.pause();
  }

  override resume(): void {
    super.resume();
    this.current?.resume();
  }

  override setFactor(factor: number): void {
    super.setFactor(factor);
    this.current?.setFactor(factor);
  }

  override setCurrentVelocity(velocity: Velocity): void {
    this.current?.setCurrentVelocity(velocity);
  }

  override reset(): void {
    super.reset();
    this.current = null;
    this.started = 0;
  }

  override clone(): Repeat {
    return new Repeat(this.template?.clone() ?? null, {
      condition: cloneCondition(this.condition),
      onStop: this.onStop,
    });
  }

  private startIteration(template: Action): void {
    const child = template.clone();
    this.current = child;
    this.started++;
    child.bind(this.scheduler, this.target, this.tag);
    if (this.factor !== 1) {
      child.setFactor(this.factor);
    }
    child.start();
  }
}

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

/** `new Sequence(actions)`. */
export function sequence(...actions: Action[]): Sequence {
  return new Sequence(actions);
}

/** `new Parallel(actions)`. */
export function parallel(...actions: Action[]): Parallel {
  return new Parallel(actions);
}

/** `new Repeat(action)`. */
export function repeat(action: Action): Repeat {
  return new Repeat(action);
}
