/**
 * Body and BodyGroup: reference entity implementations.
 *
 * A Body stores its center, size and per-frame velocities. It satisfies
 * both {@link Movable} and {@link Rotatable}, so every built-in action can
 * target it. Hosts with their own sprite classes do not need these.
 */

import type { Movable, Rotatable } from "./entity.js";

/** Initial state for a {@link Body}. Omitted fields default to zero. */
export interface BodyInit {
  readonly x?: number;
  readonly y?: number;
  readonly width?: number;
  readonly height?: number;
  readonly changeX?: number;
  readonly changeY?: number;
  readonly angle?: number;
  readonly changeAngle?: number;
}

/** An axis-aligned box with center position and velocity. */
export class Body implements Movable, Rotatable {
  x: number;
  y: number;
  width: number;
  height: number;
  changeX: number;
  changeY: number;
  angle: number;
  changeAngle: number;

  constructor(init: BodyInit = {}) {
    this.x = init.x ?? 0;
    this.y = init.y ?? 0;
    this.width = init.width ?? 0;
    this.height = init.height ?? 0;
    this.changeX = init.changeX ?? 0;
    this.changeY = init.changeY ?? 0;
    this.angle = init.angle ?? 0;
    this.changeAngle = init.changeAngle ?? 0;
  }

  get left(): number {
    return this.x - this.width / 2;
  }

  set left(value: number) {
    this.x = value + this.width / 2;
  }

  get right(): number {
    return this.x + this.width / 2;
  }

  set right(value: number) {
    this.x = value - this.width / 2;
  }

  get bottom(): number {
    return this.y - this.height / 2;
  }

  set bottom(value: number) {
    this.y = value + this.height / 2;
  }

  get top(): number {
    return this.y + this.height / 2;
  }

  set top(value: number) {
    this.y = value - this.height / 2;
  }

  /** Integrate one frame of velocity into position and angle. */
  update(): void {
    this.x += this.changeX;
    this.y += this.changeY;
    this.angle += this.changeAngle;
  }
}

/** An ordered, iterable collection of bodies. */
export class BodyGroup implements Iterable<Body> {
  private readonly bodies: Body[] = [];

  constructor(bodies: Iterable<Body> = []) {
    for (const body of bodies) {
      this.add(body);
    }
  }

  add(body: Body): void {
    if (!this.bodies.includes(body)) {
      this.bodies.push(body);
    }
  }

  remove(body: Body): void {
    const index = this.bodies.indexOf(body);
    if (index !== -1) {
      this.bodies.splice(index, 1);
    }
  }

  has(body: Body): boolean {
    return this.bodies.includes(body);
  }

  get size(): number {
    return this.bodies.length;
  }

  /** Integrate one frame for every member. */
  update(): void {
    for (const body of this.bodies) {
      body.update();
    }
  }

  [Symbol.iterator](): Iterator<Body> {
    return this.bodies[Symbol.iterator]();
  }
}
