/**
 * Entity contracts that actions mutate.
 *
 * The runtime is agnostic to how entities are rendered; it only needs to
 * read and write edges, size and velocity. Any object satisfying these
 * interfaces can be a target, as can any iterable of such objects.
 */

/** Axis of a 2D world. */
export type Axis = "x" | "y";

/** Side of a bounding rectangle. `left`/`right` belong to x, `bottom`/`top` to y. */
export type Side = "left" | "right" | "bottom" | "top";

/**
 * A positioned, moving entity.
 *
 * Edges are writable: assigning `right = 100` moves the entity so that its
 * right edge sits at 100, keeping its size. Velocities are in units per
 * frame and are integrated by the host, not by the runtime.
 */
export interface Movable {
  left: number;
  right: number;
  bottom: number;
  top: number;
  readonly width: number;
  readonly height: number;
  changeX: number;
  changeY: number;
}

/** An entity with an angular velocity in degrees per frame. */
export interface Rotatable {
  changeAngle: number;
}

function hasNumber(value: object, key: string): boolean {
  return key in value && typeof Reflect.get(value, key) === "number";
}

/** Runtime check for the {@link Movable} contract. */
export function isMovable(value: unknown): value is Movable {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  return ["left", "right", "bottom", "top", "width", "height", "changeX", "changeY"].every((key) =>
    hasNumber(value, key),
  );
}

/** Runtime check for the {@link Rotatable} contract. */
export function isRotatable(value: unknown): value is Rotatable {
  return typeof value === "object" && value !== null && hasNumber(value, "changeAngle");
}

// ---------------------------------------------------------------------------
// Axis helpers
// ---------------------------------------------------------------------------

/** The low and high side of an axis. */
export const AXIS_SIDES: Readonly<Record<Axis, readonly [low: Side, high: Side]>> = {
  x: ["left", "right"],
  y: ["bottom", "top"],
};

export function lowEdge(entity: Movable, axis: Axis): number {
  return axis === "x" ? entity.left : entity.bottom;
}

export function highEdge(entity: Movable, axis: Axis): number {
  return axis === "x" ? entity.right : entity.top;
}

export function setLowEdge(entity: Movable, axis: Axis, value: number): void {
  if (axis === "x") {
    entity.left = value;
  } else {
    entity.bottom = value;
  }
}

export function setHighEdge(entity: Movable, axis: Axis, value: number): void {
  if (axis === "x") {
    entity.right = value;
  } else {
    entity.top = value;
  }
}

export function velocityOn(entity: Movable, axis: Axis): number {
  return axis === "x" ? entity.changeX : entity.changeY;
}

export function setVelocityOn(entity: Movable, axis: Axis, value: number): void {
  if (axis === "x") {
    entity.changeX = value;
  } else {
    entity.changeY = value;
  }
}

export function sizeOn(entity: Movable, axis: Axis): number {
  return axis === "x" ? entity.width : entity.height;
}
