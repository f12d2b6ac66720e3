/**
 * Attribute conflict detection.
 *
 * Every action type declares which entity attributes it writes as a
 * bitset. Two actions on overlapping targets whose sets intersect are
 * reported as a diagnostic; nothing is ever blocked.
 */

import type { Action } from "./action.js";
import type { TargetAdapter } from "./target.js";

/** Attribute flags. Combine with `|`. */
export const Attribute = {
  None: 0,
  PositionX: 1 << 0,
  PositionY: 1 << 1,
  VelocityX: 1 << 2,
  VelocityY: 1 << 3,
  Rotation: 1 << 4,
} as const;

/** A combination of {@link Attribute} flags. */
export type AttributeSet = number;

export const POSITION: AttributeSet = Attribute.PositionX | Attribute.PositionY;
export const VELOCITY: AttributeSet = Attribute.VelocityX | Attribute.VelocityY;

const ATTRIBUTE_NAMES: ReadonlyArray<readonly [flag: number, name: string]> = [
  [Attribute.PositionX, "position.x"],
  [Attribute.PositionY, "position.y"],
  [Attribute.VelocityX, "velocity.x"],
  [Attribute.VelocityY, "velocity.y"],
  [Attribute.Rotation, "rotation"],
];

/** Names of the attributes in a set, in flag order. */
export function describeAttributes(set: AttributeSet): string[] {
  return ATTRIBUTE_NAMES.filter(([flag]) => (set & flag) !== 0).map(([, name]) => name);
}

/** One overlap between a newly applied action and one already running. */
export interface ConflictReport {
  readonly action: Action;
  readonly existing: Action;
  readonly attributes: readonly string[];
  readonly message: string;
}

/**
 * Whether two resolved targets refer to overlapping entities: the same
 * target, or a single entity and a collection that contains it.
 */
export function targetsOverlap(a: TargetAdapter, b: TargetAdapter): boolean {
  if (a.target === null || b.target === null) {
    return false;
  }
  if (a.target === b.target) {
    return true;
  }
  if (a.kind === "single" && b.kind === "many") {
    return b.contains(a.target);
  }
  if (a.kind === "many" && b.kind === "single") {
    return a.contains(b.target);
  }
  return false;
}

/**
 * Compare `action` against every other live action and collect overlaps.
 */
export function findConflicts(action: Action, others: Iterable<Action>): ConflictReport[] {
  const reports: ConflictReport[] = [];
  if (action.conflicts === Attribute.None) {
    return reports;
  }

  for (const existing of others) {
    if (existing === action || existing.done) {
      continue;
    }
    const overlap = action.conflicts & existing.conflicts;
    if (overlap === 0 || !targetsOverlap(action.targetAdapter, existing.targetAdapter)) {
      continue;
    }
    const attributes = describeAttributes(overlap);
    reports.push({
      action,
      existing,
      attributes,
      message:
        `${action.describe()} and ${existing.describe()} both write ` +
        `${attributes.join(", ")} on ${action.targetAdapter.describe()}`,
    });
  }
  return reports;
}
