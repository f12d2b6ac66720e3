/**
 * Zod schemas for action construction options.
 *
 * Movement, timing and easing actions validate their numeric options
 * against these schemas before they are ever scheduled. Inferred types are
 * exported alongside so callers never duplicate the shapes by hand.
 */

import { z } from "zod";

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

const finite = z.number().finite();

/** A two-component velocity, in units per frame. */
export const velocitySchema = z
  .tuple([finite, finite])
  .describe("Velocity as [dx, dy], applied once per frame.");

/**
 * Bounding rectangle as edge coordinates `[left, bottom, right, top]`.
 * Degenerate (zero-span) rectangles are allowed, inverted ones are not.
 */
export const boundsSchema = z
  .tuple([finite, finite, finite, finite])
  .describe("Bounds as [left, bottom, right, top] in world coordinates.")
  .refine(([left, , right]) => right >= left, {
    message: "right bound must not be less than left bound",
  })
  .refine(([, bottom, , top]) => top >= bottom, {
    message: "top bound must not be less than bottom bound",
  });

/** What a movement action does when an entity reaches its bounds. */
export const boundaryBehaviorSchema = z.enum(["bounce", "wrap", "limit"]);

/** Whole number of frames. Non-positive counts are legal and mean "now". */
export const frameCountSchema = z.number().int();

/** Seconds between two callback invocations. Zero means every frame. */
export const callbackIntervalSchema = z
  .number()
  .finite()
  .nonnegative({ message: "seconds between calls must be non-negative" });

// ---------------------------------------------------------------------------
// Composite option objects
// ---------------------------------------------------------------------------

/** Boundary options shared by every movement action. */
export const moveOptionsSchema = z
  .object({
    bounds: boundsSchema.optional(),
    boundaryBehavior: boundaryBehaviorSchema.optional(),
  })
  .refine((options) => options.boundaryBehavior === undefined || options.bounds !== undefined, {
    message: "boundaryBehavior requires bounds",
    path: ["bounds"],
  });

/** Built-in easing curve names. */
export const easingNameSchema = z.enum(["linear", "easeIn", "easeOut", "easeInOut", "arc"]);

/** Degrees per frame. */
export const angularVelocitySchema = z.number().finite({ message: "must be a finite number" });

/** Options for easing a wrapped action's factor over time. */
export const easeOptionsSchema = z.object({
  seconds: z
    .number()
    .finite()
    .positive({ message: "ease duration must be greater than zero" })
    .describe("Duration of the ramp in seconds of simulated time."),
  easing: easingNameSchema.optional(),
});

// ---------------------------------------------------------------------------
// Inferred types
// ---------------------------------------------------------------------------

export type Velocity = z.infer<typeof velocitySchema>;
export type Bounds = z.infer<typeof boundsSchema>;
export type BoundaryBehavior = z.infer<typeof boundaryBehaviorSchema>;
export type MoveOptionsInput = z.infer<typeof moveOptionsSchema>;
export type EasingName = z.infer<typeof easingNameSchema>;
