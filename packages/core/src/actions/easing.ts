/**
 * Easing curves for ramping an action's factor.
 *
 * A curve maps normalized time t ∈ [0, 1] to a factor. `Ease` samples the
 * curve once per frame and hands the result to the wrapped action's
 * `setFactor`, so a curve ending at 1 leaves the action at full speed and
 * one ending at 0 (like `arc`) leaves it stopped.
 */

import type { EasingName } from "@kinetica/schema";
import { ConfigurationError } from "./errors.js";

/** Maps normalized time to a speed factor. */
export type EasingFn = (t: number) => number;

/** Full speed from the first frame. */
export function linear(t: number): number {
  return t;
}

/** Quadratic acceleration from rest. */
export function easeIn(t: number): number {
  return t * t;
}

/** Quadratic deceleration: fast start, gentle arrival at full speed. */
export function easeOut(t: number): number {
  return 1 - (1 - t) * (1 - t);
}

/** Cubic S-curve. */
export function easeInOut(t: number): number {
  return t < 0.5 ? 4 * t * t * t : 1 - (-2 * t + 2) ** 3 / 2;
}

/** Rises to full speed at t = 0.5 and falls back to rest. */
export function arc(t: number): number {
  return 4 * t * (1 - t);
}

export type { EasingName };

export const EASING_FUNCTIONS: Readonly<Record<EasingName, EasingFn>> = {
  linear,
  easeIn,
  easeOut,
  easeInOut,
  arc,
};

function isEasingName(name: string): name is EasingName {
  return Object.prototype.hasOwnProperty.call(EASING_FUNCTIONS, name);
}

/** Built-in curve by name, or `undefined`. */
export function getEasing(name: string): EasingFn | undefined {
  return isEasingName(name) ? EASING_FUNCTIONS[name] : undefined;
}

/**
 * Accept a curve or a curve name. Names may come from untyped sources such
 * as saved scenes, so unknown ones are a ConfigurationError.
 */
export function resolveEasing(easing: string | EasingFn): EasingFn {
  if (typeof easing === "function") {
    return easing;
  }
  const fn = getEasing(easing);
  if (fn === undefined) {
    throw new ConfigurationError(`Unknown easing "${easing}"`);
  }
  return fn;
}
