/**
 * Frame-based conditions and timing helpers.
 *
 * Frames are counted by calls: a condition advances once each time the
 * owning action evaluates it, which happens once per unpaused frame. Paused
 * actions do not evaluate their condition, so frame conditions freeze with
 * them and stepping advances them by exactly one.
 */

import { frameCountSchema } from "@kinetica/schema";
import type { Condition } from "./action.js";
import { parseOptions } from "./errors.js";

/** Nominal frame rate used by the seconds/frames converters. */
export const FRAMES_PER_SECOND = 60;

/** Frame-counting metadata, kept so that clones can restart from zero. */
export type FrameWindow =
  | { readonly kind: "after"; readonly frames: number }
  | { readonly kind: "within"; readonly start: number; readonly end: number };

/** A condition that counts its own evaluations. */
export interface FrameCondition {
  (): boolean;
  readonly window: FrameWindow;
}

/** Whether a condition counts frames (and therefore needs a fresh copy on clone). */
export function isFrameCondition(condition: Condition): condition is FrameCondition {
  return "window" in condition && typeof Reflect.get(condition, "window") === "object";
}

/**
 * True on the `frames`-th evaluation and every one after it.
 * Zero or negative counts are satisfied on the first evaluation.
 *
 * @example
 * ```ts
 * new MoveUntil([5, 0], { condition: afterFrames(60) }).apply(scheduler, body);
 * ```
 */
export function afterFrames(frames: number): FrameCondition {
  const count = parseOptions(frameCountSchema, frames, "frame count");
  let elapsed = 0;
  const condition = (): boolean => {
    if (count <= 0) {
      return true;
    }
    elapsed += 1;
    return elapsed >= count;
  };
  return Object.assign(condition, { window: { kind: "after", frames: count } as const });
}

/**
 * True only while the evaluation index is in `[start, end)`, counting the
 * first evaluation as frame 0.
 */
export function withinFrames(start: number, end: number): FrameCondition {
  const from = parseOptions(frameCountSchema, start, "window start");
  const to = parseOptions(frameCountSchema, end, "window end");
  let frame = 0;
  const condition = (): boolean => {
    const inside = from <= frame && frame < to;
    frame += 1;
    return inside;
  };
  return Object.assign(condition, { window: { kind: "within", start: from, end: to } as const });
}

/** Never satisfied; the action runs until stopped. */
export function infinite(): boolean {
  return false;
}

/**
 * Wrap a callback so it runs on the first call and then every `interval`
 * calls. Intervals below 1 behave as 1.
 *
 * @example
 * ```ts
 * new CallbackUntil(everyFrames(10, () => enemy.think()), { condition: infinite });
 * ```
 */
export function everyFrames<A extends readonly unknown[]>(
  interval: number,
  callback: (...args: A) => void,
): (...args: A) => void {
  const step = Math.max(1, Math.floor(interval));
  let sinceLast = step;
  return (...args: A) => {
    sinceLast += 1;
    if (sinceLast >= step) {
      sinceLast = 0;
      callback(...args);
    }
  };
}

/** Approximate seconds for a frame count. For display only. */
export function framesToSeconds(frames: number, fps: number = FRAMES_PER_SECOND): number {
  return frames / fps;
}

/** Nearest whole frame count for a duration in seconds. */
export function secondsToFrames(seconds: number, fps: number = FRAMES_PER_SECOND): number {
  return Math.round(seconds * fps);
}

/**
 * Copy a condition for a cloned action. Frame conditions get a fresh
 * counter; anything else is shared as-is.
 */
export function cloneCondition(condition: Condition | null): Condition | null {
  if (condition === null || !isFrameCondition(condition)) {
    return condition;
  }
  const { window } = condition;
  return window.kind === "after" ? afterFrames(window.frames) : withinFrames(window.start, window.end);
}
