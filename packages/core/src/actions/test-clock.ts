/**
 * TestClock: deterministic clock for frame-loop tests.
 */

import type { CancelHandle, Clock } from "./clock.js";

/**
 * A clock that advances only when told to. Frame callbacks fire
 * synchronously inside `advance()`.
 *
 * @example
 * ```ts
 * const clock = new TestClock();
 * const loop = new FrameLoop({ clock, scheduler });
 * loop.start();
 * clock.advance(16); // first frame, dt = 0
 * clock.advance(16); // second frame, dt = 0.016
 * ```
 */
export class TestClock implements Clock {
  private currentTime = 0;
  private nextId = 1;
  private scheduled = new Map<number, (timestamp: number) => void>();

  /** Current time in milliseconds. Starts at 0. */
  now(): number {
    return this.currentTime;
  }

  requestFrame(callback: (timestamp: number) => void): CancelHandle {
    const id = this.nextId++;
    this.scheduled.set(id, callback);
    return {
      cancel: () => {
        this.scheduled.delete(id);
      },
    };
  }

  /**
   * Move time forward by `ms` and fire the callbacks pending at that moment.
   * Callbacks requested while firing wait for the next `advance()`.
   */
  advance(ms: number): void {
    this.currentTime += ms;
    const callbacks = [...this.scheduled.values()];
    this.scheduled.clear();
    for (const callback of callbacks) {
      callback(this.currentTime);
    }
  }

  /** Advance `frames` times by `ms` each. */
  advanceFrames(frames: number, ms: number): void {
    for (let i = 0; i < frames; i++) {
      this.advance(ms);
    }
  }

  /** Number of currently pending frame callbacks. */
  get pendingCount(): number {
    return this.scheduled.size;
  }
}
