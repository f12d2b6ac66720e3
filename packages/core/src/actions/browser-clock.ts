/**
 * BrowserClock: `performance.now()` and `requestAnimationFrame`.
 */

import type { CancelHandle, Clock } from "./clock.js";

/**
 * Production clock for browser hosts.
 *
 * @example
 * ```ts
 * const loop = new FrameLoop({ clock: new BrowserClock(), scheduler, afterUpdate: () => bodies.update() });
 * loop.start();
 * ```
 */
export class BrowserClock implements Clock {
  now(): number {
    return performance.now();
  }

  requestFrame(callback: (timestamp: number) => void): CancelHandle {
    const id = requestAnimationFrame(callback);
    return { cancel: () => cancelAnimationFrame(id) };
  }
}
