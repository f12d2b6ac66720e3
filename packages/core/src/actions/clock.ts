/**
 * Clock abstraction for driving a scheduler in real time.
 *
 * The runtime itself is stepped explicitly with `updateAll(dt)`; a Clock is
 * only needed when a {@link FrameLoop} should derive `dt` from timestamps.
 */

/** Handle returned by scheduling operations. Call `cancel()` to unschedule. */
export interface CancelHandle {
  cancel(): void;
}

/**
 * Time source and frame scheduler.
 *
 * A FrameLoop never calls `performance.now()` or `requestAnimationFrame`
 * itself; it goes through a Clock, so the same loop runs in a browser and
 * under test with deterministic time.
 */
export interface Clock {
  /** Current time in milliseconds (monotonic). */
  now(): number;

  /**
   * Request a callback on the next frame.
   *
   * @param callback - Receives the frame timestamp in ms.
   */
  requestFrame(callback: (timestamp: number) => void): CancelHandle;
}
