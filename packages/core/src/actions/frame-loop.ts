/**
 * FrameLoop: drives an ActionScheduler from a Clock.
 *
 * Each clock frame becomes one `updateAll(dt)`, with `dt` derived from the
 * frame timestamps, followed by the host's integration step.
 */

import type { CancelHandle, Clock } from "./clock.js";
import type { ActionScheduler } from "./scheduler.js";

export interface FrameLoopOptions {
  readonly clock: Clock;
  readonly scheduler: ActionScheduler;
  /** Host step run after every frame, typically integrating velocities into positions. */
  readonly afterUpdate?: (dt: number) => void;
  /** Upper bound for `dt` in seconds, so a stalled tab does not produce one huge step. */
  readonly maxDeltaSeconds?: number;
}

const DEFAULT_MAX_DELTA_SECONDS = 0.25;

export class FrameLoop {
  private readonly clock: Clock;
  private readonly scheduler: ActionScheduler;
  private readonly afterUpdate: ((dt: number) => void) | undefined;
  private readonly maxDelta: number;
  private frameHandle: CancelHandle | null = null;
  private lastTimestamp: number | null = null;
  private running = false;
  private frameCount = 0;

  constructor(options: FrameLoopOptions) {
    this.clock = options.clock;
    this.scheduler = options.scheduler;
    this.afterUpdate = options.afterUpdate;
    this.maxDelta = options.maxDeltaSeconds ?? DEFAULT_MAX_DELTA_SECONDS;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Frames run since the loop was created. */
  get frames(): number {
    return this.frameCount;
  }

  /** Begin requesting frames. The first frame runs with `dt = 0`. */
  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.lastTimestamp = null;
    this.scheduleFrame();
  }

  stop(): void {
    this.running = false;
    if (this.frameHandle) {
      this.frameHandle.cancel();
      this.frameHandle = null;
    }
  }

  private scheduleFrame(): void {
    this.frameHandle = this.clock.requestFrame((timestamp) => {
      this.tick(timestamp);
    });
  }

  private tick(timestamp: number): void {
    this.frameHandle = null;
    const dt =
      this.lastTimestamp === null
        ? 0
        : Math.min(Math.max(0, (timestamp - this.lastTimestamp) / 1000), this.maxDelta);
    this.lastTimestamp = timestamp;
    this.frameCount++;

    try {
      this.scheduler.updateAll(dt);
      this.afterUpdate?.(dt);
    } catch (error) {
      this.scheduler.logger.error("Frame failed; stopping the loop", error);
      this.stop();
      return;
    }

    if (this.running) {
      this.scheduleFrame();
    }
  }
}
