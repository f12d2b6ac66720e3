import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  ActionScheduler,
  Body,
  BodyGroup,
  ConfigurationError,
  MoveUntil,
  MoveXUntil,
  MoveYUntil,
  afterFrames,
  infinite,
} from "../src/actions/index.js";
import type { Velocity } from "@kinetica/schema";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const DT = 1 / 60;

function quietLogger() {
  return { debug: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

// ---------------------------------------------------------------------------
// Test suite
// ---------------------------------------------------------------------------

describe("MoveUntil", () => {
  let logger: ReturnType<typeof quietLogger>;
  let scheduler: ActionScheduler;

  beforeEach(() => {
    logger = quietLogger();
    scheduler = new ActionScheduler({ logger });
  });

  // =========================================================================
  // Velocity
  // =========================================================================

  describe("velocity", () => {
    it("writes its velocity when applied", () => {
      const body = new Body();
      new MoveUntil([3, -2], { condition: infinite }).apply(scheduler, body);

      expect(body.changeX).toBe(3);
      expect(body.changeY).toBe(-2);
    });

    it("zeroes the velocity when it completes", () => {
      const body = new Body();
      const action = new MoveUntil([3, -2], { condition: afterFrames(2) }).apply(scheduler, body);

      scheduler.updateAll(DT);
      expect(body.changeX).toBe(3);
      scheduler.updateAll(DT);

      expect(action.done).toBe(true);
      expect(body.changeX).toBe(0);
      expect(body.changeY).toBe(0);
    });

    it("zeroes the velocity when stopped", () => {
      const body = new Body();
      const action = new MoveUntil([3, 1], { condition: infinite }).apply(scheduler, body);

      action.stop();

      expect(body.changeX).toBe(0);
      expect(body.changeY).toBe(0);
    });

    it("moves every member of a group, including later additions", () => {
      const a = new Body();
      const b = new Body();
      const group = new BodyGroup([a, b]);
      new MoveUntil([2, 0], { condition: infinite }).apply(scheduler, group);
      expect(a.changeX).toBe(2);
      expect(b.changeX).toBe(2);

      const c = new Body();
      group.add(c);
      scheduler.updateAll(DT);

      expect(c.changeX).toBe(2);
    });

    it("pause zeroes the velocity and resume restores it", () => {
      const body = new Body();
      const action = new MoveUntil([3, 1], { condition: infinite }).apply(scheduler, body);

      scheduler.pauseAll();
      expect(body.changeX).toBe(0);
      expect(body.changeY).toBe(0);
      expect(action.isPaused).toBe(true);

      scheduler.resumeAll();
      expect(body.changeX).toBe(3);
      expect(body.changeY).toBe(1);
    });

    it("setFactor scales the velocity", () => {
      const body = new Body();
      const action = new MoveUntil([3, 1], { condition: infinite }).apply(scheduler, body);

      action.setFactor(0.5);

      expect(action.currentVelocity).toEqual([1.5, 0.5]);
      expect(action.targetVelocity).toEqual([3, 1]);
      expect(body.changeX).toBe(1.5);
    });

    it("reverseMovement flips one axis", () => {
      const body = new Body();
      const action = new MoveUntil([3, 1], { condition: infinite }).apply(scheduler, body);

      action.reverseMovement("x");

      expect(body.changeX).toBe(-3);
      expect(body.changeY).toBe(1);
      expect(action.targetVelocity).toEqual([-3, 1]);
    });

    it("setCurrentVelocity overrides the written velocity but not the target", () => {
      const body = new Body();
      const action = new MoveUntil([3, 0], { condition: infinite }).apply(scheduler, body);

      action.setCurrentVelocity([1, 1]);
      scheduler.updateAll(DT);

      expect(body.changeX).toBe(1);
      expect(body.changeY).toBe(1);
      expect(action.targetVelocity).toEqual([3, 0]);
    });
  });

  // =========================================================================
  // Velocity provider
  // =========================================================================

  describe("velocity provider", () => {
    it("reads the velocity afresh every frame", () => {
      const body = new Body();
      let next: Velocity = [2, 1];
      new MoveUntil([0, 0], { condition: infinite, velocityProvider: () => next }).apply(
        scheduler,
        body,
      );
      expect(body.changeX).toBe(2);

      next = [5, -1];
      scheduler.updateAll(DT);

      expect(body.changeX).toBe(5);
      expect(body.changeY).toBe(-1);
    });

    it("keeps the last good velocity when the provider throws", () => {
      const body = new Body();
      let calls = 0;
      const action = new MoveUntil([0, 0], {
        condition: infinite,
        velocityProvider: () => {
          calls++;
          if (calls > 1) {
            throw new Error("lost");
          }
          return [4, 0];
        },
      }).apply(scheduler, body);

      scheduler.updateAll(DT);
      scheduler.updateAll(DT);

      expect(action.done).toBe(false);
      expect(body.changeX).toBe(4);
      expect(logger.warn).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith(
        "MoveUntil.velocityProvider threw and will not be reported again: lost",
      );
    });

    it("scales the provided velocity by the factor", () => {
      const body = new Body();
      const action = new MoveUntil([0, 0], {
        condition: infinite,
        velocityProvider: () => [8, 4],
      }).apply(scheduler, body);

      action.setFactor(0.25);
      scheduler.updateAll(DT);

      expect(body.changeX).toBe(2);
      expect(body.changeY).toBe(1);
    });
  });

  // =========================================================================
  // Bounce
  // =========================================================================

  describe("bounce", () => {
    it("reverses at the boundary and fires enter only once", () => {
      const body = new Body({ x: 90, y: 50, width: 10, height: 10 });
      const onBoundaryEnter = vi.fn();
      const action = new MoveUntil([10, 0], {
        condition: infinite,
        bounds: [0, 0, 100, 100],
        boundaryBehavior: "bounce",
        onBoundaryEnter,
      }).apply(scheduler, body);

      scheduler.updateAll(DT);

      expect(body.right).toBe(100);
      expect(body.changeX).toBe(-10);
      expect(action.currentVelocity).toEqual([-10, 0]);
      expect(action.targetVelocity).toEqual([-10, 0]);
      expect(onBoundaryEnter).toHaveBeenCalledWith(body, "x", "right");

      scheduler.updateAll(DT);
      expect(onBoundaryEnter).toHaveBeenCalledTimes(1);
      expect(body.changeX).toBe(-10);
    });

    it("fires exit after moving away from the side", () => {
      const body = new Body({ x: 90, y: 50, width: 10, height: 10 });
      const onBoundaryExit = vi.fn();
      new MoveUntil([10, 0], {
        condition: infinite,
        bounds: [0, 0, 100, 100],
        boundaryBehavior: "bounce",
        onBoundaryExit,
      }).apply(scheduler, body);

      scheduler.updateAll(DT);
      body.update();
      scheduler.updateAll(DT);

      expect(onBoundaryExit).toHaveBeenCalledTimes(1);
      expect(onBoundaryExit).toHaveBeenCalledWith(body, "x", "right");
    });

    it("clears boundary state when the action ends", () => {
      const body = new Body({ x: 90, y: 50, width: 10, height: 10 });
      const action = new MoveUntil([10, 0], {
        condition: infinite,
        bounds: [0, 0, 100, 100],
        boundaryBehavior: "bounce",
      }).apply(scheduler, body);

      scheduler.updateAll(DT);
      expect(action.boundaryStateOf(body).x).toBe("right");

      action.stop();
      expect(action.boundaryStateOf(body)).toEqual({ x: null, y: null });
    });

    it("a zero-velocity bounce action leaves externally set velocity alone", () => {
      const body = new Body({ x: 50, y: 50, width: 10, height: 10, changeX: 7 });
      const action = new MoveUntil([0, 0], {
        condition: infinite,
        bounds: [0, 0, 100, 100],
        boundaryBehavior: "bounce",
      }).apply(scheduler, body);

      scheduler.updateAll(DT);
      expect(body.changeX).toBe(7);

      scheduler.pauseAll();
      expect(body.changeX).toBe(7);

      action.stop();
      expect(body.changeX).toBe(7);
    });

    it("a zero-velocity bounce action still bounces what it polices", () => {
      const body = new Body({ x: 90, y: 50, width: 10, height: 10, changeX: 7 });
      new MoveUntil([0, 0], {
        condition: infinite,
        bounds: [0, 0, 100, 100],
        boundaryBehavior: "bounce",
      }).apply(scheduler, body);

      scheduler.updateAll(DT);

      expect(body.changeX).toBe(-7);
      expect(body.right).toBe(100);
    });
  });

  // =========================================================================
  // Wrap
  // =========================================================================

  describe("wrap", () => {
    it("reappears at the high bound by exactly the span, without drift", () => {
      const body = new Body({ x: 0, y: 50 });
      const onBoundaryEnter = vi.fn();
      new MoveUntil([-5, 0], {
        condition: infinite,
        bounds: [0, 0, 100, 100],
        boundaryBehavior: "wrap",
        onBoundaryEnter,
      }).apply(scheduler, body);

      scheduler.updateAll(DT);
      expect(body.x).toBe(100);
      expect(body.changeX).toBe(-5);
      expect(onBoundaryEnter).toHaveBeenCalledWith(body, "x", "left");
      body.update();

      const positions: number[] = [];
      for (let tick = 2; tick <= 41; tick++) {
        scheduler.updateAll(DT);
        body.update();
        if (tick === 21 || tick === 41) {
          positions.push(body.x);
        }
      }

      expect(positions).toEqual([95, 95]);
      expect(onBoundaryEnter).toHaveBeenCalledTimes(3);
    });
  });

  // =========================================================================
  // Limit
  // =========================================================================

  describe("limit", () => {
    function limitedBody(): Body {
      return new Body({ x: 95, y: 50, width: 10, height: 10 });
    }

    it("clamps at apply time when already at the bound", () => {
      const body = limitedBody();
      const onBoundaryEnter = vi.fn();
      new MoveUntil([10, 0], {
        condition: infinite,
        bounds: [0, 0, 100, 100],
        boundaryBehavior: "limit",
        onBoundaryEnter,
      }).apply(scheduler, body);

      expect(body.changeX).toBe(0);
      expect(body.right).toBe(100);
      expect(onBoundaryEnter).toHaveBeenCalledWith(body, "x", "right");

      scheduler.updateAll(DT);
      expect(body.changeX).toBe(0);
      expect(onBoundaryEnter).toHaveBeenCalledTimes(1);
    });

    it("never re-zeroes a manually assigned outbound velocity", () => {
      const body = limitedBody();
      const onBoundaryExit = vi.fn();
      new MoveUntil([10, 0], {
        condition: infinite,
        bounds: [0, 0, 100, 100],
        boundaryBehavior: "limit",
        onBoundaryExit,
      }).apply(scheduler, body);

      body.changeX = -3;
      for (let i = 0; i < 3; i++) {
        scheduler.updateAll(DT);
        expect(body.changeX).toBe(-3);
      }
      expect(onBoundaryExit).toHaveBeenCalledTimes(1);
      expect(onBoundaryExit).toHaveBeenCalledWith(body, "x", "right");
    });

    it("lets a velocity provider override a manual escape", () => {
      const body = limitedBody();
      new MoveUntil([0, 0], {
        condition: infinite,
        bounds: [0, 0, 100, 100],
        boundaryBehavior: "limit",
        velocityProvider: () => [10, 0],
      }).apply(scheduler, body);

      body.changeX = -3;
      scheduler.updateAll(DT);

      expect(body.changeX).toBe(0);
      expect(body.right).toBe(100);
    });

    it("stops an entity predictively before it crosses", () => {
      const body = new Body({ x: 80, y: 50, width: 10, height: 10 });
      new MoveUntil([8, 0], {
        condition: infinite,
        bounds: [0, 0, 100, 100],
        boundaryBehavior: "limit",
      }).apply(scheduler, body);

      scheduler.updateAll(DT);
      body.update();
      expect(body.x).toBe(88);

      scheduler.updateAll(DT);
      expect(body.right).toBe(100);
      expect(body.changeX).toBe(0);
    });
  });

  // =========================================================================
  // Configuration
  // =========================================================================

  describe("configuration", () => {
    it("rejects bounds smaller than the entity when applied", () => {
      const action = new MoveUntil([1, 0], { bounds: [0, 0, 5, 5], boundaryBehavior: "bounce" });

      let caught: unknown;
      try {
        action.apply(scheduler, new Body({ width: 10, height: 2 }));
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigurationError);
      if (caught instanceof ConfigurationError) {
        expect(caught.issues).toEqual(["x bounds span 5 is smaller than entity width 10"]);
        expect(caught.message).toBe(
          "MoveUntil cannot target Body: x bounds span 5 is smaller than entity width 10",
        );
      }
    });

    it("rejects a target that cannot move", () => {
      expect(() => new MoveUntil([1, 0]).apply(scheduler, { name: "rock" })).toThrow(
        "target entity does not expose edges, size and velocity",
      );
    });

    it("rejects malformed velocities and bounds at construction", () => {
      expect(() => new MoveUntil([1, Number.NaN])).toThrow(ConfigurationError);
      expect(() => new MoveUntil([1, 0], { bounds: [10, 0, 0, 10], boundaryBehavior: "wrap" })).toThrow(
        "Invalid boundary options",
      );
      expect(() => new MoveUntil([1, 0], { boundaryBehavior: "limit" })).toThrow(
        "Invalid boundary options: bounds: boundaryBehavior requires bounds",
      );
    });

    it("setBounds validates the new rectangle", () => {
      const action = new MoveUntil([1, 0], { bounds: [0, 0, 100, 100], boundaryBehavior: "limit" });

      action.setBounds([0, 0, 50, 50]);
      expect(action.bounds).toEqual([0, 0, 50, 50]);
      expect(() => action.setBounds([0, 10, 50, 0])).toThrow(ConfigurationError);
    });
  });

  // =========================================================================
  // Clone and reset
  // =========================================================================

  describe("clone and reset", () => {
    it("clone copies velocity and options without sharing state", () => {
      const original = new MoveUntil([3, 1], {
        condition: afterFrames(5),
        bounds: [0, 0, 100, 100],
        boundaryBehavior: "bounce",
      });
      const copy = original.clone();

      expect(copy).toBeInstanceOf(MoveUntil);
      expect(copy.targetVelocity).toEqual([3, 1]);
      expect(copy.bounds).toEqual([0, 0, 100, 100]);
      expect(copy.boundaryBehavior).toBe("bounce");
      expect(copy.condition).not.toBe(original.condition);
    });

    it("reset restores the current velocity from the target velocity", () => {
      const body = new Body();
      const action = new MoveUntil([4, 0], { condition: afterFrames(1) }).apply(scheduler, body);
      action.setFactor(0.5);
      scheduler.updateAll(DT);

      action.reset();

      expect(action.currentVelocity).toEqual([4, 0]);
      expect(action.factor).toBe(1);
    });
  });
});

// ---------------------------------------------------------------------------
// Axis-restricted movement
// ---------------------------------------------------------------------------

describe("MoveXUntil / MoveYUntil", () => {
  let scheduler: ActionScheduler;

  beforeEach(() => {
    scheduler = new ActionScheduler({ logger: quietLogger() });
  });

  it("MoveXUntil never touches the y velocity", () => {
    const body = new Body({ changeY: 4 });
    const action = new MoveXUntil(2, { condition: infinite }).apply(scheduler, body);
    expect(body.changeX).toBe(2);
    expect(body.changeY).toBe(4);

    scheduler.pauseAll();
    expect(body.changeY).toBe(4);

    action.stop();
    expect(body.changeX).toBe(0);
    expect(body.changeY).toBe(4);
  });

  it("MoveYUntil bounces only on its own axis", () => {
    const body = new Body({ x: 200, y: 90, width: 10, height: 10, changeX: 3 });
    new MoveYUntil(10, {
      condition: infinite,
      bounds: [0, 0, 100, 100],
      boundaryBehavior: "bounce",
    }).apply(scheduler, body);

    scheduler.updateAll(DT);

    expect(body.changeY).toBe(-10);
    expect(body.top).toBe(100);
    expect(body.x).toBe(200);
    expect(body.changeX).toBe(3);
  });

  it("clones keep their axis", () => {
    const copy = new MoveYUntil(6).clone();
    expect(copy).toBeInstanceOf(MoveYUntil);
    expect(copy.targetVelocity).toEqual([0, 6]);
  });
});
