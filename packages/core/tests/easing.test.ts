import { describe, it, expect } from "vitest";
import {
  EASING_FUNCTIONS,
  ConfigurationError,
  arc,
  easeIn,
  easeInOut,
  easeOut,
  getEasing,
  linear,
  resolveEasing,
} from "../src/actions/index.js";

describe("easing curves", () => {
  describe("linear", () => {
    it("returns the factor unchanged", () => {
      expect(linear(0)).toBe(0);
      expect(linear(0.5)).toBe(0.5);
      expect(linear(1)).toBe(1);
    });
  });

  describe("easeIn", () => {
    it("ramps up slowly", () => {
      expect(easeIn(0)).toBe(0);
      expect(easeIn(0.5)).toBe(0.25);
      expect(easeIn(1)).toBe(1);
    });
  });

  describe("easeOut", () => {
    it("ramps up quickly, then settles", () => {
      expect(easeOut(0)).toBe(0);
      expect(easeOut(0.5)).toBe(0.75);
      expect(easeOut(1)).toBe(1);
    });
  });

  describe("easeInOut", () => {
    it("passes through the midpoint", () => {
      expect(easeInOut(0)).toBe(0);
      expect(easeInOut(0.5)).toBe(0.5);
      expect(easeInOut(1)).toBe(1);
    });

    it("is gentle at both ends", () => {
      expect(easeInOut(0.25)).toBe(0.0625);
      expect(easeInOut(0.75)).toBe(0.9375);
    });
  });

  describe("arc", () => {
    it("peaks at full speed halfway and ends at rest", () => {
      expect(arc(0)).toBe(0);
      expect(arc(0.5)).toBe(1);
      expect(arc(1)).toBe(0);
    });

    it("is symmetric", () => {
      expect(arc(0.25)).toBeCloseTo(arc(0.75), 10);
    });
  });

  // ---------------------------------------------------------------------------
  // Lookup
  // ---------------------------------------------------------------------------

  describe("getEasing", () => {
    it("returns built-in curves by name", () => {
      for (const [name, fn] of Object.entries(EASING_FUNCTIONS)) {
        expect(getEasing(name)).toBe(fn);
      }
    });

    it("returns undefined for unknown names and inherited keys", () => {
      expect(getEasing("bounce")).toBeUndefined();
      expect(getEasing("")).toBeUndefined();
      expect(getEasing("toString")).toBeUndefined();
    });
  });

  describe("resolveEasing", () => {
    it("accepts a name or a function", () => {
      const custom = (t: number): number => t * 0.5;
      expect(resolveEasing("easeOut")).toBe(easeOut);
      expect(resolveEasing(custom)).toBe(custom);
    });

    it("throws a configuration error for an unknown name", () => {
      expect(() => resolveEasing("wobble")).toThrow(ConfigurationError);
      expect(() => resolveEasing("wobble")).toThrow('Unknown easing "wobble"');
    });
  });
});
