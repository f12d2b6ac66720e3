import { describe, it, expect } from "vitest";
import { Body, BodyGroup, adaptTarget, isMovable, isRotatable } from "../src/actions/index.js";

// ---------------------------------------------------------------------------
// Target adapters
// ---------------------------------------------------------------------------

describe("adaptTarget", () => {
  it("resolves null to an empty target", () => {
    const adapter = adaptTarget(null);
    expect(adapter.kind).toBe("none");
    expect([...adapter.entities()]).toEqual([]);
    expect(adapter.describe()).toBe("none");
  });

  it("resolves a single entity", () => {
    const body = new Body();
    const adapter = adaptTarget(body);

    expect(adapter.kind).toBe("single");
    expect([...adapter.entities()]).toEqual([body]);
    expect(adapter.contains(body)).toBe(true);
    expect(adapter.contains(new Body())).toBe(false);
    expect(adapter.describe()).toBe("Body");
  });

  it("resolves any iterable to a live collection", () => {
    const a = new Body();
    const group = new BodyGroup([a]);
    const adapter = adaptTarget(group);
    expect(adapter.kind).toBe("many");

    const b = new Body();
    group.add(b);

    expect([...adapter.entities()]).toEqual([a, b]);
    expect(adapter.contains(b)).toBe(true);
    expect(adapter.describe()).toBe("BodyGroup(2)");
  });

  it("describes arrays and plain objects", () => {
    expect(adaptTarget([new Body(), new Body(), new Body()]).describe()).toBe("Array(3)");
    expect(adaptTarget({ hp: 3 }).describe()).toBe("Object");
  });
});

// ---------------------------------------------------------------------------
// Reference entities
// ---------------------------------------------------------------------------

describe("Body", () => {
  it("derives edges from its center and size", () => {
    const body = new Body({ x: 10, y: 20, width: 4, height: 6 });

    expect(body.left).toBe(8);
    expect(body.right).toBe(12);
    expect(body.bottom).toBe(17);
    expect(body.top).toBe(23);
  });

  it("moves when an edge is assigned", () => {
    const body = new Body({ x: 10, y: 20, width: 4, height: 6 });

    body.left = 0;
    body.top = 100;

    expect(body.x).toBe(2);
    expect(body.y).toBe(97);
  });

  it("update integrates velocity and spin", () => {
    const body = new Body({ changeX: 2, changeY: -1, changeAngle: 15 });
    body.update();
    body.update();

    expect(body.x).toBe(4);
    expect(body.y).toBe(-2);
    expect(body.angle).toBe(30);
  });

  it("satisfies the entity contracts", () => {
    expect(isMovable(new Body())).toBe(true);
    expect(isRotatable(new Body())).toBe(true);
    expect(isMovable({ left: 0, right: 1 })).toBe(false);
    expect(isMovable(null)).toBe(false);
    expect(isRotatable({ changeAngle: "fast" })).toBe(false);
  });
});

describe("BodyGroup", () => {
  it("ignores duplicates and supports removal", () => {
    const a = new Body();
    const b = new Body();
    const group = new BodyGroup([a, a, b]);

    expect(group.size).toBe(2);
    group.remove(a);
    expect(group.has(a)).toBe(false);
    expect([...group]).toEqual([b]);
  });

  it("update integrates every member", () => {
    const a = new Body({ changeX: 1 });
    const b = new Body({ changeY: 2 });
    const group = new BodyGroup([a, b]);

    group.update();

    expect(a.x).toBe(1);
    expect(b.y).toBe(2);
  });
});
