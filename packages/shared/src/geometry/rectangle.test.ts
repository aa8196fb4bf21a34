import { describe, expect, it } from "vitest";
import { Vector2 } from "@babylonjs/core/Maths/math.vector.js";
import { Rectangle } from "./rectangle";

describe("Rectangle", () => {
  it("exposes edges and corners around its center", () => {
    const rect = new Rectangle(new Vector2(10, 20), new Vector2(40, 10));

    expect(rect.width).toBe(40);
    expect(rect.height).toBe(10);
    expect(rect.left).toBe(-10);
    expect(rect.right).toBe(30);
    expect(rect.top).toBe(15);
    expect(rect.bottom).toBe(25);
    expect(rect.topLeft.asArray()).toEqual([-10, 15]);
    expect(rect.bottomRight.asArray()).toEqual([30, 25]);
    expect(rect.topRight.asArray()).toEqual([30, 15]);
    expect(rect.bottomLeft.asArray()).toEqual([-10, 25]);
  });

  it("normalizes corners given in any order", () => {
    const a = Rectangle.withCorners(new Vector2(0, 0), new Vector2(100, 50));
    const b = Rectangle.withCorners(new Vector2(100, 50), new Vector2(0, 0));
    const c = Rectangle.withCorners(new Vector2(100, 0), new Vector2(0, 50));

    for (const rect of [a, b, c]) {
      expect(rect.topLeft.asArray()).toEqual([0, 0]);
      expect(rect.bottomRight.asArray()).toEqual([100, 50]);
      expect(rect.center.asArray()).toEqual([50, 25]);
    }
  });

  it("builds from a top-left corner", () => {
    const rect = Rectangle.fromCorner(new Vector2(-20, 4), new Vector2(40, 8));

    expect(rect.center.asArray()).toEqual([0, 8]);
    expect(rect.bottomRight.asArray()).toEqual([20, 12]);
  });

  it("treats left and top edges as inside and right and bottom as outside", () => {
    const rect = Rectangle.withCorners(new Vector2(0, 0), new Vector2(10, 10));

    expect(rect.contains(new Vector2(0, 0))).toBe(true);
    expect(rect.contains(new Vector2(5, 9.99))).toBe(true);
    expect(rect.contains(new Vector2(10, 5))).toBe(false);
    expect(rect.contains(new Vector2(5, 10))).toBe(false);
    expect(rect.contains(new Vector2(-0.01, 5))).toBe(false);
  });

  it("translates without touching the original", () => {
    const rect = new Rectangle(new Vector2(1, 2), new Vector2(3, 4));
    const moved = rect.translate(new Vector2(10, -10));

    expect(moved.center.asArray()).toEqual([11, -8]);
    expect(moved.dimensions.asArray()).toEqual([3, 4]);
    expect(rect.center.asArray()).toEqual([1, 2]);
  });

  it("defaults to an empty rectangle at the origin", () => {
    const rect = new Rectangle();

    expect(rect.center.asArray()).toEqual([0, 0]);
    expect(rect.dimensions.asArray()).toEqual([0, 0]);
    expect(rect.contains(new Vector2(0, 0))).toBe(false);
  });
});
