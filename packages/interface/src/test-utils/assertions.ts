import { expect } from "vitest";
import type { Vector2 } from "@babylonjs/core/Maths/math.vector.js";

/**
 * Compares vector components numerically, so -0 and 0 are equal.
 */
export const expectVector = (actual: Vector2, x: number, y: number): void => {
  expect(actual.x).toBeCloseTo(x, 6);
  expect(actual.y).toBeCloseTo(y, 6);
};
