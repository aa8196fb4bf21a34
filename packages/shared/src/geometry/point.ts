import { Vector2 } from "@babylonjs/core/Maths/math.vector.js";
import type { UiViewport } from "../ui/viewport";

/**
 * Returns true when both components are exactly zero.
 */
export const isZeroPoint = (point: Vector2): boolean => point.x === 0 && point.y === 0;

/**
 * Viewport dimensions as a point, for scaling against alignment vectors.
 */
export const viewportDimensions = (viewport: UiViewport): Vector2 =>
  new Vector2(viewport.width, viewport.height);
