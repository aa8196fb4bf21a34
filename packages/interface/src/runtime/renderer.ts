import type { Vector2 } from "@babylonjs/core/Maths/math.vector.js";
import type { Color4 } from "@babylonjs/core/Maths/math.color.js";
import type { Font, FontLookup, Sprite } from "./resources";
import type { Information, ZoneTarget } from "./information";

/**
 * Drawing primitives an interface renders through. Positions are in viewport
 * coordinates with the origin at the viewport center.
 */
export interface InterfaceRenderer {
  drawSprite(sprite: Sprite, center: Vector2, zoom: number): void;
  drawOutline(
    sprite: Sprite,
    center: Vector2,
    dimensions: Vector2,
    color: Color4,
    unit: Vector2,
    frame: number,
  ): void;
  drawLine(from: Vector2, to: Vector2, width: number, color: Color4): void;
  /**
   * @param fill - fraction of the ring to draw, starting at the top.
   * @param segments - number of segments to split the ring into, or 0 for a solid ring.
   */
  drawRing(center: Vector2, radius: number, width: number, fill: number, color: Color4, segments: number): void;
  drawText(text: string, font: Font, topLeft: Vector2, color: Color4): void;
}

/**
 * Everything a single draw pass needs.
 */
export interface DrawFrame {
  info: Information;
  renderer: InterfaceRenderer;
  fonts: FontLookup;
  /** When present, buttons register their clickable regions here. */
  zones?: ZoneTarget;
}
