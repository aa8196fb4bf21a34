import type { Vector2 } from "@babylonjs/core/Maths/math.vector.js";
import type { Color4 } from "@babylonjs/core/Maths/math.color.js";
import type { Rectangle } from "@hudkit/shared";
import type { Sprite } from "./resources";

/**
 * Per-frame values an interface displays. The owning screen decides what
 * each name maps to; the interface only asks.
 */
export interface Information {
  /** Condition lookup. The empty name is always true. */
  hasCondition(name: string): boolean;
  /** Fill fraction in [0, 1] for the named bar or ring. */
  barValue(name: string): number;
  barSegments(name: string): number;
  getString(name: string): string;
  getSprite(name: string): Sprite | undefined;
  /** Facing direction (unit vector) used when drawing a sprite as an outline. */
  getSpriteUnit(name: string): Vector2;
  getSpriteFrame(name: string): number;
  /** Pointer position in viewport coordinates, relative to the viewport center. */
  getPointer(): Vector2;
  getOutlineColor(): Color4;
}

/**
 * Receives clickable regions for buttons, e.g. the panel that owns the interface.
 */
export interface ZoneTarget {
  addZone(rect: Rectangle, key: string): void;
}
