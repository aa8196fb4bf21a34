import type { Color4 } from "@babylonjs/core/Maths/math.color.js";

/**
 * A loaded image, identified by name. Only its pixel size matters for layout.
 */
export interface Sprite {
  readonly name: string;
  readonly width: number;
  readonly height: number;
}

export interface SpriteLookup {
  get(name: string): Sprite | undefined;
}

/**
 * Named color palette. Returns undefined for names it does not define.
 */
export interface ColorLookup {
  get(name: string): Color4 | undefined;
}

export interface Font {
  width(text: string): number;
  height(): number;
}

/**
 * Fonts keyed by point size.
 */
export interface FontLookup {
  get(size: number): Font;
}

/**
 * Registries consulted while an interface is being loaded.
 */
export interface InterfaceResources {
  sprites: SpriteLookup;
  colors: ColorLookup;
}
