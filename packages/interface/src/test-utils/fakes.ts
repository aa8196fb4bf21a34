import { Vector2 } from "@babylonjs/core/Maths/math.vector.js";
import { Color4 } from "@babylonjs/core/Maths/math.color.js";
import type { Rectangle } from "@hudkit/shared";
import type { Information, ZoneTarget } from "../runtime/information";
import type { DrawFrame, InterfaceRenderer } from "../runtime/renderer";
import type {
  ColorLookup,
  Font,
  FontLookup,
  InterfaceResources,
  Sprite,
  SpriteLookup,
} from "../runtime/resources";

export const createSprite = (name: string, width: number, height: number): Sprite => ({
  name,
  width,
  height,
});

export class MapSpriteLookup implements SpriteLookup {
  private sprites = new Map<string, Sprite>();

  constructor(sprites: Sprite[] = []) {
    sprites.forEach((sprite) => this.sprites.set(sprite.name, sprite));
  }

  get(name: string): Sprite | undefined {
    return this.sprites.get(name);
  }
}

/**
 * Palette where every color is a distinct gray, so tests can tell them apart.
 */
export const TEST_PALETTE: Record<string, Color4> = {
  active: new Color4(0.8, 0.8, 0.8, 1),
  inactive: new Color4(0.3, 0.3, 0.3, 1),
  hover: new Color4(1, 1, 1, 1),
  bright: new Color4(0.9, 0.9, 0.9, 1),
  medium: new Color4(0.5, 0.5, 0.5, 1),
  red: new Color4(1, 0, 0, 1),
  green: new Color4(0, 1, 0, 1),
  blue: new Color4(0, 0, 1, 1),
};

export class MapColorLookup implements ColorLookup {
  constructor(private readonly colors: Record<string, Color4> = TEST_PALETTE) {}

  get(name: string): Color4 | undefined {
    return this.colors[name];
  }
}

/**
 * Font whose glyphs are all half as wide as the point size.
 */
export class FixedWidthFonts implements FontLookup {
  get(size: number): Font {
    return {
      width: (text: string) => (text.length * size) / 2,
      height: () => size,
    };
  }
}

export type RenderCall =
  | { type: "sprite"; sprite: Sprite; center: Vector2; zoom: number }
  | {
      type: "outline";
      sprite: Sprite;
      center: Vector2;
      dimensions: Vector2;
      color: Color4;
      unit: Vector2;
      frame: number;
    }
  | { type: "line"; from: Vector2; to: Vector2; width: number; color: Color4 }
  | {
      type: "ring";
      center: Vector2;
      radius: number;
      width: number;
      fill: number;
      color: Color4;
      segments: number;
    }
  | { type: "text"; text: string; font: Font; topLeft: Vector2; color: Color4 };

export class RecordingRenderer implements InterfaceRenderer {
  readonly calls: RenderCall[] = [];

  drawSprite(sprite: Sprite, center: Vector2, zoom: number): void {
    this.calls.push({ type: "sprite", sprite, center, zoom });
  }

  drawOutline(
    sprite: Sprite,
    center: Vector2,
    dimensions: Vector2,
    color: Color4,
    unit: Vector2,
    frame: number,
  ): void {
    this.calls.push({ type: "outline", sprite, center, dimensions, color, unit, frame });
  }

  drawLine(from: Vector2, to: Vector2, width: number, color: Color4): void {
    this.calls.push({ type: "line", from, to, width, color });
  }

  drawRing(
    center: Vector2,
    radius: number,
    width: number,
    fill: number,
    color: Color4,
    segments: number,
  ): void {
    this.calls.push({ type: "ring", center, radius, width, fill, color, segments });
  }

  drawText(text: string, font: Font, topLeft: Vector2, color: Color4): void {
    this.calls.push({ type: "text", text, font, topLeft, color });
  }

  callsOf<T extends RenderCall["type"]>(type: T): Extract<RenderCall, { type: T }>[] {
    return this.calls.filter((call): call is Extract<RenderCall, { type: T }> => call.type === type);
  }
}

export class RecordingZones implements ZoneTarget {
  readonly zones: { rect: Rectangle; key: string }[] = [];

  addZone(rect: Rectangle, key: string): void {
    this.zones.push({ rect, key });
  }
}

/**
 * Information backed by plain maps. Conditions not listed are false.
 */
export class StubInformation implements Information {
  conditions = new Set<string>();
  barValues = new Map<string, number>();
  segments = new Map<string, number>();
  strings = new Map<string, string>();
  sprites = new Map<string, Sprite>();
  pointer = new Vector2(-100000, -100000);
  outlineColor = new Color4(0, 0.5, 1, 1);

  hasCondition(name: string): boolean {
    return name === "" || this.conditions.has(name);
  }
  barValue(name: string): number {
    return this.barValues.get(name) ?? 0;
  }
  barSegments(name: string): number {
    return this.segments.get(name) ?? 0;
  }
  getString(name: string): string {
    return this.strings.get(name) ?? "";
  }
  getSprite(name: string): Sprite | undefined {
    return this.sprites.get(name);
  }
  getSpriteUnit(_name: string): Vector2 {
    return new Vector2(0, -1);
  }
  getSpriteFrame(_name: string): number {
    return 3;
  }
  getPointer(): Vector2 {
    return this.pointer;
  }
  getOutlineColor(): Color4 {
    return this.outlineColor;
  }
}

export const createResources = (sprites: Sprite[] = []): InterfaceResources => ({
  sprites: new MapSpriteLookup(sprites),
  colors: new MapColorLookup(),
});

export interface TestFrame extends DrawFrame {
  info: StubInformation;
  renderer: RecordingRenderer;
  zones: RecordingZones;
}

export const createFrame = (): TestFrame => ({
  info: new StubInformation(),
  renderer: new RecordingRenderer(),
  fonts: new FixedWidthFonts(),
  zones: new RecordingZones(),
});
