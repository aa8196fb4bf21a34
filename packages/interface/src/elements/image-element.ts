import { Vector2 } from "@babylonjs/core/Maths/math.vector.js";
import { Color4 } from "@babylonjs/core/Maths/math.color.js";
import type { Rectangle } from "@hudkit/shared";
import type { DataNode } from "../data/data-node";
import type { Alignment } from "../layout/alignment";
import type { Information } from "../runtime/information";
import type { DrawFrame } from "../runtime/renderer";
import type { Sprite, SpriteLookup } from "../runtime/resources";
import { InterfaceElement } from "./interface-element";
import { ActivationState, type ElementLoadContext, type StateValues } from "./types";

export type ImageElementKind = "sprite" | "image" | "outline";

export const IMAGE_ELEMENT_KINDS: readonly ImageElementKind[] = ["sprite", "image", "outline"];

const hasPixels = (sprite: Sprite | undefined): sprite is Sprite =>
  sprite !== undefined && sprite.width > 0 && sprite.height > 0;

/**
 * Scales a sprite uniformly so it fits inside the given bounds. An axis with
 * no size does not constrain the fit; when neither does, the sprite keeps its
 * pixel size.
 */
export const fitSpriteDimensions = (sprite: Sprite, bounds: Vector2): Vector2 => {
  const size = new Vector2(sprite.width, sprite.height);
  const xScale = bounds.x ? bounds.x / size.x : undefined;
  const yScale = bounds.y ? bounds.y / size.y : undefined;
  if (xScale === undefined && yScale === undefined) {
    return size;
  }
  return size.scale(Math.min(xScale ?? Number.POSITIVE_INFINITY, yScale ?? Number.POSITIVE_INFINITY));
};

/**
 * Draws a sprite. `sprite` elements name a fixed sprite and may give other
 * sprites for the inactive and hover states; `image` and `outline` elements
 * name a value the Information supplies each frame.
 */
export class ImageElement extends InterfaceElement {
  private readonly sprites: StateValues<Sprite> = [undefined, undefined, undefined];
  /** Dynamic sprite name; empty for fixed sprites. */
  private readonly name: string;
  private readonly isOutline: boolean;
  private isColored = false;
  private readonly spriteLookup: SpriteLookup;

  constructor(node: DataNode, globalAlignment: Alignment, context: ElementLoadContext) {
    super(context.conditions);
    this.spriteLookup = context.resources.sprites;
    this.isOutline = node.token(0) === "outline";
    if (node.token(0) === "sprite") {
      this.name = "";
      this.sprites[ActivationState.Active] = this.spriteLookup.get(node.token(1));
    } else {
      this.name = node.token(1);
    }

    this.load(node, globalAlignment);

    const active = this.sprites[ActivationState.Active];
    if (active) {
      this.sprites[ActivationState.Inactive] ??= active;
      this.sprites[ActivationState.Hover] ??= active;
    }
  }

  get isDynamic(): boolean {
    return this.name !== "";
  }

  protected override parseAttribute(line: DataNode): boolean {
    const key = line.token(0);
    if (key === "inactive" && line.size >= 2 && !this.isDynamic) {
      this.sprites[ActivationState.Inactive] = this.spriteLookup.get(line.token(1));
    } else if (key === "hover" && line.size >= 2 && !this.isDynamic) {
      this.sprites[ActivationState.Hover] = this.spriteLookup.get(line.token(1));
    } else if (key === "colored" && this.isOutline) {
      this.isColored = true;
    } else {
      return false;
    }
    return true;
  }

  protected override nativeDimensions(frame: DrawFrame, state: ActivationState): Vector2 {
    const sprite = this.getSprite(frame.info, state);
    if (!hasPixels(sprite)) {
      return Vector2.Zero();
    }
    return fitSpriteDimensions(sprite, this.bounds.dimensions);
  }

  protected override drawContent(rect: Rectangle, frame: DrawFrame, state: ActivationState): void {
    const { info, renderer } = frame;
    const sprite = this.getSprite(info, state);
    if (!hasPixels(sprite)) {
      return;
    }

    if (this.isOutline) {
      const color = this.isColored ? info.getOutlineColor() : new Color4(1, 1, 1, 1);
      renderer.drawOutline(
        sprite,
        rect.center,
        rect.dimensions,
        color,
        info.getSpriteUnit(this.name),
        info.getSpriteFrame(this.name),
      );
    } else {
      renderer.drawSprite(sprite, rect.center, rect.width / sprite.width);
    }
  }

  private getSprite(info: Information, state: ActivationState): Sprite | undefined {
    return this.isDynamic ? info.getSprite(this.name) : this.sprites[state];
  }
}
