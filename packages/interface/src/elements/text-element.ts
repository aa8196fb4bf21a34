import { Vector2 } from "@babylonjs/core/Maths/math.vector.js";
import type { Color4 } from "@babylonjs/core/Maths/math.color.js";
import type { Rectangle } from "@hudkit/shared";
import { DEFAULT_FONT_SIZE, THEME_COLORS } from "../constants";
import type { DataNode } from "../data/data-node";
import type { Alignment } from "../layout/alignment";
import type { Information, ZoneTarget } from "../runtime/information";
import type { DrawFrame } from "../runtime/renderer";
import type { ColorLookup } from "../runtime/resources";
import { InterfaceElement } from "./interface-element";
import { ActivationState, type ElementLoadContext, type StateValues } from "./types";

export type TextElementKind = "label" | "string" | "button";

export const TEXT_ELEMENT_KINDS: readonly TextElementKind[] = ["label", "string", "button"];

/**
 * Text drawn in one of three modes: a fixed `label`, a `string` looked up by
 * name each frame, or a `button` whose first token is the key it triggers.
 */
export class TextElement extends InterfaceElement {
  private readonly colors: StateValues<Color4> = [undefined, undefined, undefined];
  private readonly text: string;
  private readonly isDynamic: boolean;
  /** Empty unless this is a button. */
  private readonly buttonKey: string;
  private fontSize = DEFAULT_FONT_SIZE;
  private readonly palette: ColorLookup;

  constructor(node: DataNode, globalAlignment: Alignment, context: ElementLoadContext) {
    super(context.conditions);
    this.palette = context.resources.colors;
    this.isDynamic = node.token(0) === "string";
    if (node.token(0) === "button") {
      this.buttonKey = Array.from(node.token(1))[0] ?? "";
      this.text = node.token(2);
    } else {
      this.buttonKey = "";
      this.text = node.token(1);
    }

    this.load(node, globalAlignment);
    this.fillDefaultColors();
  }

  get isButton(): boolean {
    return this.buttonKey !== "";
  }

  getText(info: Information): string {
    return this.isDynamic ? info.getString(this.text) : this.text;
  }

  getColor(state: ActivationState): Color4 | undefined {
    return this.colors[state];
  }

  protected override parseAttribute(line: DataNode): boolean {
    const key = line.token(0);
    if (line.size < 2) {
      return false;
    }
    switch (key) {
      case "size":
        this.fontSize = line.value(1);
        return true;
      case "color":
        this.colors[ActivationState.Active] = this.palette.get(line.token(1));
        return true;
      case "inactive":
        this.colors[ActivationState.Inactive] = this.palette.get(line.token(1));
        return true;
      case "hover":
        this.colors[ActivationState.Hover] = this.palette.get(line.token(1));
        return true;
      default:
        return false;
    }
  }

  protected override nativeDimensions(frame: DrawFrame, _state: ActivationState): Vector2 {
    const font = frame.fonts.get(this.fontSize);
    return new Vector2(font.width(this.getText(frame.info)), font.height());
  }

  protected override drawContent(rect: Rectangle, frame: DrawFrame, state: ActivationState): void {
    // Elements that failed to load fully may have no color for this state.
    const color = this.colors[state];
    if (!color) {
      return;
    }
    frame.renderer.drawText(this.getText(frame.info), frame.fonts.get(this.fontSize), rect.topLeft, color);
  }

  protected override placeZone(box: Rectangle, zones: ZoneTarget): void {
    if (this.isButton) {
      zones.addZone(box, this.buttonKey);
    }
  }

  // Labels default to "medium" and strings to "bright". Buttons without a
  // color take their state colors from the theme.
  private fillDefaultColors(): void {
    const colors = this.colors;
    if (!colors[ActivationState.Active] && !this.isButton) {
      colors[ActivationState.Active] = this.palette.get(
        this.isDynamic ? THEME_COLORS.bright : THEME_COLORS.medium,
      );
    }

    const active = colors[ActivationState.Active];
    if (!active) {
      colors[ActivationState.Active] = this.palette.get(THEME_COLORS.active);
      colors[ActivationState.Inactive] ??= this.palette.get(THEME_COLORS.inactive);
      colors[ActivationState.Hover] ??= this.palette.get(THEME_COLORS.hover);
    } else {
      colors[ActivationState.Inactive] ??= active;
      colors[ActivationState.Hover] ??= active;
    }
  }
}
