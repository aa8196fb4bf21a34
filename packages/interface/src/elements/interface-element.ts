import { Vector2 } from "@babylonjs/core/Maths/math.vector.js";
import { Rectangle } from "@hudkit/shared";
import type { DataNode } from "../data/data-node";
import type { Alignment } from "../layout/alignment";
import { resolveElementGeometry, type ElementGeometry } from "../layout/element-geometry";
import type { Information, ZoneTarget } from "../runtime/information";
import type { DrawFrame } from "../runtime/renderer";
import { ActivationState, type ElementConditions } from "./types";

/**
 * Computes an element's state from its activation condition and the pointer.
 * Hover is only reported for active elements.
 */
export const resolveActivationState = (
  info: Information,
  activeIf: string,
  box: Rectangle,
): ActivationState => {
  if (!info.hasCondition(activeIf)) {
    return ActivationState.Inactive;
  }
  return box.contains(info.getPointer()) ? ActivationState.Hover : ActivationState.Active;
};

/**
 * Positions content of the given native size inside an element's bounds.
 * The content is pushed toward the aligned edge, minus the padding.
 */
export const placeWithinBounds = (
  bounds: Rectangle,
  anchor: Vector2,
  alignment: Alignment,
  padding: Vector2,
  nativeDimensions: Vector2,
): Rectangle => {
  const slack = bounds.dimensions.subtract(nativeDimensions).scale(0.5).subtract(padding);
  const center = bounds.center.add(anchor).add(alignment.multiply(slack));
  return new Rectangle(center, nativeDimensions);
};

/**
 * Base class for everything an interface draws. Subclasses parse their own
 * attribute lines, report the size of their content and draw it; this class
 * owns the geometry and the per-frame visibility and state logic.
 */
export abstract class InterfaceElement {
  private geometry: ElementGeometry = {
    bounds: new Rectangle(),
    isCentered: true,
    alignment: Vector2.Zero(),
    padding: Vector2.Zero(),
  };
  private readonly conditions: ElementConditions;

  protected constructor(conditions: ElementConditions) {
    this.conditions = { ...conditions };
  }

  /**
   * Bounding box relative to the interface anchor.
   */
  get bounds(): Rectangle {
    return this.geometry.bounds;
  }

  get alignment(): Alignment {
    return this.geometry.alignment;
  }

  get padding(): Vector2 {
    return this.geometry.padding;
  }

  get visibleIf(): string {
    return this.conditions.visibleIf;
  }

  get activeIf(): string {
    return this.conditions.activeIf;
  }

  /**
   * Draws this element relative to the anchor. Buttons also register their
   * clickable zone, even when inactive, so the owner can explain why.
   */
  drawAt(anchor: Vector2, frame: DrawFrame): void {
    const { info } = frame;
    if (!info.hasCondition(this.conditions.visibleIf)) {
      return;
    }

    const box = this.bounds.translate(anchor);
    const state = resolveActivationState(info, this.conditions.activeIf, box);
    if (frame.zones) {
      this.placeZone(box, frame.zones);
    }

    const nativeDimensions = this.nativeDimensions(frame, state);
    const rect = placeWithinBounds(this.bounds, anchor, this.alignment, this.padding, nativeDimensions);
    this.drawContent(rect, frame, state);
  }

  /**
   * Must be called by subclass constructors once their own fields exist,
   * since it hands unrecognized lines to parseAttribute().
   */
  protected load(node: DataNode, globalAlignment: Alignment): void {
    this.geometry = resolveElementGeometry(node, globalAlignment, (line) =>
      this.parseAttribute(line),
    );
  }

  protected parseAttribute(_line: DataNode): boolean {
    return false;
  }

  protected nativeDimensions(_frame: DrawFrame, _state: ActivationState): Vector2 {
    return this.bounds.dimensions;
  }

  protected placeZone(_box: Rectangle, _zones: ZoneTarget): void {}

  protected abstract drawContent(rect: Rectangle, frame: DrawFrame, state: ActivationState): void;
}
