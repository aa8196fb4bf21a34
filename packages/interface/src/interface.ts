import { Vector2 } from "@babylonjs/core/Maths/math.vector.js";
import { Rectangle, readViewport, viewportDimensions, type UiViewport } from "@hudkit/shared";
import type { DataNode } from "./data/data-node";
import { traceNode } from "./data/diagnostics";
import { createElement, isElementKeyword } from "./elements/element-factory";
import type { InterfaceElement } from "./elements/interface-element";
import type { ElementConditions } from "./elements/types";
import { parseAlignment, type Alignment } from "./layout/alignment";
import { resolveElementGeometry, type ElementGeometry } from "./layout/element-geometry";
import { logger } from "./logger";
import type { DrawFrame } from "./runtime/renderer";
import type { InterfaceResources } from "./runtime/resources";

/**
 * Configuration options for an Interface.
 */
export interface InterfaceOptions {
  resources: InterfaceResources;
  /** Viewport used to place the anchor. Defaults to the browser window size. */
  viewport?: UiViewport;
}

/**
 * A screen layout loaded from a layout node: elements drawn in order, plus
 * named points that other code can query to position its own drawing.
 *
 * Everything is stored relative to the anchor, which is the corner, edge
 * center or center of the viewport that the interface is aligned to.
 */
export class Interface {
  private readonly elements: InterfaceElement[] = [];
  private readonly points = new Map<string, ElementGeometry>();
  private readonly resources: InterfaceResources;
  private alignment: Alignment = Vector2.Zero();
  private viewport: UiViewport;
  private name = "";

  constructor(options: InterfaceOptions) {
    this.resources = options.resources;
    this.viewport = options.viewport ?? readViewport();
  }

  /**
   * Loads an `interface <name> [alignment...]` node. Nodes without a name are
   * ignored. Loading the same interface again adds to what it already has.
   */
  load(node: DataNode): void {
    if (node.size < 2) {
      return;
    }

    this.name = node.token(1);
    this.alignment = parseAlignment(node, this.alignment, 2);

    // "visible if" and "active if" apply to every element after them.
    const conditions: ElementConditions = { visibleIf: "", activeIf: "" };
    for (const child of node.children) {
      const key = child.token(0);
      if ((key === "point" || key === "box") && child.size >= 2) {
        this.loadPoint(child);
      } else if (key === "visible" || key === "active") {
        const condition = child.size >= 3 && child.token(1) === "if" ? child.token(2) : "";
        if (key === "visible") {
          conditions.visibleIf = condition;
        } else {
          conditions.activeIf = condition;
        }
      } else if (isElementKeyword(key)) {
        const element = createElement(child, this.alignment, {
          resources: this.resources,
          conditions,
        });
        if (element) {
          this.elements.push(element);
        }
      } else {
        traceNode(child, "Unrecognized interface element");
      }
    }

    logger.debug(
      { name: this.name, elements: this.elements.length, points: this.points.size },
      "Interface loaded",
    );
  }

  /**
   * Draws every visible element, in the order they were loaded.
   */
  draw(frame: DrawFrame): void {
    const anchor = this.getAnchor();
    for (const element of this.elements) {
      element.drawAt(anchor, frame);
    }
  }

  hasPoint(name: string): boolean {
    return this.points.has(name);
  }

  /**
   * Center of the named point in viewport coordinates, or the origin if the
   * point is not defined.
   */
  getPoint(name: string): Vector2 {
    const point = this.points.get(name);
    if (!point) {
      return Vector2.Zero();
    }
    return point.bounds.center.add(this.getAnchor());
  }

  getSize(name: string): Vector2 {
    const point = this.points.get(name);
    if (!point) {
      return Vector2.Zero();
    }
    return point.bounds.dimensions.clone();
  }

  getBox(name: string): Rectangle {
    const point = this.points.get(name);
    if (!point) {
      return new Rectangle();
    }
    return point.bounds.translate(this.getAnchor());
  }

  /**
   * Viewport position that all element and point coordinates are relative to.
   */
  getAnchor(): Vector2 {
    return viewportDimensions(this.viewport).multiply(this.alignment).scale(0.5);
  }

  getName(): string {
    return this.name;
  }

  getAlignment(): Alignment {
    return this.alignment.clone();
  }

  getElements(): readonly InterfaceElement[] {
    return this.elements;
  }

  getViewport(): UiViewport {
    return { ...this.viewport };
  }

  setViewport(viewport: UiViewport): void {
    this.viewport = { ...viewport };
  }

  // A point declared twice continues from the geometry it already has.
  private loadPoint(node: DataNode): void {
    const name = node.token(1);
    const geometry = resolveElementGeometry(
      node,
      this.alignment,
      undefined,
      this.points.get(name),
    );
    this.points.set(name, geometry);
  }
}
