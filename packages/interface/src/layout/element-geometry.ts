import { Vector2 } from "@babylonjs/core/Maths/math.vector.js";
import { Rectangle, isZeroPoint } from "@hudkit/shared";
import type { DataNode } from "../data/data-node";
import { traceNode } from "../data/diagnostics";
import { parseAlignment, type Alignment } from "./alignment";

/**
 * Geometry of an element while its directives are being applied.
 */
export interface ElementGeometry {
  /** Bounding box relative to the interface anchor. */
  bounds: Rectangle;
  /**
   * Set once the element is positioned with `center`, or from the start when
   * the interface itself is centered. Resizing a centered element keeps its
   * center in place instead of keeping an edge in place.
   */
  isCentered: boolean;
  alignment: Alignment;
  padding: Vector2;
}

/**
 * Offered every line that is not a geometry directive. Returns false when the
 * line means nothing to the element either.
 */
export type AttributeParser = (line: DataNode) => boolean;

export const initialGeometry = (globalAlignment: Alignment): ElementGeometry => ({
  bounds: new Rectangle(),
  isCentered: isZeroPoint(globalAlignment),
  alignment: Vector2.Zero(),
  padding: Vector2.Zero(),
});

const resize = (
  geometry: ElementGeometry,
  globalAlignment: Alignment,
  width: number | undefined,
  height: number | undefined,
): Rectangle => {
  const { bounds, isCentered } = geometry;
  let centerX = bounds.center.x;
  let centerY = bounds.center.y;
  let dimensionX = bounds.width;
  let dimensionY = bounds.height;

  // Unless centered, keep the edge nearest the interface anchor fixed.
  if (width !== undefined) {
    if (!isCentered) {
      centerX += 0.5 * globalAlignment.x * (dimensionX - width);
    }
    dimensionX = width;
  }
  if (height !== undefined) {
    if (!isCentered) {
      centerY += 0.5 * globalAlignment.y * (dimensionY - height);
    }
    dimensionY = height;
  }

  return new Rectangle(new Vector2(centerX, centerY), new Vector2(dimensionX, dimensionY));
};

/**
 * Applies one directive line. Returns undefined when the line is not a
 * geometry directive, so the caller can hand it to the element kind.
 */
export const applyGeometryDirective = (
  geometry: ElementGeometry,
  line: DataNode,
  globalAlignment: Alignment,
): ElementGeometry | undefined => {
  const key = line.token(0);

  if (key === "align" && line.size > 1) {
    return { ...geometry, alignment: parseAlignment(line, geometry.alignment) };
  }

  const hasDimensions = key === "dimensions" && line.size >= 3;
  const hasWidth = hasDimensions || (key === "width" && line.size >= 2);
  const hasHeight = hasDimensions || (key === "height" && line.size >= 2);
  if (hasWidth || hasHeight) {
    const width = hasWidth ? line.value(1) : undefined;
    const height = hasHeight ? line.value(hasDimensions ? 2 : 1) : undefined;
    return { ...geometry, bounds: resize(geometry, globalAlignment, width, height) };
  }

  if (key === "center" && line.size >= 3) {
    return {
      ...geometry,
      isCentered: true,
      bounds: geometry.bounds.withCenter(new Vector2(line.value(1), line.value(2))),
    };
  }

  if (key === "from" && line.size >= 6 && line.token(3) === "to") {
    return {
      ...geometry,
      bounds: Rectangle.withCorners(
        new Vector2(line.value(1), line.value(2)),
        new Vector2(line.value(4), line.value(5)),
      ),
    };
  }

  if (key === "from" && line.size >= 3) {
    // The box grows away from the point, in the direction the element is aligned.
    const { dimensions } = geometry.bounds;
    const point = new Vector2(line.value(1), line.value(2));
    const offset = geometry.alignment.multiply(dimensions).scale(0.5);
    return { ...geometry, bounds: new Rectangle(point.subtract(offset), dimensions) };
  }

  if (key === "pad" && line.size >= 3) {
    return { ...geometry, padding: new Vector2(line.value(1), line.value(2)) };
  }

  return undefined;
};

/**
 * Folds the node's child lines, in order, into the element's final geometry.
 * A `previous` geometry keeps its bounds, alignment and padding, but whether
 * it resizes around its center is derived again from the global alignment.
 */
export const resolveElementGeometry = (
  node: DataNode,
  globalAlignment: Alignment,
  parseAttribute: AttributeParser = () => false,
  previous?: ElementGeometry,
): ElementGeometry => {
  const initial = previous
    ? { ...previous, isCentered: isZeroPoint(globalAlignment) }
    : initialGeometry(globalAlignment);

  return node.children.reduce<ElementGeometry>((geometry, line) => {
    const next = applyGeometryDirective(geometry, line, globalAlignment);
    if (next) {
      return next;
    }
    if (!parseAttribute(line)) {
      traceNode(line, "Unrecognized interface element attribute");
    }
    return geometry;
  }, initial);
};
