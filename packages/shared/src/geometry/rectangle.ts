import { Vector2 } from "@babylonjs/core/Maths/math.vector.js";

/**
 * Axis-aligned rectangle stored as a center point and dimensions.
 * Screen coordinates: x grows to the right, y grows downward.
 *
 * A dimension of 0 on an axis means the owner has not constrained that axis.
 * Instances are never mutated; every operation returns a new rectangle.
 */
export class Rectangle {
  readonly center: Vector2;
  readonly dimensions: Vector2;

  constructor(center: Vector2 = Vector2.Zero(), dimensions: Vector2 = Vector2.Zero()) {
    this.center = center.clone();
    this.dimensions = dimensions.clone();
  }

  /**
   * Rectangle spanning two opposite corners, given in any order.
   */
  static withCorners(a: Vector2, b: Vector2): Rectangle {
    const minX = Math.min(a.x, b.x);
    const minY = Math.min(a.y, b.y);
    const maxX = Math.max(a.x, b.x);
    const maxY = Math.max(a.y, b.y);
    return new Rectangle(
      new Vector2((minX + maxX) / 2, (minY + maxY) / 2),
      new Vector2(maxX - minX, maxY - minY),
    );
  }

  static fromCorner(topLeft: Vector2, dimensions: Vector2): Rectangle {
    return new Rectangle(topLeft.add(dimensions.scale(0.5)), dimensions);
  }

  get width(): number {
    return this.dimensions.x;
  }

  get height(): number {
    return this.dimensions.y;
  }

  get left(): number {
    return this.center.x - this.dimensions.x / 2;
  }

  get right(): number {
    return this.center.x + this.dimensions.x / 2;
  }

  get top(): number {
    return this.center.y - this.dimensions.y / 2;
  }

  get bottom(): number {
    return this.center.y + this.dimensions.y / 2;
  }

  get topLeft(): Vector2 {
    return new Vector2(this.left, this.top);
  }

  get topRight(): Vector2 {
    return new Vector2(this.right, this.top);
  }

  get bottomLeft(): Vector2 {
    return new Vector2(this.left, this.bottom);
  }

  get bottomRight(): Vector2 {
    return new Vector2(this.right, this.bottom);
  }

  /**
   * Left and top edges are inside the rectangle, right and bottom edges are not.
   */
  contains(point: Vector2): boolean {
    return !(
      point.x < this.left ||
      point.y < this.top ||
      point.x >= this.right ||
      point.y >= this.bottom
    );
  }

  translate(offset: Vector2): Rectangle {
    return new Rectangle(this.center.add(offset), this.dimensions);
  }

  withCenter(center: Vector2): Rectangle {
    return new Rectangle(center, this.dimensions);
  }
}
