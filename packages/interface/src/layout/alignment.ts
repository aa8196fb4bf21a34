import { Vector2 } from "@babylonjs/core/Maths/math.vector.js";
import type { DataNode } from "../data/data-node";
import { traceNode } from "../data/diagnostics";

/**
 * Per-axis alignment: -1 pins to the left/top edge, 1 to the right/bottom
 * edge and 0 centers.
 */
export type Alignment = Vector2;

/**
 * Reads alignment keywords from the node's tokens, starting at `start`.
 * Axes that no keyword mentions keep their value from `alignment`.
 */
export const parseAlignment = (
  node: DataNode,
  alignment: Alignment = Vector2.Zero(),
  start = 1,
): Alignment => {
  let x = alignment.x;
  let y = alignment.y;
  for (let i = start; i < node.size; ++i) {
    const token = node.token(i);
    switch (token) {
      case "left":
        x = -1;
        break;
      case "right":
        x = 1;
        break;
      case "top":
        y = -1;
        break;
      case "bottom":
        y = 1;
        break;
      default:
        traceNode(node, "Unrecognized interface element alignment", token);
    }
  }

  return new Vector2(x, y);
};
