import type { DataNode } from "../data/data-node";
import type { Alignment } from "../layout/alignment";
import { BAR_ELEMENT_KINDS, BarElement } from "./bar-element";
import { IMAGE_ELEMENT_KINDS, ImageElement } from "./image-element";
import type { InterfaceElement } from "./interface-element";
import { TEXT_ELEMENT_KINDS, TextElement } from "./text-element";
import type { ElementLoadContext } from "./types";

type ElementConstructor = new (
  node: DataNode,
  globalAlignment: Alignment,
  context: ElementLoadContext,
) => InterfaceElement;

const ELEMENT_CONSTRUCTORS = new Map<string, ElementConstructor>([
  ...IMAGE_ELEMENT_KINDS.map((kind): [string, ElementConstructor] => [kind, ImageElement]),
  ...TEXT_ELEMENT_KINDS.map((kind): [string, ElementConstructor] => [kind, TextElement]),
  ...BAR_ELEMENT_KINDS.map((kind): [string, ElementConstructor] => [kind, BarElement]),
]);

export const isElementKeyword = (keyword: string): boolean => ELEMENT_CONSTRUCTORS.has(keyword);

/**
 * Builds the element a node describes. Returns undefined for keywords that
 * are not element kinds, and for elements with no name token.
 */
export const createElement = (
  node: DataNode,
  globalAlignment: Alignment,
  context: ElementLoadContext,
): InterfaceElement | undefined => {
  const Element = ELEMENT_CONSTRUCTORS.get(node.token(0));
  if (!Element || node.size < 2) {
    return undefined;
  }
  return new Element(node, globalAlignment, context);
};
