import { toFiniteNumber } from "@hudkit/shared";

/**
 * Where a node came from, for diagnostics.
 */
export interface DataNodeLocation {
  file?: string;
  line?: number;
}

/**
 * One line of a parsed layout file: its tokens plus the indented lines below it.
 * Produced by the data-file parser; the interface engine only reads it.
 */
export interface DataNode {
  readonly size: number;
  readonly children: readonly DataNode[];
  readonly location?: DataNodeLocation;
  /** Token at the index, or "" past the end. */
  token(index: number): string;
  /** Token at the index read as a number, or 0 when it is not numeric. */
  value(index: number): number;
  tokens(): readonly string[];
}

class MemoryDataNode implements DataNode {
  readonly children: readonly DataNode[];
  readonly location?: DataNodeLocation;
  private readonly values: readonly string[];

  constructor(tokens: readonly string[], children: readonly DataNode[], location?: DataNodeLocation) {
    this.values = [...tokens];
    this.children = [...children];
    this.location = location;
  }

  get size(): number {
    return this.values.length;
  }

  token(index: number): string {
    return this.values[index] ?? "";
  }

  value(index: number): number {
    return toFiniteNumber(this.values[index]);
  }

  tokens(): readonly string[] {
    return this.values;
  }
}

type TokenInput = string | number;

/**
 * Builds a node from tokens that have already been split.
 */
export const createDataNode = (
  tokens: readonly TokenInput[],
  children: readonly DataNode[] = [],
  location?: DataNodeLocation,
): DataNode => {
  return new MemoryDataNode(
    tokens.map((token) => String(token)),
    children,
    location,
  );
};

const quoteToken = (token: string): string => {
  if (token.includes('"')) {
    return `\`${token}\``;
  }
  return token === "" || /\s/.test(token) ? `"${token}"` : token;
};

/**
 * Renders a node's tokens the way they would appear in a layout file.
 */
export const formatDataNode = (node: DataNode): string => node.tokens().map(quoteToken).join(" ");
