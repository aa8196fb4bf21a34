import type { Color4 } from "@babylonjs/core/Maths/math.color.js";
import type { Rectangle } from "@hudkit/shared";
import { DEFAULT_BAR_WIDTH, THEME_COLORS } from "../constants";
import type { DataNode } from "../data/data-node";
import type { Alignment } from "../layout/alignment";
import type { DrawFrame } from "../runtime/renderer";
import type { ColorLookup } from "../runtime/resources";
import { InterfaceElement } from "./interface-element";
import type { ActivationState, ElementLoadContext } from "./types";

export type BarElementKind = "bar" | "ring";

export const BAR_ELEMENT_KINDS: readonly BarElementKind[] = ["bar", "ring"];

/**
 * A filled stretch of a bar, as fractions of the bar's full length.
 */
export interface BarRun {
  start: number;
  end: number;
}

/**
 * Splits the filled part of a bar into runs. With segments, the bar is cut
 * into that many equal runs separated by gaps as long as the stroke is wide.
 *
 * @param value - fill fraction, usually in [0, 1].
 * @param segments - segment count, or 0 for one continuous run.
 * @param width - stroke width in pixels.
 * @param length - full bar length in pixels.
 */
export const computeBarRuns = (
  value: number,
  segments: number,
  width: number,
  length: number,
): BarRun[] => {
  if (!(length > 0)) {
    return [];
  }

  const empty = segments ? width / length : 0;
  const filled = segments ? (1 - empty * (segments - 1)) / segments : 1;
  // Negative segment counts or stroke widths would step backwards forever.
  if (!(filled + empty > 0)) {
    return [];
  }

  const runs: BarRun[] = [];
  let v = 0;
  while (v < value) {
    const start = v;
    v += filled;
    runs.push({ start, end: Math.min(v, value) });
    v += empty;
  }
  return runs;
};

/**
 * Segment counts of one or less mean an unsegmented bar.
 */
export const normalizeSegments = (segments: number): number => (segments <= 1 ? 0 : segments);

/**
 * Progress indicator for a named value: a straight `bar` drawn from the
 * bottom right corner of its box toward the top left, or a circular `ring`.
 */
export class BarElement extends InterfaceElement {
  private readonly name: string;
  private readonly isRing: boolean;
  private color: Color4 | undefined;
  private width = DEFAULT_BAR_WIDTH;
  private readonly palette: ColorLookup;

  constructor(node: DataNode, globalAlignment: Alignment, context: ElementLoadContext) {
    super(context.conditions);
    this.palette = context.resources.colors;
    this.name = node.token(1);
    this.isRing = node.token(0) === "ring";

    this.load(node, globalAlignment);

    this.color ??= this.palette.get(THEME_COLORS.active);
  }

  get valueName(): string {
    return this.name;
  }

  protected override parseAttribute(line: DataNode): boolean {
    const key = line.token(0);
    if (key === "color" && line.size >= 2) {
      this.color = this.palette.get(line.token(1));
    } else if (key === "size" && line.size >= 2) {
      this.width = line.value(1);
    } else {
      return false;
    }
    return true;
  }

  protected override drawContent(rect: Rectangle, frame: DrawFrame, _state: ActivationState): void {
    const { info, renderer } = frame;
    const value = info.barValue(this.name);
    const segments = normalizeSegments(info.barSegments(this.name));

    // Elements that failed to load fully draw nothing.
    const color = this.color;
    if (!color || !this.width || !value) {
      return;
    }

    if (this.isRing) {
      if (!rect.width || !rect.height) {
        return;
      }
      renderer.drawRing(rect.center, 0.5 * rect.width, this.width, value, color, segments);
      return;
    }

    // The bar fills from the bottom right corner toward the top left.
    const start = rect.bottomRight;
    const direction = rect.dimensions.negate();
    const runs = computeBarRuns(value, segments, this.width, direction.length());
    for (const run of runs) {
      renderer.drawLine(
        start.add(direction.scale(run.start)),
        start.add(direction.scale(run.end)),
        this.width,
        color,
      );
    }
  }
}
