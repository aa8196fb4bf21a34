import { describe, expect, it } from "vitest";
import { Vector2 } from "@babylonjs/core/Maths/math.vector.js";
import { createDataNode } from "../data/data-node";
import { expectVector } from "../test-utils/assertions";
import {
  MapColorLookup,
  MapSpriteLookup,
  TEST_PALETTE,
  createFrame,
  createResources,
} from "../test-utils/fakes";
import type { InterfaceResources } from "../runtime/resources";
import { BarElement, computeBarRuns, normalizeSegments } from "./bar-element";

const bar = (
  tokens: string[],
  lines: (string | number)[][] = [],
  resources: InterfaceResources = createResources(),
): BarElement =>
  new BarElement(
    createDataNode(
      tokens,
      lines.map((line) => createDataNode(line)),
    ),
    Vector2.Zero(),
    { resources, conditions: { visibleIf: "", activeIf: "" } },
  );

describe("computeBarRuns", () => {
  it("draws one continuous run without segments", () => {
    expect(computeBarRuns(0.5, 0, 2, 100)).toEqual([{ start: 0, end: 0.5 }]);
  });

  it("splits a full bar into equal runs with stroke-width gaps", () => {
    const runs = computeBarRuns(1, 4, 2, 100);

    expect(runs).toHaveLength(4);
    expect(runs[0]?.start).toBe(0);
    expect(runs[0]?.end).toBeCloseTo(0.235);
    expect(runs[1]?.start).toBeCloseTo(0.255);
    expect(runs[3]?.end).toBeCloseTo(1);

    const filled = runs.reduce((total, run) => total + (run.end - run.start), 0);
    const gaps = runs.slice(1).map((run, index) => run.start - (runs[index]?.end ?? 0));
    expect(gaps).toHaveLength(3);
    gaps.forEach((gap) => expect(gap).toBeCloseTo(0.02));
    expect(filled + gaps.length * 0.02).toBeCloseTo(1);
  });

  it("stops partway through a run at the current value", () => {
    const runs = computeBarRuns(0.3, 4, 2, 100);

    expect(runs).toHaveLength(2);
    expect(runs[1]?.start).toBeCloseTo(0.255);
    expect(runs[1]?.end).toBe(0.3);
  });

  it("draws nothing for an empty value or a bar with no length", () => {
    expect(computeBarRuns(0, 0, 2, 100)).toEqual([]);
    expect(computeBarRuns(1, 3, 2, 0)).toEqual([]);
  });

  it("draws nothing when a segment and its gap do not advance along the bar", () => {
    expect(computeBarRuns(1, -1, 2, 100)).toEqual([]);
    expect(computeBarRuns(1, 2, -200, 100)).toEqual([]);
  });
});

describe("normalizeSegments", () => {
  it("treats one segment or fewer as no segmentation", () => {
    expect(normalizeSegments(0)).toBe(0);
    expect(normalizeSegments(0.5)).toBe(0);
    expect(normalizeSegments(1)).toBe(0);
    expect(normalizeSegments(3)).toBe(3);
  });
});

describe("BarElement", () => {
  it("fills from the bottom right corner toward the top left", () => {
    const element = bar(["bar", "fuel"], [["from", -50, -5, "to", 50, 5]]);
    const frame = createFrame();
    frame.info.barValues.set("fuel", 0.5);

    element.drawAt(Vector2.Zero(), frame);

    const lines = frame.renderer.callsOf("line");
    expect(lines).toHaveLength(1);
    expectVector(lines[0]?.from ?? Vector2.Zero(), 50, 5);
    expectVector(lines[0]?.to ?? Vector2.Zero(), 0, 0);
    expect(lines[0]?.width).toBe(2);
    expect(lines[0]?.color).toBe(TEST_PALETTE.active);
  });

  it("draws one line per segment", () => {
    const element = bar(["bar", "shields"], [["from", 0, 0, "to", 0, 100], ["size", 4], ["color", "blue"]]);
    const frame = createFrame();
    frame.info.barValues.set("shields", 1);
    frame.info.segments.set("shields", 3);

    element.drawAt(Vector2.Zero(), frame);

    const lines = frame.renderer.callsOf("line");
    expect(lines).toHaveLength(3);
    lines.forEach((line) => {
      expect(line.width).toBe(4);
      expect(line.color).toBe(TEST_PALETTE.blue);
    });
    // 100 long with two 4 pixel gaps leaves three 30.667 pixel runs.
    expectVector(lines[0]?.from ?? Vector2.Zero(), 0, 100);
    expect(lines[0]?.to.y).toBeCloseTo(100 - 92 / 3);
    expect(lines[1]?.from.y).toBeCloseTo(100 - 92 / 3 - 4);
    expect(lines[2]?.to.y).toBeCloseTo(0);
  });

  it("treats a single segment as a continuous bar", () => {
    const element = bar(["bar", "heat"], [["from", 0, 0, "to", 0, 100]]);
    const frame = createFrame();
    frame.info.barValues.set("heat", 1);
    frame.info.segments.set("heat", 1);

    element.drawAt(Vector2.Zero(), frame);

    expect(frame.renderer.callsOf("line")).toHaveLength(1);
  });

  it("draws nothing without a value, width or color", () => {
    const frame = createFrame();
    frame.info.barValues.set("hull", 0.5);
    const noColors = { sprites: new MapSpriteLookup(), colors: new MapColorLookup({}) };

    bar(["bar", "empty"], [["from", 0, 0, "to", 10, 10]]).drawAt(Vector2.Zero(), frame);
    bar(["bar", "hull"], [["from", 0, 0, "to", 10, 10], ["size", 0]]).drawAt(Vector2.Zero(), frame);
    bar(["bar", "hull"], [["from", 0, 0, "to", 10, 10]], noColors).drawAt(Vector2.Zero(), frame);

    expect(frame.renderer.calls).toHaveLength(0);
  });

  it("draws rings with their radius, stroke and segments", () => {
    const element = bar(
      ["ring", "hull"],
      [["center", 0, 0], ["dimensions", 60, 60], ["color", "green"], ["size", 3]],
    );
    const frame = createFrame();
    frame.info.barValues.set("hull", 0.75);
    frame.info.segments.set("hull", 6);

    element.drawAt(new Vector2(100, 100), frame);

    const [ring] = frame.renderer.callsOf("ring");
    expectVector(ring?.center ?? Vector2.Zero(), 100, 100);
    expect(ring?.radius).toBe(30);
    expect(ring?.width).toBe(3);
    expect(ring?.fill).toBe(0.75);
    expect(ring?.color).toBe(TEST_PALETTE.green);
    expect(ring?.segments).toBe(6);
  });

  it("skips rings with no size", () => {
    const element = bar(["ring", "hull"], [["width", 40]]);
    const frame = createFrame();
    frame.info.barValues.set("hull", 1);

    element.drawAt(Vector2.Zero(), frame);

    expect(frame.renderer.calls).toHaveLength(0);
  });

  it("exposes the value name it reads", () => {
    expect(bar(["bar", "fuel"]).valueName).toBe("fuel");
  });
});
