import { describe, expect, it } from "vitest";
import { createDataNode } from "./data/data-node";
import { InterfaceSet } from "./interface-set";
import { expectVector } from "./test-utils/assertions";
import { createFrame, createResources } from "./test-utils/fakes";

const interfaceNode = (tokens: string[], ...labels: string[]) =>
  createDataNode(
    tokens,
    labels.map((label) => createDataNode(["label", label])),
  );

const pointNode = (tokens: string[]) =>
  createDataNode(tokens, [createDataNode(["point", "center"], [createDataNode(["width", 20])])]);

describe("InterfaceSet", () => {
  it("loads interfaces by name", () => {
    const set = new InterfaceSet({ resources: createResources(), viewport: { width: 800, height: 600 } });

    set.load(interfaceNode(["interface", "hud"], "Cargo"));
    set.load(interfaceNode(["interface", "map", "top"], "Systems"));

    expect(set.names()).toEqual(["hud", "map"]);
    expect(set.has("hud")).toBe(true);
    expect(set.get("map").getElements()).toHaveLength(1);
  });

  it("merges interfaces that share a name", () => {
    const set = new InterfaceSet({ resources: createResources(), viewport: { width: 800, height: 600 } });

    set.load(interfaceNode(["interface", "hud"], "Cargo"));
    set.load(interfaceNode(["interface", "hud"], "Crew", "Fuel"));

    expect(set.names()).toEqual(["hud"]);
    expect(set.get("hud").getElements()).toHaveLength(3);
  });

  it("skips unnamed interfaces", () => {
    const set = new InterfaceSet({ resources: createResources(), viewport: { width: 800, height: 600 } });

    set.load(interfaceNode(["interface"], "Cargo"));

    expect(set.names()).toEqual([]);
  });

  it("returns an empty interface for unknown names", () => {
    const set = new InterfaceSet({ resources: createResources(), viewport: { width: 800, height: 600 } });
    const frame = createFrame();

    const missing = set.get("missing");
    missing.draw(frame);

    expect(set.has("missing")).toBe(false);
    expect(missing.getElements()).toHaveLength(0);
    expect(frame.renderer.calls).toHaveLength(0);
  });

  it("passes viewport changes to every interface", () => {
    const set = new InterfaceSet({ resources: createResources(), viewport: { width: 800, height: 600 } });
    set.load(pointNode(["interface", "corner", "right", "bottom"]));

    expectVector(set.get("corner").getBox("center").center, 390, 300);

    set.setViewport({ width: 1000, height: 400 });

    expectVector(set.get("corner").getBox("center").center, 490, 200);
  });
});
