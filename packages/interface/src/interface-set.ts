import { readViewport, type UiViewport } from "@hudkit/shared";
import type { DataNode } from "./data/data-node";
import { Interface } from "./interface";
import type { InterfaceResources } from "./runtime/resources";

export interface InterfaceSetOptions {
  resources: InterfaceResources;
  viewport?: UiViewport;
}

/**
 * All interfaces loaded from layout data, by name.
 */
export class InterfaceSet {
  private readonly interfaces = new Map<string, Interface>();
  private readonly resources: InterfaceResources;
  private viewport: UiViewport;

  constructor(options: InterfaceSetOptions) {
    this.resources = options.resources;
    this.viewport = options.viewport ?? readViewport();
  }

  /**
   * Loads an `interface <name>` node. A second node with the same name adds
   * to the interface loaded earlier.
   */
  load(node: DataNode): void {
    if (node.size < 2) {
      return;
    }

    const name = node.token(1);
    let target = this.interfaces.get(name);
    if (!target) {
      target = this.create();
      this.interfaces.set(name, target);
    }
    target.load(node);
  }

  has(name: string): boolean {
    return this.interfaces.has(name);
  }

  /**
   * Returns the named interface, or an empty one that draws nothing.
   */
  get(name: string): Interface {
    return this.interfaces.get(name) ?? this.create();
  }

  names(): string[] {
    return Array.from(this.interfaces.keys());
  }

  setViewport(viewport: UiViewport): void {
    this.viewport = { ...viewport };
    this.interfaces.forEach((entry) => {
      entry.setViewport(this.viewport);
    });
  }

  private create(): Interface {
    return new Interface({ resources: this.resources, viewport: this.viewport });
  }
}
