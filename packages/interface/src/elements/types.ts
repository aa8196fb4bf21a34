import type { InterfaceResources } from "../runtime/resources";

/**
 * How an element is drawn this frame. Ordered: hover implies active.
 */
export enum ActivationState {
  Inactive = 0,
  Active = 1,
  Hover = 2,
}

/**
 * Condition names an element is gated by. An empty name always passes.
 */
export interface ElementConditions {
  visibleIf: string;
  activeIf: string;
}

/**
 * Everything an element needs while it is being loaded.
 */
export interface ElementLoadContext {
  resources: InterfaceResources;
  conditions: ElementConditions;
}

/**
 * One value per activation state, indexed by ActivationState.
 */
export type StateValues<T> = [inactive: T | undefined, active: T | undefined, hover: T | undefined];
