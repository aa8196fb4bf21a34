// Data-driven HUD layout: geometry resolution, element kinds and interfaces

export * from "./constants";
export * from "./data/index";
export * from "./elements/index";
export * from "./interface";
export * from "./interface-set";
export * from "./layout/index";
export * from "./logger";
export type * from "./runtime/index";
