export * from "./bar-element";
export * from "./element-factory";
export * from "./image-element";
export * from "./interface-element";
export * from "./text-element";
export * from "./types";
