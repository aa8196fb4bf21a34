export * from "./alignment";
export * from "./element-geometry";
