export * from "./point";
export * from "./rectangle";
