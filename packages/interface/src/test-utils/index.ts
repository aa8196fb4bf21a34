export * from "./assertions";
export * from "./fakes";
