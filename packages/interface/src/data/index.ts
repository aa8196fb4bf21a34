export * from "./data-node";
export * from "./diagnostics";
