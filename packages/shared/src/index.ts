// Shared geometry, viewport and numeric helpers for @hudkit/interface

// Re-export geometry primitives
export * from "./geometry/index";

// Re-export viewport helpers
export * from "./ui/index";

// Re-export utilities
export * from "./utils/index";
