// =============================================================================
// Toolbar core public exports (framework-free)
// =============================================================================

export * from "./errors";
export * from "./actions";
export * from "./viewport";
export * from "./presentation";
export * from "./overflowMenu";
export * from "./controller";
