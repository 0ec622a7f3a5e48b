// =============================================================================
// Public UI barrel exports
// =============================================================================

export * from "./AppShell";
export * from "./Layout";

export * from "./Button";
export * from "./Select";

export * from "./Alert";
export * from "./EmptyState";

export * from "./Toolbar";
export * from "./ResponsiveToolbar";
export * from "./OverflowMenu";
export * from "./Icons";
