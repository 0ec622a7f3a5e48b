import type { ToolbarAction } from "./actions";
import type { LayoutMode } from "./viewport";

// =============================================================================
// Types
// =============================================================================

/**
 * How one action is presented for the current mode.
 * Each action gets exactly one variant, so it can never be both visible
 * inline and in the menu (or neither).
 */
export type ActionPresentation =
  | { kind: "control"; action: ToolbarAction }
  | { kind: "menuEntry"; action: ToolbarAction };

/**
 * Visibility assignment handed to the rendering surface.
 * `items` follows registry order in both modes.
 */
export type RenderPlan = {
  mode: LayoutMode;
  items: readonly ActionPresentation[];
  showOverflowTrigger: boolean;
};

// =============================================================================
// Selector
// =============================================================================

export function apply(mode: LayoutMode, actions: readonly ToolbarAction[]): RenderPlan {
  if (mode === "expanded") {
    return {
      mode,
      items: actions.map((action): ActionPresentation => ({ kind: "control", action })),
      showOverflowTrigger: false,
    };
  }

  return {
    mode,
    items: actions.map((action): ActionPresentation => ({ kind: "menuEntry", action })),
    showOverflowTrigger: true,
  };
}

/** Actions rendered inline (empty when collapsed). */
export function directControls(plan: RenderPlan): ToolbarAction[] {
  return plan.items.filter((i) => i.kind === "control").map((i) => i.action);
}

/** Actions rendered inside the overflow menu (empty when expanded). */
export function menuEntries(plan: RenderPlan): ToolbarAction[] {
  return plan.items.filter((i) => i.kind === "menuEntry").map((i) => i.action);
}
