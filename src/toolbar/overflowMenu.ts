// =============================================================================
// Overflow menu state machine
// =============================================================================

export type MenuState = "closed" | "open";

/**
 * Events the overflow menu reacts to:
 * - `trigger`: the overflow button was pressed
 * - `entrySelected`: a menu entry was chosen (its handler runs elsewhere)
 * - `dismiss`: outside click / Escape
 * - `expanded`: the toolbar switched to inline controls; the trigger is gone
 */
export type MenuEvent = "trigger" | "entrySelected" | "dismiss" | "expanded";

export const INITIAL_MENU_STATE: MenuState = "closed";

export function transitionMenu(state: MenuState, event: MenuEvent): MenuState {
  switch (event) {
    case "trigger":
      // Same toggle behaviour as the other dropdowns in the UI kit.
      return state === "closed" ? "open" : "closed";
    case "entrySelected":
    case "dismiss":
    case "expanded":
      return "closed";
  }
}
