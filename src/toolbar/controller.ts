import { createLogger, type Logger } from "../lib/logger";
import type { ActionRegistry, ToolbarAction } from "./actions";
import { InvalidViewportError } from "./errors";
import { INITIAL_MENU_STATE, transitionMenu, type MenuEvent } from "./overflowMenu";
import { apply, type RenderPlan } from "./presentation";
import { classify, DEFAULT_BREAKPOINT, type LayoutMode } from "./viewport";

// =============================================================================
// Types
// =============================================================================

/**
 * Immutable snapshot of a toolbar. A new object is produced on every change;
 * an event that changes nothing keeps the previous snapshot.
 */
export type ToolbarState = {
  readonly actions: readonly ToolbarAction[];
  readonly mode: LayoutMode;
  readonly menuOpen: boolean;
};

export type ToolbarControllerOptions = {
  actions: ActionRegistry;
  /** Width threshold between collapsed and expanded (default 480). */
  breakpoint?: number;
  /** Initial viewport width; when omitted the toolbar starts expanded. */
  width?: number;
  logger?: Logger;
};

type Listener = () => void;

// =============================================================================
// Controller
// =============================================================================

/**
 * Owns one toolbar's state and processes its events:
 * resize, trigger activation, entry selection and outside dismissal.
 *
 * Every method is synchronous; subscribers are notified after each change.
 * The shape (`subscribe` + `getState`) matches React's `useSyncExternalStore`.
 */
export class ToolbarController {
  private readonly registry: ActionRegistry;
  private readonly breakpoint: number;
  private readonly log: Logger;
  private readonly listeners = new Set<Listener>();

  private state: ToolbarState;
  private plan: { state: ToolbarState; plan: RenderPlan } | null = null;

  /** Throws `InvalidViewportError` for a bad breakpoint or initial width. */
  constructor({ actions, breakpoint = DEFAULT_BREAKPOINT, width, logger }: ToolbarControllerOptions) {
    if (!Number.isFinite(breakpoint) || breakpoint <= 0) {
      throw new InvalidViewportError(breakpoint, "breakpoint");
    }

    this.registry = actions;
    this.breakpoint = breakpoint;
    this.log = logger ?? createLogger("ToolbarController");

    this.state = {
      actions: actions.list(),
      mode: width === undefined ? "expanded" : classify(width, breakpoint),
      menuOpen: INITIAL_MENU_STATE === "open",
    };
  }

  getState = (): ToolbarState => this.state;

  /** Render plan for the current state (same object until the state changes). */
  getRenderPlan(): RenderPlan {
    let cached = this.plan;
    if (!cached || cached.state !== this.state) {
      cached = { state: this.state, plan: apply(this.state.mode, this.state.actions) };
      this.plan = cached;
    }
    return cached.plan;
  }

  subscribe = (listener: Listener): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  // ---------------------------------------------------------------------------
  // Events
  // ---------------------------------------------------------------------------

  /**
   * Reclassify for a new viewport width.
   * Throws `InvalidViewportError` for a malformed width; the mode is kept.
   */
  resize(width: number): void {
    const mode = classify(width, this.breakpoint);
    if (mode === this.state.mode) return;

    this.log.debug("layout mode", this.state.mode, "->", mode, `(width ${width})`);

    this.commit({
      ...this.state,
      mode,
      menuOpen: mode === "expanded" ? this.menuAfter("expanded") : this.state.menuOpen,
    });
  }

  /** Overflow trigger pressed. Ignored while expanded (no trigger is shown). */
  activateTrigger(): void {
    if (this.state.mode === "expanded") {
      this.log.debug("trigger activated while expanded; ignored");
      return;
    }
    this.commit({ ...this.state, menuOpen: this.menuAfter("trigger") });
  }

  /** Outside click / Escape while the menu may be open. */
  dismissMenu(): void {
    this.commit({ ...this.state, menuOpen: this.menuAfter("dismiss") });
  }

  /**
   * Run a menu entry's handler once, then close the menu.
   *
   * Throws `UnknownActionError` without touching state for an unregistered id.
   * A throwing handler still leaves the menu closed; its error propagates.
   */
  activateEntry(id: string): void {
    const action = this.registry.require(id);

    try {
      action.onActivate?.();
    } finally {
      this.commit({ ...this.state, menuOpen: this.menuAfter("entrySelected") });
    }
  }

  /** Run a direct control's handler once. The menu is not involved. */
  activateControl(id: string): void {
    const action = this.registry.require(id);
    action.onActivate?.();
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private menuAfter(event: MenuEvent): boolean {
    return transitionMenu(this.state.menuOpen ? "open" : "closed", event) === "open";
  }

  private commit(next: ToolbarState): void {
    if (next.mode === this.state.mode && next.menuOpen === this.state.menuOpen) return;

    this.state = next;
    for (const listener of this.listeners) listener();
  }
}
