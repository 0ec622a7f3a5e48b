import { DuplicateActionError, InvalidActionError, UnknownActionError } from "./errors";

// =============================================================================
// Types
// =============================================================================

/**
 * A single toolbar command.
 *
 * - `label` is display text or a message key (resolved by the translator).
 * - `icon` is a symbolic reference resolved by the icon provider.
 * - `onActivate` is optional: an action without a handler still closes the menu.
 */
export type ToolbarAction = {
  readonly id: string;
  readonly label: string;
  readonly icon: string;
  readonly onActivate?: () => void;
};

// =============================================================================
// Registry
// =============================================================================

/**
 * Fixed, ordered set of actions owned by one toolbar.
 * Validated and frozen on construction; never mutated afterwards.
 *
 * Throws:
 * - `InvalidActionError` when an id is empty/blank
 * - `DuplicateActionError` when two actions share an id
 */
export class ActionRegistry {
  private readonly ordered: readonly ToolbarAction[];
  private readonly byId: ReadonlyMap<string, ToolbarAction>;

  constructor(actions: readonly ToolbarAction[]) {
    const byId = new Map<string, ToolbarAction>();
    const frozen: ToolbarAction[] = [];

    for (const a of actions) {
      if (a.id.trim().length === 0) {
        throw new InvalidActionError(`Toolbar action "${a.label}" has an empty id`);
      }
      if (byId.has(a.id)) throw new DuplicateActionError(a.id);

      const copy = Object.freeze({ ...a });
      byId.set(a.id, copy);
      frozen.push(copy);
    }

    this.ordered = Object.freeze(frozen);
    this.byId = byId;
  }

  get size(): number {
    return this.ordered.length;
  }

  /** Actions in registration order. */
  list(): readonly ToolbarAction[] {
    return this.ordered;
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  get(id: string): ToolbarAction | undefined {
    return this.byId.get(id);
  }

  /** Like `get()`, but throws `UnknownActionError` for a missing id. */
  require(id: string): ToolbarAction {
    const action = this.byId.get(id);
    if (!action) throw new UnknownActionError(id);
    return action;
  }
}

/** Shorthand for `new ActionRegistry(actions)`. */
export function defineActions(actions: readonly ToolbarAction[]): ActionRegistry {
  return new ActionRegistry(actions);
}
