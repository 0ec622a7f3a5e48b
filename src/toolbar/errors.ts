// =============================================================================
// Toolbar errors
// =============================================================================

/**
 * Base class for every error raised by the toolbar core.
 * Lets callers catch toolbar failures without matching each subclass.
 */
export class ToolbarError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ToolbarError";
  }
}

/** An activation referenced an id that is not in the action registry. */
export class UnknownActionError extends ToolbarError {
  readonly actionId: string;

  constructor(actionId: string) {
    super(`Unknown toolbar action "${actionId}"`);
    this.name = "UnknownActionError";
    this.actionId = actionId;
  }
}

/**
 * A viewport width (or breakpoint) was negative, NaN or infinite.
 * `width` holds the rejected value as received.
 */
export class InvalidViewportError extends ToolbarError {
  readonly width: number;

  constructor(width: number, what = "viewport width") {
    super(`Invalid ${what}: ${String(width)}`);
    this.name = "InvalidViewportError";
    this.width = width;
  }
}

/** Two actions were registered under the same id. */
export class DuplicateActionError extends ToolbarError {
  readonly actionId: string;

  constructor(actionId: string) {
    super(`Duplicate toolbar action "${actionId}"`);
    this.name = "DuplicateActionError";
    this.actionId = actionId;
  }
}

/** An action definition is unusable (e.g. empty id). */
export class InvalidActionError extends ToolbarError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidActionError";
  }
}
