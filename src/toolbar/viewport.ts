import { InvalidViewportError } from "./errors";

// =============================================================================
// Viewport classification
// =============================================================================

/**
 * - `expanded`: every action is shown inline as a direct control
 * - `collapsed`: actions are reachable only through the overflow menu
 */
export type LayoutMode = "expanded" | "collapsed";

/** Default width (CSS px) separating the two modes. */
export const DEFAULT_BREAKPOINT = 480;

export function isValidViewportWidth(width: number): boolean {
  return Number.isFinite(width) && width >= 0;
}

/**
 * Map a viewport width to a layout mode.
 *
 * `width < breakpoint` is collapsed; anything at or above the breakpoint is
 * expanded. No hysteresis: the same width always yields the same mode.
 *
 * @throws InvalidViewportError for a negative/non-finite width or a
 *   breakpoint that is not a positive finite number.
 */
export function classify(width: number, breakpoint = DEFAULT_BREAKPOINT): LayoutMode {
  if (!Number.isFinite(breakpoint) || breakpoint <= 0) {
    throw new InvalidViewportError(breakpoint, "breakpoint");
  }
  if (!isValidViewportWidth(width)) throw new InvalidViewportError(width);

  return width < breakpoint ? "collapsed" : "expanded";
}
