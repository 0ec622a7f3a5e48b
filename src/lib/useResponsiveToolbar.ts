import { useEffect, useMemo, useRef, useSyncExternalStore } from "react";

import {
  InvalidViewportError,
  ToolbarController,
  isValidViewportWidth,
  type ActionRegistry,
  type RenderPlan,
  type ToolbarState,
} from "../toolbar";
import { createLogger, type Logger } from "./logger";

const defaultLog = createLogger("ResponsiveToolbar");

/**
 * React binding for `ToolbarController`.
 *
 * - One controller per (actions, breakpoint) pair; a new registry or
 *   breakpoint starts a fresh toolbar (menu closed).
 * - Every `width` change is forwarded as a resize notification. A malformed
 *   width is logged and ignored, so the previous layout mode stays on screen.
 */
export function useResponsiveToolbar(
  actions: ActionRegistry,
  { width, breakpoint, logger }: { width: number; breakpoint?: number; logger?: Logger }
): { controller: ToolbarController; state: ToolbarState; plan: RenderPlan } {
  const log = logger ?? defaultLog;

  // The initial width only seeds a new controller; later widths go through resize().
  const widthRef = useRef(width);
  widthRef.current = width;

  const controller = useMemo(() => {
    const initial = widthRef.current;
    return new ToolbarController({
      actions,
      breakpoint,
      width: isValidViewportWidth(initial) ? initial : undefined,
      logger: log,
    });
  }, [actions, breakpoint, log]);

  const state = useSyncExternalStore(controller.subscribe, controller.getState);

  useEffect(() => {
    try {
      controller.resize(width);
    } catch (err) {
      if (!(err instanceof InvalidViewportError)) throw err;
      log.warn(`Ignoring resize: ${err.message}`);
    }
  }, [controller, width, log]);

  return { controller, state, plan: controller.getRenderPlan() };
}
