// =============================================================================
// Tagged console logger
// =============================================================================

/**
 * Minimal logger interface accepted by the toolbar core.
 * Anything console-like (or a test spy) can be passed in.
 */
export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

const noop = () => {};

/**
 * Create a logger whose lines are prefixed with `[tag]`.
 * `debug` / `info` only print in dev builds; `warn` / `error` always print.
 *
 * ```ts
 * const controller = new ToolbarController({ actions, logger: createLogger("toolbar") });
 * controller.resize(360); // dev console: [toolbar] layout mode expanded -> collapsed (width 360)
 * ```
 */
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;

  return {
    debug: import.meta.env.DEV
      ? (...args: unknown[]) => console.debug(prefix, ...args)
      : noop,
    info: import.meta.env.DEV
      ? (...args: unknown[]) => console.info(prefix, ...args)
      : noop,
    warn: (...args: unknown[]) => console.warn(prefix, ...args),
    error: (...args: unknown[]) => console.error(prefix, ...args),
  };
}
