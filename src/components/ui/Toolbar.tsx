import type { ReactNode } from "react";
import styles from "./ui.module.css";

// =============================================================================
// Toolbar (layout component)
// =============================================================================

/**
 * Toolbar layout component used to compose a header strip.
 *
 * Design intent:
 * - Left side holds an optional title and optional left content.
 * - Right side holds the actions (see `ResponsiveToolbar`).
 * - `label` names the strip for assistive tech (`role="toolbar"`).
 * - Styling is delegated to `ui.module.css` to keep the component purely structural.
 */
export function Toolbar({
  left,
  right,
  title,
  label,
  mode,
}: {
  left?: ReactNode;
  right?: ReactNode;
  title?: ReactNode;
  label?: string;
  /** Exposed as `data-mode` for styling/tests; the toolbar itself does not branch on it. */
  mode?: string;
}) {
  return (
    <div className={styles.toolbar} role="toolbar" aria-label={label} data-mode={mode}>
      <div className={styles.toolbarLeft}>
        {title && <div className={styles.toolbarTitle}>{title}</div>}
        {left}
      </div>

      <div className={styles.toolbarRight}>{right}</div>
    </div>
  );
}
