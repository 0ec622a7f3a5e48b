import type { ReactNode } from "react";

import styles from "./ui.module.css";

// =============================================================================
// Component
// =============================================================================

/**
 * Placeholder block for a list or panel that has nothing to show yet
 * (e.g. the editor's activity trail before the first action).
 */
export function EmptyState({
  title,
  text,
}: {
  /** Short headline. */
  title: ReactNode;

  /** Optional next-step hint. */
  text?: ReactNode;
}) {
  return (
    <div className={styles.empty} role="status">
      <div className={styles.emptyTitle}>{title}</div>
      {text && <div className={styles.emptyText}>{text}</div>}
    </div>
  );
}
