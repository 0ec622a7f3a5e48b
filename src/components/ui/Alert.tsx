import type { ReactNode } from "react";
import styles from "./ui.module.css";

type Variant = "info" | "warning" | "danger";

const variantClass: Record<Variant, string> = {
  info: styles.alertInfo,
  warning: styles.alertWarning,
  danger: styles.alertDanger,
};

// =============================================================================
// Component
// =============================================================================

/**
 * Styled message container for user feedback (e.g. rejected configuration).
 *
 * Accessibility:
 * - `role="alert"` for danger messages (announced immediately).
 * - `role="status"` otherwise (polite announcement).
 */
export function Alert({
  variant = "info",
  title,
  children,
}: {
  variant?: Variant;
  title: ReactNode;
  children?: ReactNode;
}) {
  return (
    <div
      className={`${styles.alert} ${variantClass[variant]}`}
      role={variant === "danger" ? "alert" : "status"}
    >
      <div className={styles.alertTitle}>{title}</div>
      {children && <div className={styles.alertText}>{children}</div>}
    </div>
  );
}
