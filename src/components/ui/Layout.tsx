import type { CSSProperties, ReactNode } from "react";
import styles from "./ui.module.css";

// =============================================================================
// Utilities
// =============================================================================

/**
 * Useful for conditionally applying CSS module classes without extra deps.
 */
function cx(...parts: Array<string | false | undefined>) {
  return parts.filter(Boolean).join(" ");
}

// =============================================================================
// Page primitives
// =============================================================================

/**
 * Standard page header layout.
 *
 * Slots:
 * - `title`: required page title.
 * - `subtitle`: optional secondary line (string, small component, etc.).
 * - `actions`: optional right-side actions (buttons, filters, etc.).
 * - `children`: optional extra content under the header (KPIs, toolbars).
 */
export function PageHeader({
  title,
  subtitle,
  actions,
  children,
}: {
  title: string;
  subtitle?: ReactNode;
  actions?: ReactNode;
  children?: ReactNode;
}) {
  return (
    <section className={styles.pageHeader}>
      <div className={styles.pageHeaderTop}>
        <div className={styles.pageTitleWrap}>
          <h1 className={styles.pageTitle}>{title}</h1>
          {subtitle && <div className={styles.pageSubtitle}>{subtitle}</div>}
        </div>

        {actions && <div className={styles.pageActions}>{actions}</div>}
      </div>

      {children}
    </section>
  );
}

// =============================================================================
// Header KPI helpers
// =============================================================================

/**
 * Container for KPI tiles displayed inside a PageHeader.
 */
export function HeaderKpis({ children }: { children: ReactNode }) {
  return <div className={styles.headerKpis}>{children}</div>;
}

/**
 * Single label/value tile used in the header.
 */
export function HeaderKpi({
  label,
  value,
  icon,
}: {
  label: ReactNode;
  value: ReactNode;
  icon?: ReactNode;
}) {
  return (
    <div className={styles.headerKpi}>
      {icon && <div className={styles.headerKpiIcon}>{icon}</div>}

      <div className={styles.headerKpiBody}>
        <div className={styles.headerKpiLabel}>{label}</div>
        <div className={styles.headerKpiValue}>{value}</div>
      </div>
    </div>
  );
}

// =============================================================================
// Layout blocks
// =============================================================================

/**
 * Generic vertical section with consistent spacing.
 */
export function Section({ children }: { children: ReactNode }) {
  return <section className={styles.section}>{children}</section>;
}

/**
 * Flex container for vertical/horizontal composition.
 *
 * - `direction="vertical"` stacks children top to bottom (default).
 * - `direction="horizontal"` lays them out in a row; `wrap` lets the row break
 *   onto several lines on narrow screens.
 * - `gap` is in px.
 */
export function Stack({
  direction = "vertical",
  gap = 12,
  align,
  wrap = false,
  children,
}: {
  direction?: "vertical" | "horizontal";
  gap?: number;
  align?: CSSProperties["alignItems"];
  wrap?: boolean;
  children: ReactNode;
}) {
  return (
    <div
      className={cx(
        styles.stack,
        direction === "horizontal" && styles.stackHorizontal,
        wrap && styles.stackWrap
      )}
      style={{ gap, alignItems: align }}
      data-direction={direction}
    >
      {children}
    </div>
  );
}

/**
 * Card container with optional header rows.
 *
 * Header is rendered only if at least one of {title, subtitle, actions} exists.
 * The body is always rendered and holds the card content.
 */
export function Card({
  title,
  subtitle,
  actions,
  children,
}: {
  title?: ReactNode;
  subtitle?: ReactNode;
  actions?: ReactNode;
  children: ReactNode;
}) {
  return (
    <section className={styles.card}>
      {(title || subtitle || actions) && (
        <div className={styles.cardHeader}>
          <div className={styles.cardTitleWrap}>
            {title && <div className={styles.cardTitle}>{title}</div>}
            {subtitle && <div className={styles.cardSub}>{subtitle}</div>}
          </div>

          {actions && <div>{actions}</div>}
        </div>
      )}

      <div className={styles.cardBody}>{children}</div>
    </section>
  );
}
