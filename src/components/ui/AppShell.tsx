import type { ReactNode } from "react";
import { NavLink } from "react-router-dom";
import { useTranslation } from "react-i18next";

import styles from "./ui.module.css";
import { IconEditor, IconSettings } from "./Icons";

// =============================================================================
// Types
// =============================================================================

type Props = { children: ReactNode };

type NavItem = {
  to: string;
  /** Message key of the label. */
  labelKey: string;
  icon: ReactNode;
};

// =============================================================================
// Navigation configuration
// =============================================================================

/**
 * Sidebar / mobile navigation items used by the shell layout.
 * - `to` must match the React Router routes defined in `App.tsx`.
 */
const nav: NavItem[] = [
  { to: "/", labelKey: "nav.editor", icon: <IconEditor className={styles.navIcon} /> },
  { to: "/settings", labelKey: "nav.settings", icon: <IconSettings className={styles.navIcon} /> },
];

// =============================================================================
// Styling helpers
// =============================================================================

/**
 * Minimal className combiner:
 * - ignores falsy values
 * - joins with spaces
 */
function cx(...parts: Array<string | false | undefined>) {
  return parts.filter(Boolean).join(" ");
}

// =============================================================================
// Component
// =============================================================================

/**
 * AppShell provides the main layout for the UI:
 * - Desktop: sidebar navigation + main content area
 * - Mobile: topbar navigation + main content area
 *
 * Which of the two navigations is visible is decided in CSS (media query),
 * both are always in the DOM.
 */
export function AppShell({ children }: Props) {
  const { t } = useTranslation();

  return (
    <div className={styles.appShell}>
      <div className={styles.layout}>
        {/* =============================================================================
            Desktop sidebar
        ============================================================================= */}
        <aside className={styles.sidebar}>
          <div className={styles.brand}>
            <div className={styles.brandTitle}>{t("app.title")}</div>
            <div className={styles.brandSub}>{t("app.subtitle")}</div>
          </div>

          <nav className={styles.nav} aria-label={t("nav.main")}>
            {nav.map((it) => (
              <NavLink
                key={it.to}
                to={it.to}
                end={it.to === "/"}
                className={({ isActive }) => cx(styles.navLink, isActive && styles.navLinkActive)}
              >
                {it.icon}
                {t(it.labelKey)}
              </NavLink>
            ))}
          </nav>
        </aside>

        {/* =============================================================================
            Main content area
        ============================================================================= */}
        <div className={styles.main}>
          {/* Mobile header / nav (keeps navigation accessible on small screens). */}
          <header className={styles.mobileTopbar}>
            <div className={styles.mobileTopbarInner}>
              <div className={styles.brandTitle}>{t("app.title")}</div>

              <nav className={styles.mobileNav} aria-label={t("nav.main")}>
                {nav.map((it) => (
                  <NavLink
                    key={it.to}
                    to={it.to}
                    end={it.to === "/"}
                    className={({ isActive }) =>
                      cx(styles.mobileNavLink, isActive && styles.mobileNavLinkActive)
                    }
                  >
                    {t(it.labelKey)}
                  </NavLink>
                ))}
              </nav>
            </div>
          </header>

          {/* Route content injected by React Router via `App.tsx`. */}
          <main className={styles.content}>{children}</main>
        </div>
      </div>
    </div>
  );
}
