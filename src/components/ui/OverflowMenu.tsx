import { useEffect, useRef } from "react";

import { Button } from "./Button";
import { IconMore, ToolbarIcon } from "./Icons";
import styles from "./ui.module.css";
import type { ToolbarAction } from "../../toolbar";

// =============================================================================
// OverflowMenu
// =============================================================================

/**
 * Overflow trigger + dropdown listing the toolbar actions that are not shown
 * inline.
 *
 * Notes:
 * - Fully controlled: `open` comes from the toolbar controller and every user
 *   interaction is reported through a callback.
 * - Clicking outside the component or pressing Escape calls `onDismiss`.
 * - Entries keep the order of `entries`.
 */
export function OverflowMenu({
  open,
  entries,
  triggerLabel,
  menuTitle,
  translate,
  onToggle,
  onSelect,
  onDismiss,
}: {
  open: boolean;
  entries: readonly ToolbarAction[];
  /** Accessible name of the trigger (icon-only). */
  triggerLabel: string;
  menuTitle?: string;
  /** Resolves an action label (message key or literal) to display text. */
  translate: (label: string) => string;
  onToggle: () => void;
  onSelect: (actionId: string) => void;
  onDismiss: () => void;
}) {
  // Used to detect clicks outside the menu and close it.
  const wrapRef = useRef<HTMLDivElement | null>(null);

  // =============================================================================
  // Behaviour: close on outside click / Escape
  // =============================================================================
  useEffect(() => {
    if (!open) return;

    const onDocMouseDown = (e: MouseEvent) => {
      const el = wrapRef.current;
      if (!el) return;

      // Clicks on the trigger or inside the panel are handled by their own buttons.
      if (e.target instanceof Node && el.contains(e.target)) return;

      onDismiss();
    };

    const onKeyDown = (e: KeyboardEvent) => {
      if (e.key === "Escape") onDismiss();
    };

    document.addEventListener("mousedown", onDocMouseDown);
    document.addEventListener("keydown", onKeyDown);
    return () => {
      document.removeEventListener("mousedown", onDocMouseDown);
      document.removeEventListener("keydown", onKeyDown);
    };
  }, [open, onDismiss]);

  // =============================================================================
  // Render
  // =============================================================================
  return (
    <div className={styles.menuWrap} ref={wrapRef}>
      <Button
        size="sm"
        variant="ghost"
        onClick={onToggle}
        aria-label={triggerLabel}
        aria-haspopup="menu"
        aria-expanded={open}
      >
        <IconMore />
      </Button>

      {open && (
        <div className={styles.menuPanel} role="menu" aria-label={menuTitle ?? triggerLabel}>
          {menuTitle && <div className={styles.menuTitle}>{menuTitle}</div>}

          <div className={styles.menuItems}>
            {entries.map((a) => (
              <button
                key={a.id}
                type="button"
                role="menuitem"
                className={styles.menuItem}
                data-action-id={a.id}
                onClick={() => onSelect(a.id)}
              >
                <ToolbarIcon name={a.icon} />
                <span className={styles.menuItemLabel}>{translate(a.label)}</span>
              </button>
            ))}
          </div>
        </div>
      )}
    </div>
  );
}
