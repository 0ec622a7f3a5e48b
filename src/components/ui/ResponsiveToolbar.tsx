import { useCallback, type ReactNode } from "react";
import { useTranslation } from "react-i18next";

import { Button } from "./Button";
import { ToolbarIcon } from "./Icons";
import { OverflowMenu } from "./OverflowMenu";
import { Toolbar } from "./Toolbar";
import styles from "./ui.module.css";
import { directControls, menuEntries, type ActionRegistry } from "../../toolbar";
import type { Logger } from "../../lib/logger";
import { useResponsiveToolbar } from "../../lib/useResponsiveToolbar";
import { useViewportWidth } from "../../lib/viewport";

// =============================================================================
// Component
// =============================================================================

/**
 * Toolbar that shows its actions inline on wide viewports and behind a single
 * overflow trigger on narrow ones.
 *
 * - Width comes from `width` when given, otherwise from the window.
 * - `isPressed` marks toggle-style actions (e.g. bold) as pressed and returns
 *   `undefined` for plain commands. It only affects direct controls, menu
 *   entries are plain items.
 * - Action labels are passed through the translator, so they may be message keys.
 */
export function ResponsiveToolbar({
  actions,
  breakpoint,
  width,
  title,
  label,
  isPressed,
  logger,
}: {
  actions: ActionRegistry;
  breakpoint?: number;
  width?: number;
  title?: ReactNode;
  label?: string;
  isPressed?: (actionId: string) => boolean | undefined;
  logger?: Logger;
}) {
  const { t } = useTranslation();
  const viewportWidth = useViewportWidth();

  const { controller, state, plan } = useResponsiveToolbar(actions, {
    width: width ?? viewportWidth,
    breakpoint,
    logger,
  });

  const onToggle = useCallback(() => controller.activateTrigger(), [controller]);
  const onDismiss = useCallback(() => controller.dismissMenu(), [controller]);
  const onSelect = useCallback((id: string) => controller.activateEntry(id), [controller]);

  return (
    <Toolbar
      title={title}
      label={label}
      mode={plan.mode}
      right={
        <div className={styles.toolbarActions}>
          {directControls(plan).map((a) => (
            <Button
              key={a.id}
              size="sm"
              variant="ghost"
              pressed={isPressed?.(a.id)}
              data-action-id={a.id}
              onClick={() => controller.activateControl(a.id)}
            >
              <ToolbarIcon name={a.icon} />
              {t(a.label)}
            </Button>
          ))}

          {plan.showOverflowTrigger && (
            <OverflowMenu
              open={state.menuOpen}
              entries={menuEntries(plan)}
              triggerLabel={t("toolbar.more")}
              menuTitle={t("toolbar.menuTitle")}
              translate={(key) => t(key)}
              onToggle={onToggle}
              onSelect={onSelect}
              onDismiss={onDismiss}
            />
          )}
        </div>
      }
    />
  );
}
