import { useMemo, useReducer, type CSSProperties } from "react";
import { useTranslation } from "react-i18next";

import { Card, PageHeader, Section } from "../components/ui/Layout";
import { EmptyState } from "../components/ui/EmptyState";
import { ResponsiveToolbar } from "../components/ui/ResponsiveToolbar";
import { useConfig } from "../lib/configContext";
import { formattingReducer, initialFormatting, type Formatting, type Mark } from "../lib/formatting";
import { defineActions } from "../toolbar";
import styles from "./pages.module.css";

// =============================================================================
// Local helpers
// =============================================================================

const MARKS: Mark[] = ["bold", "italic", "underline", "strikethrough"];

function isMark(id: string): id is Mark {
  return MARKS.some((m) => m === id);
}

/**
 * Inline style for the preview paragraph.
 * Underline and strikethrough share `text-decoration`, so they are combined.
 */
function previewStyle(f: Formatting): CSSProperties {
  const decorations = [f.underline && "underline", f.strikethrough && "line-through"].filter(Boolean);

  return {
    fontWeight: f.bold ? 700 : 400,
    fontStyle: f.italic ? "italic" : "normal",
    textDecoration: decorations.length ? decorations.join(" ") : "none",
  };
}

// =============================================================================
// Page
// =============================================================================

export default function Editor() {
  const { t } = useTranslation();
  const { breakpoint } = useConfig();

  const [state, dispatch] = useReducer(formattingReducer, initialFormatting);

  /**
   * Build the registry once: `dispatch` is stable, so the toolbar keeps the
   * same controller (and menu state) across renders.
   */
  const actions = useMemo(
    () =>
      defineActions([
        ...MARKS.map((mark) => ({
          id: mark,
          label: `action.${mark}`,
          icon: mark,
          onActivate: () => dispatch({ type: "toggle", mark }),
        })),
        { id: "undo", label: "action.undo", icon: "undo", onActivate: () => dispatch({ type: "undo" }) },
        { id: "redo", label: "action.redo", icon: "redo", onActivate: () => dispatch({ type: "redo" }) },
      ]),
    []
  );

  return (
    <div className={styles.page}>
      <PageHeader title={t("editor.title")} subtitle={t("editor.subtitle", { breakpoint })} />

      <Section>
        <Card>
          <ResponsiveToolbar
            actions={actions}
            breakpoint={breakpoint}
            title={t("editor.preview")}
            label={t("editor.title")}
            isPressed={(id) => (isMark(id) ? state.current[id] : undefined)}
          />

          <p className={styles.preview} style={previewStyle(state.current)} data-testid="preview">
            {t("editor.sample")}
          </p>
        </Card>
      </Section>

      <Section>
        <Card title={t("editor.activity")}>
          {state.activity.length === 0 ? (
            <EmptyState title={t("editor.activityEmpty")} text={t("editor.activityEmptyText")} />
          ) : (
            <ol className={styles.activity} aria-label={t("editor.activity")}>
              {state.activity.map((id, i) => (
                <li key={`${i}-${id}`}>{t(`action.${id}`)}</li>
              ))}
            </ol>
          )}
        </Card>
      </Section>
    </div>
  );
}
