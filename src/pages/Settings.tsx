import { useTranslation } from "react-i18next";

import { Alert } from "../components/ui/Alert";
import { Card, HeaderKpi, HeaderKpis, PageHeader, Section, Stack } from "../components/ui/Layout";
import { Select } from "../components/ui/Select";
import { useConfig } from "../lib/configContext";
import { fmtPx } from "../lib/format";
import { SUPPORTED_LOCALES } from "../lib/i18n";
import { createLogger } from "../lib/logger";
import { useViewportWidth } from "../lib/viewport";
import { classify, InvalidViewportError } from "../toolbar";
import styles from "./pages.module.css";

const log = createLogger("settings");

// =============================================================================
// Local helpers
// =============================================================================

/**
 * Message key describing the mode for a width.
 * Only viewport errors are mapped; anything else is a bug and propagates.
 */
function modeKey(width: number, breakpoint: number): string {
  try {
    return `settings.mode.${classify(width, breakpoint)}`;
  } catch (err) {
    if (err instanceof InvalidViewportError) return "settings.mode.invalid";
    throw err;
  }
}

// =============================================================================
// Page
// =============================================================================

export default function Settings() {
  const { t, i18n } = useTranslation();
  const { breakpoint, warnings, defaultLocale } = useConfig();
  const locale = i18n.resolvedLanguage ?? defaultLocale;
  const width = useViewportWidth();

  return (
    <div className={styles.page}>
      <PageHeader title={t("settings.title")}>
        <HeaderKpis>
          <HeaderKpi label={t("settings.breakpoint")} value={fmtPx(breakpoint, locale)} />
          <HeaderKpi label={t("settings.width")} value={fmtPx(width, locale)} />
          <HeaderKpi label={t("settings.mode")} value={t(modeKey(width, breakpoint))} />
        </HeaderKpis>
      </PageHeader>

      {warnings.length > 0 && (
        <Alert variant="warning" title={t("settings.configWarnings")}>
          <ul className={styles.warnings}>
            {warnings.map((w) => (
              <li key={w}>{w}</li>
            ))}
          </ul>
        </Alert>
      )}

      <Section>
        <Card>
          <Stack direction="horizontal" gap={16} wrap>
            <Select
              label={t("settings.language")}
              hint={t("settings.languageHint")}
              value={locale}
              options={SUPPORTED_LOCALES.map((l) => ({ value: l, label: t(`locale.${l}`) }))}
              onChange={(e) => {
                i18n
                  .changeLanguage(e.target.value)
                  .catch((err: unknown) => log.error("Language change failed", err));
              }}
            />
          </Stack>
        </Card>
      </Section>
    </div>
  );
}
