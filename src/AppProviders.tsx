import type { i18n as I18n } from "i18next";
import type { ReactNode } from "react";
import { I18nextProvider } from "react-i18next";

import type { AppConfig } from "./lib/config";
import { ConfigProvider } from "./lib/configContext";

// =============================================================================
// App-level providers
// =============================================================================

/**
 * Wires configuration and translation into the tree.
 * Locale detection and persistence live in the i18n instance (see `createI18n`).
 */
export function AppProviders({
  config,
  i18n,
  children,
}: {
  config: AppConfig;
  i18n: I18n;
  children: ReactNode;
}) {
  return (
    <ConfigProvider config={config}>
      <I18nextProvider i18n={i18n}>{children}</I18nextProvider>
    </ConfigProvider>
  );
}
