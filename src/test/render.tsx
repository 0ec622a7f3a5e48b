import { render } from "@testing-library/react";
import type { ReactElement, ReactNode } from "react";
import { MemoryRouter } from "react-router-dom";

import { AppProviders } from "../AppProviders";
import type { AppConfig } from "../lib/config";
import { createI18n } from "../lib/i18n";
import type { Logger } from "../lib/logger";

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return { breakpoint: 480, defaultLocale: "en", warnings: [], ...overrides };
}

/** Pretend the browser window is `width` px wide (jsdom defaults to 1024). */
export function setWindowWidth(width: number) {
  Object.defineProperty(window, "innerWidth", { configurable: true, writable: true, value: width });
}

/**
 * Render under the real providers (English by default) and a memory router.
 * A fresh i18n instance is created per call, after any localStorage set-up
 * the test did. Providers are passed as `wrapper`, so `rerender()` keeps them.
 */
export function renderWithProviders(
  ui: ReactElement,
  { config = testConfig(), route = "/" }: { config?: AppConfig; route?: string } = {}
) {
  const i18n = createI18n({ fallbackLocale: config.defaultLocale, logger: silentLogger });

  function Wrapper({ children }: { children: ReactNode }) {
    return (
      <AppProviders config={config} i18n={i18n}>
        <MemoryRouter initialEntries={[route]}>{children}</MemoryRouter>
      </AppProviders>
    );
  }

  return render(ui, { wrapper: Wrapper });
}
