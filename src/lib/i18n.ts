import i18next, { type i18n as I18n, type Resource } from "i18next";
import LanguageDetector from "i18next-browser-languagedetector";
import { initReactI18next } from "react-i18next";

import messages from "../i18n/messages.json";
import { createLogger, type Logger } from "./logger";

// ─── Locale registry ───

export const LOCALE_STORAGE_KEY = "toolbar-kit.locale";

/** Locales with a bundle in `src/i18n/messages.json`, in file order. */
export const SUPPORTED_LOCALES: readonly string[] = Object.keys(messages);

const resources: Resource = Object.fromEntries(
  Object.entries(messages).map(([lng, bundle]) => [lng, { translation: bundle }])
);

// ─── Factory ───

/**
 * Build an i18next instance over the bundled messages.
 *
 * - The active language comes from localStorage (`LOCALE_STORAGE_KEY`) when it
 *   holds a supported locale, otherwise `fallbackLocale`. Changes are cached
 *   back to the same key and mirrored on `<html lang>`.
 * - Keys are flat (`"action.bold"`), placeholders use `{{name}}`.
 * - A key missing from every bundle renders as the key and is logged once.
 *
 * Resources are inline, so the instance is ready when this returns.
 */
export function createI18n({
  fallbackLocale,
  logger,
}: {
  fallbackLocale: string;
  logger?: Logger;
}): I18n {
  const log = logger ?? createLogger("i18n");
  const reported = new Set<string>();

  const instance = i18next.createInstance();
  instance.use(LanguageDetector).use(initReactI18next);

  instance.on("languageChanged", (lng) => {
    document.documentElement.lang = lng;
  });

  instance
    .init({
      resources,
      fallbackLng: fallbackLocale,
      supportedLngs: [...SUPPORTED_LOCALES],
      initImmediate: false,
      keySeparator: false,
      detection: {
        order: ["localStorage"],
        lookupLocalStorage: LOCALE_STORAGE_KEY,
        caches: ["localStorage"],
      },
      interpolation: {
        escapeValue: false,
      },
      saveMissing: true,
      missingKeyHandler: (lngs, _ns, key) => {
        if (reported.has(key)) return;
        reported.add(key);
        log.warn(`Missing translation for "${key}" (locale ${lngs.join(", ")})`);
      },
      react: {
        useSuspense: false,
      },
    })
    .catch((err: unknown) => log.error("i18next init failed", err));

  return instance;
}
