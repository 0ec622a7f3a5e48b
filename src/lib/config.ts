import { z } from "zod";

import { DEFAULT_BREAKPOINT } from "../toolbar/viewport";

// =============================================================================
// Runtime configuration (Vite env)
// =============================================================================

export type AppConfig = {
  /** Width threshold for the responsive toolbar (VITE_TOOLBAR_BREAKPOINT). */
  breakpoint: number;
  /** Locale used when nothing is persisted (VITE_DEFAULT_LOCALE). */
  defaultLocale: string;
  /** Human-readable notes about env values that were rejected. */
  warnings: string[];
};

export const DEFAULT_LOCALE = "pt-PT";

type Env = Record<string, string | boolean | undefined>;

// =============================================================================
// Schemas
// =============================================================================

export const BreakpointSchema = z.coerce.number().finite().positive();

export function localeSchema(supportedLocales: readonly string[]) {
  const [first, ...rest] = supportedLocales;
  if (first === undefined) return z.never();
  const values: [string, ...string[]] = [first, ...rest];
  return z.enum(values);
}

/** Blank or non-string entries count as unset. */
function readVar(env: Env, name: string): string | undefined {
  const raw = env[name];
  return typeof raw === "string" && raw.trim() !== "" ? raw : undefined;
}

/**
 * Read the app configuration from an env object (usually `import.meta.env`).
 *
 * Invalid values never throw: the default is used and a warning is recorded,
 * so the UI can still boot and surface the problem on the settings page.
 */
export function loadConfig(env: Env, supportedLocales: readonly string[]): AppConfig {
  const warnings: string[] = [];

  let breakpoint = DEFAULT_BREAKPOINT;
  const rawBreakpoint = readVar(env, "VITE_TOOLBAR_BREAKPOINT");
  if (rawBreakpoint !== undefined) {
    const parsed = BreakpointSchema.safeParse(rawBreakpoint);
    if (parsed.success) {
      breakpoint = parsed.data;
    } else {
      warnings.push(
        `VITE_TOOLBAR_BREAKPOINT="${rawBreakpoint}" is not a positive number; using ${DEFAULT_BREAKPOINT}.`
      );
    }
  }

  let defaultLocale = DEFAULT_LOCALE;
  const rawLocale = readVar(env, "VITE_DEFAULT_LOCALE");
  if (rawLocale !== undefined) {
    const parsed = localeSchema(supportedLocales).safeParse(rawLocale);
    if (parsed.success) {
      defaultLocale = parsed.data;
    } else {
      warnings.push(
        `VITE_DEFAULT_LOCALE="${rawLocale}" is not one of ${supportedLocales.join(", ")}; using ${DEFAULT_LOCALE}.`
      );
    }
  }

  return { breakpoint, defaultLocale, warnings };
}
