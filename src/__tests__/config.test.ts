import { describe, expect, it } from "vitest";

import { BreakpointSchema, DEFAULT_LOCALE, loadConfig, localeSchema } from "../lib/config";

const locales = ["pt-PT", "en"];

describe("loadConfig", () => {
  it("uses defaults for an empty env", () => {
    expect(loadConfig({}, locales)).toEqual({
      breakpoint: 480,
      defaultLocale: DEFAULT_LOCALE,
      warnings: [],
    });
  });

  it("reads a valid breakpoint and locale", () => {
    const config = loadConfig({ VITE_TOOLBAR_BREAKPOINT: "768", VITE_DEFAULT_LOCALE: "en" }, locales);
    expect(config.breakpoint).toBe(768);
    expect(config.defaultLocale).toBe("en");
    expect(config.warnings).toEqual([]);
  });

  it("ignores blank values silently", () => {
    const config = loadConfig({ VITE_TOOLBAR_BREAKPOINT: " ", VITE_DEFAULT_LOCALE: "" }, locales);
    expect(config.breakpoint).toBe(480);
    expect(config.warnings).toEqual([]);
  });

  it("falls back with a warning for an invalid breakpoint", () => {
    const config = loadConfig({ VITE_TOOLBAR_BREAKPOINT: "-10" }, locales);
    expect(config.breakpoint).toBe(480);
    expect(config.warnings).toEqual([
      'VITE_TOOLBAR_BREAKPOINT="-10" is not a positive number; using 480.',
    ]);
  });

  it("falls back with a warning for an unknown locale", () => {
    const config = loadConfig({ VITE_DEFAULT_LOCALE: "fr" }, locales);
    expect(config.defaultLocale).toBe("pt-PT");
    expect(config.warnings).toEqual(['VITE_DEFAULT_LOCALE="fr" is not one of pt-PT, en; using pt-PT.']);
  });

  it("ignores non-string env entries", () => {
    expect(loadConfig({ DEV: true, VITE_TOOLBAR_BREAKPOINT: undefined }, locales).breakpoint).toBe(480);
  });

  it("rejects a breakpoint that is not a number", () => {
    const config = loadConfig({ VITE_TOOLBAR_BREAKPOINT: "wide" }, locales);
    expect(config.breakpoint).toBe(480);
    expect(config.warnings).toEqual([
      'VITE_TOOLBAR_BREAKPOINT="wide" is not a positive number; using 480.',
    ]);
  });

  it("reports both invalid values", () => {
    const config = loadConfig({ VITE_TOOLBAR_BREAKPOINT: "0", VITE_DEFAULT_LOCALE: "de" }, locales);
    expect(config).toEqual({
      breakpoint: 480,
      defaultLocale: "pt-PT",
      warnings: [
        'VITE_TOOLBAR_BREAKPOINT="0" is not a positive number; using 480.',
        'VITE_DEFAULT_LOCALE="de" is not one of pt-PT, en; using pt-PT.',
      ],
    });
  });
});

describe("config schemas", () => {
  it("coerces numeric strings for the breakpoint", () => {
    expect(BreakpointSchema.safeParse("600")).toEqual({ success: true, data: 600 });
    expect(BreakpointSchema.safeParse("Infinity").success).toBe(false);
  });

  it("accepts only the listed locales", () => {
    expect(localeSchema(locales).safeParse("en").success).toBe(true);
    expect(localeSchema(locales).safeParse("EN").success).toBe(false);
    expect(localeSchema([]).safeParse("en").success).toBe(false);
  });
});
