// =============================================================================
// Formatting helpers (locale-aware)
// =============================================================================

/**
 * Format an integer with the given locale's separators.
 * Example (pt-PT): 1234567 -> "1 234 567"
 */
export function fmtInt(n: number, locale: string): string {
  return Math.round(n).toLocaleString(locale);
}

/**
 * Format a CSS pixel width for display, e.g. "1280 px".
 * Non-finite values are shown as a dash instead of "NaN px".
 */
export function fmtPx(n: number, locale: string): string {
  if (!Number.isFinite(n)) return "—";
  return `${fmtInt(n, locale)} px`;
}
