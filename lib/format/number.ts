// Binary doubles tie at two decimals only on odd multiples of 1/8; those round half to even
function toFixed2(value: number): string {
  const eighths = value * 8;
  if (Number.isInteger(eighths) && eighths % 2 !== 0) {
    const lower = Math.floor(value * 100);
    return ((lower % 2 === 0 ? lower : lower + 1) / 100).toFixed(2);
  }
  return value.toFixed(2);
}

/**
 * Display formatting for leaderboard cells.
 *
 * Whole numbers print without decimals, everything else with two.
 * No Intl: output must not depend on the host locale.
 */
export function formatNumber(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "number") {
    if (Number.isNaN(value)) return "";
    if (Number.isInteger(value)) return value.toFixed(0);
    if (!Number.isFinite(value)) return String(value);
    return toFixed2(value);
  }
  return String(value);
}

// Upper-cases the first letter of each letter run and lower-cases the rest
export function titleCase(text: string): string {
  return text.replace(/\p{L}+/gu, (w) => w.charAt(0).toUpperCase() + w.slice(1).toLowerCase());
}
