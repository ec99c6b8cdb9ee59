// ──────────────────────────────────────────
// Shared formatting helpers (en-US grouping, RM amounts, UTC dates)
// ──────────────────────────────────────────

export function formatNumber(value: number, decimals = 2, grouping = true): string {
  return new Intl.NumberFormat('en-US', {
    minimumFractionDigits: decimals,
    maximumFractionDigits: decimals,
    useGrouping: grouping,
  }).format(value);
}

/**
 * Ringgit amount, e.g. `RM 40,320.00`. Per-user rates are shown with four
 * decimals and no grouping: `formatRm(0.027, 4, false)` → `RM 0.0270`.
 */
export function formatRm(value: number, decimals = 2, grouping = true): string {
  return `RM ${formatNumber(value, decimals, grouping)}`;
}

/** Truncates toward zero before grouping: 1162.9 → `1,162`. */
export function formatCount(value: number): string {
  return formatNumber(Math.trunc(value), 0);
}

/** Fraction to percent: 0.0549 → `5.49%`. */
export function formatPercent(fraction: number, decimals = 2): string {
  return `${(fraction * 100).toFixed(decimals)}%`;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** `YYYY-MM-DD` in UTC. */
export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** `YYYYMMDD` in UTC. */
export function formatCompactDate(date: Date): string {
  return formatIsoDate(date).replace(/-/g, '');
}

/** `YYYYMMDDHHmm` in UTC. */
export function formatStamp(date: Date): string {
  return `${formatCompactDate(date)}${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}`;
}
