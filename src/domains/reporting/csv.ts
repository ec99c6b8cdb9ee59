// ──────────────────────────────────────────
// Reporting: CSV serialisation
// ──────────────────────────────────────────

const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvField(value: string): string {
  if (!NEEDS_QUOTING.test(value)) return value;
  return `"${value.replace(/"/g, '""')}"`;
}

/**
 * Serialises rows under the given header order. Every line, the last
 * included, ends with `\n`.
 */
export function toCsv<K extends string>(columns: readonly K[], rows: readonly Record<K, string>[]): string {
  const lines = [columns.map(escapeCsvField).join(',')];
  for (const row of rows) {
    lines.push(columns.map((c) => escapeCsvField(row[c])).join(','));
  }
  return lines.join('\n') + '\n';
}
