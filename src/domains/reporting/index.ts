// ──────────────────────────────────────────
// Reporting domain — barrel export
// ──────────────────────────────────────────

export { toCsv, escapeCsvField } from './csv';
export * from './report.builder';
