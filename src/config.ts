// ──────────────────────────────────────────
// Configuration — environment variables into a typed config
// ──────────────────────────────────────────

import dotenv from 'dotenv';

dotenv.config();

export interface AppConfig {
  port: number;
  dashboardPort: number;
  apiBase: string;
  databaseUrl: string | undefined;
  setupFee: number;
  referencePrefix: string;
}

export const DEFAULT_SETUP_FEE = 10_000;

function parseNumber(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`${name} must be a non-negative number, got "${value}"`);
  }
  return parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const referencePrefix = env.REFERENCE_PREFIX || 'VX';
  if (!/^[A-Z0-9]{1,8}$/.test(referencePrefix)) {
    throw new Error(`REFERENCE_PREFIX must be 1-8 uppercase letters or digits, got "${referencePrefix}"`);
  }

  return {
    port: parseNumber('PORT', env.PORT, 3000),
    dashboardPort: parseNumber('DASHBOARD_PORT', env.DASHBOARD_PORT, 8501),
    apiBase: env.API_BASE || 'http://localhost:3000',
    databaseUrl: env.DATABASE_URL,
    setupFee: parseNumber('SETUP_FEE', env.SETUP_FEE, DEFAULT_SETUP_FEE),
    referencePrefix,
  };
}
