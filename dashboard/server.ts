// ──────────────────────────────────────────
// Dashboard: calculator UI server (port 8501 by default)
// ──────────────────────────────────────────

import fs from 'fs';
import path from 'path';
import { loadConfig } from '../src/config';
import { createDashboardApp } from './proxy';

const config = loadConfig();

// Resolve API key: env var → .api_key file
let apiKey = process.env.PRICING_API_KEY || '';
if (!apiKey) {
  const keyFile = path.join(__dirname, '..', '.api_key');
  if (fs.existsSync(keyFile)) {
    apiKey = fs.readFileSync(keyFile, 'utf-8').trim();
    console.log('[Dashboard] Loaded API key from .api_key file');
  }
}
if (!apiKey) {
  console.error('[Dashboard] Set PRICING_API_KEY or run seed first (writes .api_key)');
  process.exit(1);
}

const app = createDashboardApp({ apiBase: config.apiBase, apiKey });

app.listen(config.dashboardPort, () => {
  console.log(`[Dashboard] UI running at http://localhost:${config.dashboardPort}`);
});
