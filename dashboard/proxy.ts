// ──────────────────────────────────────────
// Dashboard: calculator page + API proxy
// Proxies /api calls to the pricing API with the API key injected
// ──────────────────────────────────────────

import express from 'express';
import type { Express } from 'express';
import path from 'path';

export interface DashboardOptions {
  apiBase: string;
  apiKey: string;
  fetchImpl?: typeof fetch;
}

const FORWARDED_HEADERS = ['content-type', 'content-disposition'] as const;

export function createDashboardApp(options: DashboardOptions): Express {
  const app = express();
  const fetchImpl = options.fetchImpl ?? fetch;

  app.use(express.json());

  app.use('/api', async (req, res) => {
    try {
      const url = `${options.apiBase}${req.originalUrl}`;
      const resp = await fetchImpl(url, {
        method: req.method,
        headers: {
          'Content-Type': 'application/json',
          'x-api-key': options.apiKey,
        },
        body: ['POST', 'PUT', 'PATCH'].includes(req.method) ? JSON.stringify(req.body) : undefined,
      });

      // JSON and CSV bodies pass through as text with their headers
      for (const name of FORWARDED_HEADERS) {
        const value = resp.headers.get(name);
        if (value) res.setHeader(name, value);
      }
      res.status(resp.status).send(await resp.text());
    } catch (err) {
      console.error('[Dashboard] Proxy error:', err);
      res.status(502).json({ error: 'API proxy error', detail: String(err) });
    }
  });

  app.get('/', (_req, res) => {
    res.sendFile(path.join(__dirname, 'index.html'));
  });

  return app;
}
