// ──────────────────────────────────────────
// Pricing: API routes
// ──────────────────────────────────────────

import { Router } from 'express';
import type { Request, Response } from 'express';
import type { PricingService } from './pricing.service';
import { parseCampaignBody } from './campaign.schema';
import { CONVERSION_BENCHMARKS, MAX_TARGET_USERS, MIN_TARGET_USERS, TARGET_USERS_STEP } from './rate-card';
import {
  invoiceFileName,
  renderInvoiceCsv,
  renderReportCsv,
  reportFileName,
} from '../reporting';
import { formatStamp } from '../../shared/format';

export interface PricingRouteOptions {
  referencePrefix: string;
  now?: () => Date;
}

export function createPricingRoutes(pricingService: PricingService, options: PricingRouteOptions): Router {
  const router = Router();
  const now = options.now ?? (() => new Date());

  // GET /channels — metrics, base rates and benchmarks for the calculator UI
  router.get('/channels', (_req: Request, res: Response) => {
    res.json({
      channels: pricingService.getMetrics(),
      baseCosts: pricingService.getBaseCosts(),
      setupFee: pricingService.getSetupFee(),
      targetUsers: { min: MIN_TARGET_USERS, max: MAX_TARGET_USERS, step: TARGET_USERS_STEP },
      benchmarks: CONVERSION_BENCHMARKS,
    });
  });

  // POST /quote — price a campaign without saving it
  router.post('/quote', (req: Request, res: Response) => {
    try {
      const parsed = parseCampaignBody(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid campaign input', issues: parsed.error.issues });
        return;
      }
      res.json(pricingService.quote(parsed.data));
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Internal error';
      console.error('[Pricing] Quote failed:', message);
      res.status(500).json({ error: message });
    }
  });

  // POST /report.csv and /invoice.csv — downloads for an unsaved quote
  for (const kind of ['report', 'invoice'] as const) {
    router.post(`/${kind}.csv`, (req: Request, res: Response) => {
      try {
        const parsed = parseCampaignBody(req.body);
        if (!parsed.success) {
          res.status(400).json({ error: 'Invalid campaign input', issues: parsed.error.issues });
          return;
        }
        const issuedAt = now();
        const ctx = { reference: `${options.referencePrefix}${formatStamp(issuedAt)}`, issuedAt };
        const quote = pricingService.quote(parsed.data);

        const csv = kind === 'report' ? renderReportCsv(quote, ctx) : renderInvoiceCsv(quote, ctx);
        const fileName = kind === 'report' ? reportFileName(issuedAt) : invoiceFileName(issuedAt);
        res.attachment(fileName).type('text/csv').send(csv);
      } catch (err) {
        const message = err instanceof Error ? err.message : 'Internal error';
        console.error(`[Pricing] ${kind} export failed:`, message);
        res.status(500).json({ error: message });
      }
    });
  }

  return router;
}
