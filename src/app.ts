// ──────────────────────────────────────────
// Express app — routes mounted behind API key auth
// ──────────────────────────────────────────

import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import type { ApiKeyStore, PartnerStore } from './shared/contracts';
import { apiKeyAuth } from './platform/auth';
import { getPartnerScope } from './platform/context';
import { PricingService, createPricingRoutes } from './domains/pricing';
import { ProposalService, createProposalRoutes } from './domains/proposals';

export interface AppDeps {
  apiKeys: ApiKeyStore;
  partners: PartnerStore;
  pricingService: PricingService;
  proposalService: ProposalService;
  referencePrefix: string;
  now?: () => Date;
}

export function createApp(deps: AppDeps): Express {
  const app = express();
  app.use(express.json());

  app.use(
    '/api/v1/pricing',
    apiKeyAuth(deps.apiKeys, 'quote'),
    createPricingRoutes(deps.pricingService, { referencePrefix: deps.referencePrefix, now: deps.now })
  );
  app.use('/api/v1/proposals', apiKeyAuth(deps.apiKeys, 'proposals'), createProposalRoutes(deps.proposalService));

  // GET /api/v1/partner — the partner the key belongs to, and what the key may do
  app.get('/api/v1/partner', apiKeyAuth(deps.apiKeys), async (_req: Request, res: Response) => {
    try {
      const scope = getPartnerScope();
      const partner = await deps.partners.findById(scope.partnerId);
      if (!partner) {
        res.status(404).json({ error: 'Partner not found' });
        return;
      }
      res.json({ ...partner, key: { id: scope.keyId, scopes: scope.scopes } });
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Internal error';
      res.status(500).json({ error: message });
    }
  });

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  // Errors raised outside the route handlers, body parsing included
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      res.status(400).json({ error: 'Invalid JSON body' });
      return;
    }
    console.error('[App] Unhandled error:', err);
    const message = err instanceof Error ? err.message : 'Internal error';
    res.status(500).json({ error: message });
  });

  return app;
}

function isBodyParseError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}
