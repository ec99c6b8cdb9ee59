// ──────────────────────────────────────────
// Proposals: API routes
// ──────────────────────────────────────────

import { Router } from 'express';
import type { Request, Response } from 'express';
import type { ProposalService } from './proposal.service';
import { parseCampaignBody } from '../pricing/campaign.schema';
import {
  invoiceFileName,
  renderInvoiceCsv,
  renderReportCsv,
  reportFileName,
} from '../reporting';
import { getPartnerId } from '../../platform/context';

export function createProposalRoutes(proposalService: ProposalService): Router {
  const router = Router();

  // POST / — price and save a campaign
  router.post('/', async (req: Request, res: Response) => {
    try {
      const partnerId = getPartnerId();
      const parsed = parseCampaignBody(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid campaign input', issues: parsed.error.issues });
        return;
      }
      const proposal = await proposalService.create(partnerId, parsed.data);
      res.status(201).json(proposal);
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Internal error';
      console.error('[Proposals] Create failed:', message);
      res.status(500).json({ error: message });
    }
  });

  // GET / — latest proposals for the partner
  router.get('/', async (_req: Request, res: Response) => {
    try {
      const proposals = await proposalService.list(getPartnerId());
      res.json({ data: proposals });
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Internal error';
      res.status(500).json({ error: message });
    }
  });

  // GET /:reference — single proposal
  router.get('/:reference', async (req: Request, res: Response) => {
    try {
      const proposal = await proposalService.get(getPartnerId(), req.params.reference);
      if (!proposal) {
        res.status(404).json({ error: 'Proposal not found' });
        return;
      }
      res.json(proposal);
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Internal error';
      res.status(500).json({ error: message });
    }
  });

  // GET /:reference/report.csv — campaign report download
  router.get('/:reference/report.csv', async (req: Request, res: Response) => {
    try {
      const proposal = await proposalService.get(getPartnerId(), req.params.reference);
      if (!proposal) {
        res.status(404).json({ error: 'Proposal not found' });
        return;
      }
      const ctx = { reference: proposal.reference, issuedAt: new Date(proposal.created_at) };
      res.attachment(reportFileName(ctx.issuedAt)).type('text/csv').send(renderReportCsv(proposal.quote, ctx));
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Internal error';
      res.status(500).json({ error: message });
    }
  });

  // GET /:reference/invoice.csv — proposal/invoice download
  router.get('/:reference/invoice.csv', async (req: Request, res: Response) => {
    try {
      const proposal = await proposalService.get(getPartnerId(), req.params.reference);
      if (!proposal) {
        res.status(404).json({ error: 'Proposal not found' });
        return;
      }
      const ctx = { reference: proposal.reference, issuedAt: new Date(proposal.created_at) };
      res.attachment(invoiceFileName(ctx.issuedAt)).type('text/csv').send(renderInvoiceCsv(proposal.quote, ctx));
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Internal error';
      res.status(500).json({ error: message });
    }
  });

  return router;
}
