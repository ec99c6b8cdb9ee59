// ──────────────────────────────────────────
// Proposals domain — barrel export
// ──────────────────────────────────────────

export { ProposalRepo } from './proposal.repo';
export { ProposalService } from './proposal.service';
export { createProposalRoutes } from './routes';
