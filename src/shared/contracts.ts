// ──────────────────────────────────────────
// Domain contracts — typed interfaces between domains
// ──────────────────────────────────────────

import type { ApiKey, CampaignInput, CampaignQuote, Partner, Proposal, ProposalSummary } from './types';

/**
 * Pricing contract — exposed to the Proposals domain.
 * Proposals call this to price a campaign before saving it.
 */
export interface PricingContract {
  quote(input: CampaignInput): CampaignQuote;
}

/**
 * Proposal store — implemented by ProposalRepo (Postgres).
 * References are unique per partner.
 */
export interface ProposalStore {
  insert(proposal: Omit<Proposal, 'created_at'>): Promise<Proposal>;
  findByReference(partnerId: string, reference: string): Promise<Proposal | null>;
  listByPartner(partnerId: string, limit: number): Promise<ProposalSummary[]>;
  countReferencesLike(partnerId: string, baseReference: string): Promise<number>;
}

/**
 * API key lookup — used by the auth middleware.
 */
export interface ApiKeyStore {
  findByHash(keyHash: string): Promise<ApiKey | null>;
  touchLastUsed(id: string): Promise<void>;
}

/**
 * Partner lookup — implemented by PartnerRepo.
 */
export interface PartnerStore {
  findById(id: string): Promise<Partner | null>;
}
