// ──────────────────────────────────────────
// Proposals: Postgres repository
// ──────────────────────────────────────────

import type { Knex } from 'knex';
import type { ProposalStore } from '../../shared/contracts';
import type { CampaignInput, CampaignQuote, Proposal, ProposalSummary } from '../../shared/types';

// numeric columns come back from pg as strings
interface ProposalRow {
  id: string;
  partner_id: string;
  reference: string;
  target_users: number;
  marketing_cost: string | number;
  cpa: string | number;
  input: CampaignInput;
  quote: CampaignQuote;
  created_at: Date;
}

function toProposal(row: ProposalRow): Proposal {
  return {
    id: row.id,
    partner_id: row.partner_id,
    reference: row.reference,
    input: row.input,
    quote: row.quote,
    created_at: row.created_at,
  };
}

export class ProposalRepo implements ProposalStore {
  constructor(private db: Knex) {}

  async insert(proposal: Omit<Proposal, 'created_at'>): Promise<Proposal> {
    const [row] = await this.db('proposals')
      .insert({
        id: proposal.id,
        partner_id: proposal.partner_id,
        reference: proposal.reference,
        target_users: proposal.input.targetUsers,
        marketing_cost: Math.round(proposal.quote.marketingCost * 100) / 100,
        cpa: Math.round(proposal.quote.cpa * 100) / 100,
        input: JSON.stringify(proposal.input),
        quote: JSON.stringify(proposal.quote),
      })
      .returning('*');
    return toProposal(row);
  }

  async findByReference(partnerId: string, reference: string): Promise<Proposal | null> {
    const row = await this.db('proposals')
      .where({ partner_id: partnerId, reference })
      .first();
    return row ? toProposal(row) : null;
  }

  async listByPartner(partnerId: string, limit: number): Promise<ProposalSummary[]> {
    const rows: ProposalRow[] = await this.db('proposals')
      .select('id', 'reference', 'target_users', 'marketing_cost', 'cpa', 'created_at')
      .where('partner_id', partnerId)
      .orderBy('created_at', 'desc')
      .limit(limit);

    return rows.map((r) => ({
      id: r.id,
      reference: r.reference,
      target_users: Number(r.target_users),
      marketing_cost: Number(r.marketing_cost),
      cpa: Number(r.cpa),
      created_at: r.created_at,
    }));
  }

  async countReferencesLike(partnerId: string, baseReference: string): Promise<number> {
    const result = await this.db('proposals')
      .where('partner_id', partnerId)
      .andWhere((qb) => {
        qb.where('reference', baseReference).orWhere('reference', 'like', `${baseReference}-%`);
      })
      .count('id as count');
    return result.length > 0 ? Number(result[0].count) : 0;
  }
}
