// ──────────────────────────────────────────
// Proposals: Save and retrieve priced campaigns
// ──────────────────────────────────────────

import { v4 as uuidv4 } from 'uuid';
import type { PricingContract, ProposalStore } from '../../shared/contracts';
import type { CampaignInput, Proposal, ProposalSummary } from '../../shared/types';
import { formatStamp } from '../../shared/format';

const MAX_LIST = 50;
const MAX_INSERT_ATTEMPTS = 3;

function isUniqueViolation(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === '23505';
}

export class ProposalService {
  constructor(
    private pricing: PricingContract,
    private store: ProposalStore,
    private referencePrefix: string,
    private now: () => Date = () => new Date()
  ) {}

  /**
   * References are `<prefix><YYYYMMDDHHmm>`; a second proposal in the same
   * minute gets `-2`, then `-3`, and so on.
   */
  async nextReference(partnerId: string, at: Date): Promise<string> {
    const base = `${this.referencePrefix}${formatStamp(at)}`;
    const taken = await this.store.countReferencesLike(partnerId, base);
    return taken === 0 ? base : `${base}-${taken + 1}`;
  }

  async create(partnerId: string, input: CampaignInput): Promise<Proposal> {
    const quote = this.pricing.quote(input);
    const at = this.now();

    for (let attempt = 1; ; attempt++) {
      const reference = await this.nextReference(partnerId, at);
      try {
        const proposal = await this.store.insert({
          id: uuidv4(),
          partner_id: partnerId,
          reference,
          input,
          quote,
        });
        console.log(`[Proposals] Saved ${reference} for partner ${partnerId}`);
        return proposal;
      } catch (err) {
        if (!isUniqueViolation(err) || attempt >= MAX_INSERT_ATTEMPTS) throw err;
        console.warn(`[Proposals] Reference ${reference} taken, retrying (${attempt}/${MAX_INSERT_ATTEMPTS})`);
      }
    }
  }

  async get(partnerId: string, reference: string): Promise<Proposal | null> {
    return this.store.findByReference(partnerId, reference);
  }

  async list(partnerId: string): Promise<ProposalSummary[]> {
    return this.store.listByPartner(partnerId, MAX_LIST);
  }
}
