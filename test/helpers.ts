import type { Express } from 'express';
import type { ApiKeyStore, PartnerStore, ProposalStore } from '../src/shared/contracts';
import type { ApiKey, ApiKeyScope, Partner, Proposal, ProposalSummary } from '../src/shared/types';
import { hashApiKey } from '../src/platform/auth';

export const PARTNER_ID = '00000000-0000-4000-8000-000000000001';

export function makeApiKey(raw: string, scopes: ApiKeyScope[], expiresAt: Date | null = null): ApiKey {
  return {
    id: `key-${raw}`,
    partner_id: PARTNER_ID,
    key_hash: hashApiKey(raw),
    label: raw,
    scopes,
    last_used: null,
    expires_at: expiresAt,
    created_at: new Date('2026-01-01T00:00:00Z'),
  };
}

export class InMemoryApiKeys implements ApiKeyStore {
  touched: string[] = [];
  constructor(private keys: ApiKey[]) {}

  async findByHash(keyHash: string): Promise<ApiKey | null> {
    return this.keys.find((k) => k.key_hash === keyHash) ?? null;
  }

  async touchLastUsed(id: string): Promise<void> {
    this.touched.push(id);
  }
}

export class InMemoryPartners implements PartnerStore {
  constructor(private partners: Partner[]) {}

  async findById(id: string): Promise<Partner | null> {
    return this.partners.find((p) => p.id === id) ?? null;
  }
}

export class InMemoryProposals implements ProposalStore {
  rows: Proposal[] = [];
  insertCalls = 0;
  failNextInsertWith: unknown = null;

  constructor(private clock: () => Date = () => new Date('2026-03-05T09:07:30Z')) {}

  async insert(proposal: Omit<Proposal, 'created_at'>): Promise<Proposal> {
    this.insertCalls++;
    if (this.failNextInsertWith !== null) {
      const err = this.failNextInsertWith;
      this.failNextInsertWith = null;
      throw err;
    }
    const row = { ...proposal, created_at: this.clock() };
    this.rows.push(row);
    return row;
  }

  async findByReference(partnerId: string, reference: string): Promise<Proposal | null> {
    return this.rows.find((r) => r.partner_id === partnerId && r.reference === reference) ?? null;
  }

  async listByPartner(partnerId: string, limit: number): Promise<ProposalSummary[]> {
    return this.rows
      .filter((r) => r.partner_id === partnerId)
      .reverse()
      .slice(0, limit)
      .map((r) => ({
        id: r.id,
        reference: r.reference,
        target_users: r.input.targetUsers,
        marketing_cost: Math.round(r.quote.marketingCost * 100) / 100,
        cpa: Math.round(r.quote.cpa * 100) / 100,
        created_at: r.created_at,
      }));
  }

  async countReferencesLike(partnerId: string, baseReference: string): Promise<number> {
    return this.rows.filter(
      (r) => r.partner_id === partnerId && (r.reference === baseReference || r.reference.startsWith(`${baseReference}-`))
    ).length;
  }
}

export interface RunningServer {
  baseUrl: string;
  close: () => Promise<void>;
}

export function listen(app: Express): Promise<RunningServer> {
  return new Promise((resolve) => {
    const server = app.listen(0, '127.0.0.1', () => {
      const address = server.address();
      const port = typeof address === 'object' && address !== null ? address.port : 0;
      resolve({
        baseUrl: `http://127.0.0.1:${port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((err) => (err ? fail(err) : done()));
          }),
      });
    });
  });
}
