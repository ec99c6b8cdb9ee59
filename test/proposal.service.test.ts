import { describe, expect, it } from 'vitest';
import { PricingService } from '../src/domains/pricing/pricing.service';
import { ProposalService } from '../src/domains/proposals/proposal.service';
import type { CampaignInput } from '../src/shared/types';
import { InMemoryProposals, PARTNER_ID } from './helpers';

const input: CampaignInput = {
  targetUsers: 150_000,
  baseConversionRatePct: 4,
  sms: 40,
  app: 40,
  edm: 20,
  statementWeeks: 2,
  bannerWeeks: 0,
};

function setup() {
  const store = new InMemoryProposals();
  const service = new ProposalService(
    new PricingService(10_000),
    store,
    'VX',
    () => new Date('2026-03-05T09:07:30Z')
  );
  return { store, service };
}

describe('ProposalService', () => {
  it('saves the quote under a minute-stamped reference', async () => {
    const { service } = setup();
    const proposal = await service.create(PARTNER_ID, input);

    expect(proposal.reference).toBe('VX202603050907');
    expect(proposal.partner_id).toBe(PARTNER_ID);
    expect(proposal.input).toEqual(input);
    expect(proposal.quote.input).toEqual(input);
    expect(proposal.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('suffixes references created in the same minute', async () => {
    const { service } = setup();
    const refs: string[] = [];
    for (let i = 0; i < 3; i++) {
      refs.push((await service.create(PARTNER_ID, input)).reference);
    }
    expect(refs).toEqual(['VX202603050907', 'VX202603050907-2', 'VX202603050907-3']);
  });

  it('keeps reference sequences separate per partner', async () => {
    const { service } = setup();
    await service.create(PARTNER_ID, input);
    const other = await service.create('other-partner', input);
    expect(other.reference).toBe('VX202603050907');
  });

  it('retries when the reference was taken concurrently', async () => {
    const { store, service } = setup();
    store.failNextInsertWith = Object.assign(new Error('duplicate key'), { code: '23505' });

    const proposal = await service.create(PARTNER_ID, input);
    expect(store.insertCalls).toBe(2);
    expect(proposal.reference).toBe('VX202603050907');
  });

  it('propagates other storage errors', async () => {
    const { store, service } = setup();
    store.failNextInsertWith = new Error('connection refused');

    await expect(service.create(PARTNER_ID, input)).rejects.toThrow('connection refused');
    expect(store.insertCalls).toBe(1);
  });

  it('looks proposals up by reference within the partner', async () => {
    const { service } = setup();
    const saved = await service.create(PARTNER_ID, input);

    expect(await service.get(PARTNER_ID, saved.reference)).toEqual(saved);
    expect(await service.get('other-partner', saved.reference)).toBeNull();
  });

  it('lists the newest proposals first', async () => {
    const { service } = setup();
    await service.create(PARTNER_ID, input);
    await service.create(PARTNER_ID, { ...input, targetUsers: 300_000 });

    const list = await service.list(PARTNER_ID);
    expect(list.map((p) => [p.reference, p.target_users])).toEqual([
      ['VX202603050907-2', 300_000],
      ['VX202603050907', 150_000],
    ]);
  });
});
