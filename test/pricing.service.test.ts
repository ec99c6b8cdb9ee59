import { describe, expect, it } from 'vitest';
import { PricingService } from '../src/domains/pricing/pricing.service';
import type { CampaignInput } from '../src/shared/types';

const defaults: CampaignInput = {
  targetUsers: 200_000,
  baseConversionRatePct: 5.49,
  sms: 20,
  app: 30,
  edm: 25,
  statementWeeks: 4,
  bannerWeeks: 3,
};

describe('PricingService.quote', () => {
  const service = new PricingService(10_000);

  it('prices the recommended campaign', () => {
    const quote = service.quote(defaults);

    expect(quote.statementCost).toBeCloseTo(15_200, 8);
    expect(quote.bannerCost).toBeCloseTo(1_800, 8);
    expect(quote.costPerUser).toBeCloseTo(0.1516, 10);
    expect(quote.marketingCost).toBeCloseTo(40_320, 6);
    expect(quote.effectiveness).toBeCloseTo(0.15875, 12);
    expect(quote.adjustedConversionRate).toBeCloseTo(0.008715375, 12);
    expect(quote.diminishingFactor).toBeCloseTo(2 / 3, 12);
    expect(quote.approvals).toBeCloseTo(1162.05, 6);
    expect(quote.cpa).toBeCloseTo(34.6973, 4);
    expect(quote.conversionAdvisory).toBe('within_benchmark');
  });

  it('uses the entered conversion rate', () => {
    const quote = service.quote({ ...defaults, baseConversionRatePct: 2.5 });
    expect(quote.baseConversionRate).toBeCloseTo(0.025, 12);
    expect(quote.adjustedConversionRate).toBeCloseTo(0.025 * 0.15875, 12);
  });

  it('adds the configured setup fee', () => {
    const quote = new PricingService(5_000).quote(defaults);
    expect(quote.setupFee).toBe(5_000);
    expect(quote.marketingCost).toBeCloseTo(35_320, 6);
  });

  it('builds one breakdown row per channel', () => {
    const quote = service.quote(defaults);
    expect(quote.breakdown.map((r) => r.channel)).toEqual(['sms', 'app', 'edm', 'statement', 'banner']);

    const [sms, , edm, statement, banner] = quote.breakdown;
    expect(sms).toMatchObject({ label: 'SMS', unit: 'user', reach: '20% of users', expectedImpact: '5.0% engagement' });
    expect(sms).toMatchObject({ quantity: 40_000, totalCost: 1080 });
    expect(edm.expectedImpact).toBe('8.0% click rate');
    expect(statement).toMatchObject({ unit: 'week', reach: '4 weeks', expectedImpact: '35.0% open rate' });
    expect(statement.unitCost).toBeCloseTo(3800, 8);
    expect(statement).toMatchObject({ quantity: 4, totalCost: 15_200 });
    expect(banner.reach).toBe('3 weeks');
    expect(banner.expectedImpact).toBe('2.0% click rate');
  });

  it('warns about unused channel allocation', () => {
    const quote = service.quote(defaults);
    expect(quote.reach.status).toBe('under');
    expect(quote.warnings).toEqual([
      'Current reach is 75%. Unused allocation: 25%. Campaign effectiveness will be reduced to 75.0% of maximum potential.',
    ]);
  });

  it('still prices an over-allocated mix and reports it', () => {
    const quote = service.quote({ ...defaults, sms: 60, app: 50, edm: 0 });
    expect(quote.reach.status).toBe('over');
    expect(quote.warnings[0]).toBe('Total reach (110%) exceeds 100%. Please adjust your allocation.');
    expect(quote.marketingCost).toBeGreaterThan(0);
  });

  it('has no warnings for a full mix with a typical conversion rate', () => {
    const quote = service.quote({ ...defaults, sms: 50, app: 30, edm: 20 });
    expect(quote.warnings).toEqual([]);
  });

  it('flags conversion rates outside the industry band', () => {
    const high = service.quote({ ...defaults, sms: 50, app: 30, edm: 20, baseConversionRatePct: 9 });
    expect(high.conversionAdvisory).toBe('above_benchmark');
    expect(high.warnings).toEqual([
      'Expected conversion rate is higher than typical industry standards. Ensure historical data supports this projection.',
    ]);

    const low = service.quote({ ...defaults, sms: 50, app: 30, edm: 20, baseConversionRatePct: 0.5 });
    expect(low.conversionAdvisory).toBe('below_benchmark');
    expect(low.warnings).toHaveLength(1);
  });

  it('summarises the campaign as insights', () => {
    const insights = service.quote(defaults).insights;
    expect(insights[0]).toBe('Current target reach: 200,000 users');
    expect(insights[1]).toBe('Channel reach utilization: 75%');
    expect(insights[2]).toBe('Average cost per user: RM 0.1516');
    expect(insights[3]).toBe('Base conversion rate: 5.49%');
    expect(insights[4]).toBe('Adjusted conversion rate: 0.8715%');
    expect(insights[6]).toBe('Diminishing factor applied: 0.67');
  });
});
