// ──────────────────────────────────────────
// Pricing: Quote assembly
// ──────────────────────────────────────────

import type { PricingContract } from '../../shared/contracts';
import type {
  BreakdownRow,
  CampaignInput,
  CampaignQuote,
  ChannelCosts,
  ChannelMetrics,
  ConversionAdvisory,
  PerUserChannel,
  ReachSummary,
} from '../../shared/types';
import { formatCount, formatNumber, formatPercent, formatRm } from '../../shared/format';
import { BASE_COSTS, CHANNEL_METRICS, PER_USER_CHANNELS } from './rate-card';
import {
  adjustChannelCosts,
  calculateCpa,
  channelEffectiveness,
  classifyConversionRate,
  costPerUser,
  diminishingFactor,
  reachedUsers,
  summarizeReach,
  toCents,
} from './calculations';

export class PricingService implements PricingContract {
  constructor(
    private setupFee: number,
    private metrics: ChannelMetrics = CHANNEL_METRICS,
    private baseCosts: ChannelCosts = BASE_COSTS
  ) {}

  getSetupFee(): number {
    return this.setupFee;
  }

  getMetrics(): ChannelMetrics {
    return this.metrics;
  }

  getBaseCosts(): ChannelCosts {
    return this.baseCosts;
  }

  quote(input: CampaignInput): CampaignQuote {
    const { targetUsers, statementWeeks, bannerWeeks } = input;
    const allocations: Record<PerUserChannel, number> = { sms: input.sms, app: input.app, edm: input.edm };

    const costs = adjustChannelCosts(targetUsers, this.baseCosts);
    const statementCost = costs.statement * statementWeeks;
    const bannerCost = costs.banner * bannerWeeks;
    const perUser = costPerUser(targetUsers, allocations, costs, statementCost, bannerCost);

    const breakdown = this.buildBreakdown(input, costs, statementCost, bannerCost);
    // Every invoice line is charged in whole cents; the total is their sum.
    const marketingCost =
      breakdown.reduce((cents, row) => cents + toCents(row.totalCost), toCents(this.setupFee)) / 100;

    const baseConversionRate = input.baseConversionRatePct / 100;
    const factor = diminishingFactor(targetUsers);
    const effectiveness = channelEffectiveness(allocations, this.metrics);

    const { approvals, cpa, adjustedConversionRate } = calculateCpa({
      targetUsers,
      marketingCost,
      baseConversionRate,
      diminishingFactor: factor,
      effectiveness,
    });

    const reach = summarizeReach(allocations);
    const conversionAdvisory = classifyConversionRate(baseConversionRate);

    const quote: CampaignQuote = {
      input,
      setupFee: this.setupFee,
      costs,
      statementCost,
      bannerCost,
      costPerUser: perUser,
      marketingCost,
      effectiveness,
      baseConversionRate,
      adjustedConversionRate,
      diminishingFactor: factor,
      approvals,
      cpa,
      reach,
      conversionAdvisory,
      warnings: buildWarnings(reach, conversionAdvisory),
      breakdown,
      insights: [],
    };
    quote.insights = buildInsights(quote);
    return quote;
  }

  private buildBreakdown(
    input: CampaignInput,
    costs: ChannelCosts,
    statementCost: number,
    bannerCost: number
  ): BreakdownRow[] {
    const impact = (channel: keyof ChannelMetrics): string => {
      const m = this.metrics[channel];
      return `${(m.engagementRate * 100).toFixed(1)}% ${m.impactLabel}`;
    };

    const perUserRows = PER_USER_CHANNELS.map((channel): BreakdownRow => {
      const reached = reachedUsers(input[channel], input.targetUsers);
      return {
        channel,
        label: this.metrics[channel].label,
        unitCost: costs[channel],
        unit: 'user',
        quantity: reached,
        reach: `${input[channel]}% of users`,
        expectedImpact: impact(channel),
        totalCost: toCents(costs[channel] * reached) / 100,
      };
    });

    return [
      ...perUserRows,
      {
        channel: 'statement',
        label: this.metrics.statement.label,
        unitCost: costs.statement,
        unit: 'week',
        quantity: input.statementWeeks,
        reach: `${input.statementWeeks} weeks`,
        expectedImpact: impact('statement'),
        totalCost: toCents(statementCost) / 100,
      },
      {
        channel: 'banner',
        label: this.metrics.banner.label,
        unitCost: costs.banner,
        unit: 'week',
        quantity: input.bannerWeeks,
        reach: `${input.bannerWeeks} weeks`,
        expectedImpact: impact('banner'),
        totalCost: toCents(bannerCost) / 100,
      },
    ];
  }
}

function buildWarnings(reach: ReachSummary, advisory: ConversionAdvisory): string[] {
  const warnings: string[] = [];

  if (reach.status === 'over') {
    warnings.push(`Total reach (${reach.totalReach}%) exceeds 100%. Please adjust your allocation.`);
  } else if (reach.status === 'under') {
    warnings.push(
      `Current reach is ${reach.totalReach}%. Unused allocation: ${reach.unusedAllocation}%. ` +
        `Campaign effectiveness will be reduced to ${formatPercent(reach.effectivenessImpact, 1)} of maximum potential.`
    );
  }

  if (advisory === 'above_benchmark') {
    warnings.push(
      'Expected conversion rate is higher than typical industry standards. ' +
        'Ensure historical data supports this projection.'
    );
  } else if (advisory === 'below_benchmark') {
    warnings.push(
      'Expected conversion rate is lower than typical industry standards. ' +
        'Review the target audience, the campaign messaging or the channel mix.'
    );
  }

  return warnings;
}

function buildInsights(quote: CampaignQuote): string[] {
  return [
    `Current target reach: ${formatCount(quote.input.targetUsers)} users`,
    `Channel reach utilization: ${quote.reach.totalReach}%`,
    `Average cost per user: ${formatRm(quote.costPerUser, 4, false)}`,
    `Base conversion rate: ${formatPercent(quote.baseConversionRate, 2)}`,
    `Adjusted conversion rate: ${formatPercent(quote.adjustedConversionRate, 4)}`,
    `Total effectiveness score: ${formatNumber(quote.effectiveness, 4, false)}`,
    `Diminishing factor applied: ${formatNumber(quote.diminishingFactor, 2, false)}`,
  ];
}
