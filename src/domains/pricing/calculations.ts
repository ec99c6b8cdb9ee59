// ──────────────────────────────────────────
// Pricing: Pure cost and conversion calculations
// ──────────────────────────────────────────

import type {
  ChannelCosts,
  ChannelMetrics,
  ConversionAdvisory,
  PerUserChannel,
  ReachSummary,
  VolumeBand,
} from '../../shared/types';
import {
  CONVERSION_HIGH_THRESHOLD,
  CONVERSION_LOW_THRESHOLD,
  DIMINISHING_RANGE,
  PER_USER_CHANNELS,
  VOLUME_BANDS,
} from './rate-card';

export function findVolumeBand(targetUsers: number, bands: readonly VolumeBand[] = VOLUME_BANDS): VolumeBand {
  const band = bands.find((b) => b.maxUsers === null || targetUsers <= b.maxUsers);
  if (!band) {
    throw new Error(`No volume band covers ${targetUsers} users`);
  }
  return band;
}

/**
 * Applies the volume band for `targetUsers` to every base rate.
 * Bands: ≤100k full price, ≤200k 10% off per-user channels, above that 15% off.
 */
export function adjustChannelCosts(
  targetUsers: number,
  base: ChannelCosts,
  bands: readonly VolumeBand[] = VOLUME_BANDS
): ChannelCosts {
  const band = findVolumeBand(targetUsers, bands);
  return {
    sms: base.sms * band.perUserMultiplier,
    app: base.app * band.perUserMultiplier,
    edm: base.edm * band.perUserMultiplier,
    statement: base.statement * band.statementMultiplier,
    banner: base.banner * band.bannerMultiplier,
  };
}

/** Linear between the range endpoints, clamped outside them. */
export function diminishingFactor(targetUsers: number): number {
  const { minUsers, maxUsers, minFactor, maxFactor } = DIMINISHING_RANGE;
  if (targetUsers <= minUsers) return minFactor;
  if (targetUsers >= maxUsers) return maxFactor;
  const t = (targetUsers - minUsers) / (maxUsers - minUsers);
  return minFactor + t * (maxFactor - minFactor);
}

/**
 * Weighted effectiveness score. Per-user channels scale with their allocation;
 * statement and banner always contribute their full impact.
 */
export function channelEffectiveness(
  allocations: Record<PerUserChannel, number>,
  metrics: ChannelMetrics
): number {
  let total = 0;
  for (const channel of PER_USER_CHANNELS) {
    const m = metrics[channel];
    total += (allocations[channel] / 100) * m.weight * m.engagementRate;
  }
  total += metrics.statement.weight * metrics.statement.engagementRate;
  total += metrics.banner.weight * metrics.banner.engagementRate;
  return total;
}

export function costPerUser(
  targetUsers: number,
  allocations: Record<PerUserChannel, number>,
  costs: ChannelCosts,
  statementCost: number,
  bannerCost: number
): number {
  let perUser = 0;
  for (const channel of PER_USER_CHANNELS) {
    perUser += costs[channel] * (allocations[channel] / 100);
  }
  return perUser + statementCost / targetUsers + bannerCost / targetUsers;
}

/** Whole users a per-user channel reaches at the given allocation. */
export function reachedUsers(allocationPct: number, targetUsers: number): number {
  return Math.floor((allocationPct * targetUsers) / 100);
}

export function toCents(amount: number): number {
  return Math.round(amount * 100);
}

export interface CpaResult {
  approvals: number;
  cpa: number;
  adjustedConversionRate: number;
}

export function calculateCpa(params: {
  targetUsers: number;
  marketingCost: number;
  baseConversionRate: number;
  diminishingFactor: number;
  effectiveness: number;
}): CpaResult {
  const adjustedConversionRate = params.baseConversionRate * params.effectiveness;
  const approvals = params.targetUsers * adjustedConversionRate * params.diminishingFactor;
  const cpa = approvals > 0 ? params.marketingCost / approvals : 0;
  return { approvals, cpa, adjustedConversionRate };
}

export function summarizeReach(allocations: Record<PerUserChannel, number>): ReachSummary {
  const totalReach = PER_USER_CHANNELS.reduce((sum, c) => sum + allocations[c], 0);
  const status = totalReach > 100 ? 'over' : totalReach < 100 ? 'under' : 'full';
  return {
    totalReach,
    status,
    unusedAllocation: Math.max(0, 100 - totalReach),
    effectivenessImpact: Math.min(1, totalReach / 100),
  };
}

export function classifyConversionRate(rate: number): ConversionAdvisory {
  if (rate > CONVERSION_HIGH_THRESHOLD) return 'above_benchmark';
  if (rate < CONVERSION_LOW_THRESHOLD) return 'below_benchmark';
  return 'within_benchmark';
}
