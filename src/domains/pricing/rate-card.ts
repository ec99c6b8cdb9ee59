// ──────────────────────────────────────────
// Pricing: Channel metrics, base rates and volume bands
// ──────────────────────────────────────────

import type {
  ChannelCosts,
  ChannelMetrics,
  ConversionBenchmark,
  PerUserChannel,
  VolumeBand,
} from '../../shared/types';

export const PER_USER_CHANNELS: readonly PerUserChannel[] = ['sms', 'app', 'edm'];

export const MIN_TARGET_USERS = 50_000;
export const MAX_TARGET_USERS = 500_000;
export const TARGET_USERS_STEP = 10_000;

// Diminishing factor endpoints (users → factor)
export const DIMINISHING_RANGE = {
  minUsers: MIN_TARGET_USERS,
  maxUsers: MAX_TARGET_USERS,
  minFactor: 0.5,
  maxFactor: 1.0,
} as const;

// Conversion rate advisory thresholds, as fractions
export const CONVERSION_HIGH_THRESHOLD = 0.08;
export const CONVERSION_LOW_THRESHOLD = 0.01;

export const DEFAULT_CONVERSION_RATE_PCT = 5.49;

export const CHANNEL_METRICS: ChannelMetrics = {
  sms: {
    label: 'SMS',
    weight: 0.15, // no links allowed
    engagementRate: 0.05,
    impactLabel: 'engagement',
    description: 'Limited by no-link policy',
    minAllocation: 0,
    maxAllocation: 100,
    recommended: 20,
  },
  app: {
    label: 'App Notification',
    weight: 0.25,
    engagementRate: 0.15,
    impactLabel: 'engagement',
    description: 'Good for direct interaction',
    minAllocation: 0,
    maxAllocation: 100,
    recommended: 30,
  },
  edm: {
    label: 'eDM',
    weight: 0.2,
    engagementRate: 0.08,
    impactLabel: 'click rate',
    description: 'Effective for detailed content',
    minAllocation: 0,
    maxAllocation: 100,
    recommended: 25,
  },
  statement: {
    label: 'Statement Message',
    weight: 0.4,
    engagementRate: 0.35,
    impactLabel: 'open rate',
    description: 'Highest engagement',
    minWeeks: 0,
    maxWeeks: 12,
    recommendedWeeks: 4,
  },
  banner: {
    label: 'Website Banner',
    weight: 0.1,
    engagementRate: 0.02,
    impactLabel: 'click rate',
    description: 'Supplementary reach',
    minWeeks: 0,
    maxWeeks: 12,
    recommendedWeeks: 3,
  },
};

/** Base rates in RM: per reached user for sms/app/edm, per week for statement/banner. */
export const BASE_COSTS: ChannelCosts = {
  sms: 0.03,
  app: 0.06,
  edm: 0.2,
  statement: 4000,
  banner: 750,
};

// Ordered by maxUsers ascending; the last band is open-ended.
export const VOLUME_BANDS: readonly VolumeBand[] = [
  { maxUsers: 100_000, perUserMultiplier: 1, statementMultiplier: 1, bannerMultiplier: 1 },
  { maxUsers: 200_000, perUserMultiplier: 0.9, statementMultiplier: 0.95, bannerMultiplier: 0.8 },
  { maxUsers: null, perUserMultiplier: 0.85, statementMultiplier: 0.95, bannerMultiplier: 0.75 },
];

export const CONVERSION_BENCHMARKS: readonly ConversionBenchmark[] = [
  { industry: 'Financial Services', minPct: 2.5, maxPct: 5.5 },
  { industry: 'Consumer Banking', minPct: 2.9, maxPct: 6.1 },
  { industry: 'Credit Cards', minPct: 1.8, maxPct: 4.7 },
  { industry: 'Personal Loans', minPct: 2.2, maxPct: 5.9 },
  { industry: 'Investment Products', minPct: 1.5, maxPct: 3.8 },
  { industry: 'Insurance', minPct: 2.4, maxPct: 4.9 },
];
