// ──────────────────────────────────────────
// Shared type definitions for campaign pricing
// ──────────────────────────────────────────

export type PerUserChannel = 'sms' | 'app' | 'edm';
export type WeeklyChannel = 'statement' | 'banner';
export type Channel = PerUserChannel | WeeklyChannel;
export type ApiKeyScope = 'quote' | 'proposals' | 'admin';
export type ReachStatus = 'full' | 'under' | 'over';
export type ConversionAdvisory = 'within_benchmark' | 'above_benchmark' | 'below_benchmark';
export type ImpactLabel = 'engagement' | 'click rate' | 'open rate';

// ── Platform ──

export interface PartnerSettings {
  currency: string;
  timezone: string;
}

export interface Partner {
  id: string;
  name: string;
  slug: string;
  settings: PartnerSettings;
  created_at: Date;
}

export interface ApiKey {
  id: string;
  partner_id: string;
  key_hash: string;
  label: string;
  scopes: ApiKeyScope[];
  last_used: Date | null;
  expires_at: Date | null;
  created_at: Date;
}

// ── Pricing ──

export interface ChannelMetric {
  label: string;
  weight: number;
  engagementRate: number;
  impactLabel: ImpactLabel;
  description: string;
}

export interface PerUserChannelMetric extends ChannelMetric {
  minAllocation: number;
  maxAllocation: number;
  recommended: number;
}

export interface WeeklyChannelMetric extends ChannelMetric {
  minWeeks: number;
  maxWeeks: number;
  recommendedWeeks: number;
}

export type ChannelMetrics = Record<PerUserChannel, PerUserChannelMetric> &
  Record<WeeklyChannel, WeeklyChannelMetric>;

/** Per-user costs for sms/app/edm, per-week rates for statement/banner (RM). */
export type ChannelCosts = Record<Channel, number>;

export interface VolumeBand {
  /** Inclusive upper bound on target users; null for the open-ended top band. */
  maxUsers: number | null;
  perUserMultiplier: number;
  statementMultiplier: number;
  bannerMultiplier: number;
}

export interface ConversionBenchmark {
  industry: string;
  minPct: number;
  maxPct: number;
}

export interface CampaignInput {
  targetUsers: number;
  baseConversionRatePct: number;
  sms: number;
  app: number;
  edm: number;
  statementWeeks: number;
  bannerWeeks: number;
}

export interface ReachSummary {
  totalReach: number;
  status: ReachStatus;
  unusedAllocation: number;
  /** Share of maximum potential reached, 0..1 (capped at 1). */
  effectivenessImpact: number;
}

export interface BreakdownRow {
  channel: Channel;
  label: string;
  unitCost: number;
  unit: 'user' | 'week';
  /** Reached users for per-user channels, weeks for weekly channels. */
  quantity: number;
  reach: string;
  expectedImpact: string;
  /** Rounded to cents. */
  totalCost: number;
}

export interface CampaignQuote {
  input: CampaignInput;
  setupFee: number;
  costs: ChannelCosts;
  statementCost: number;
  bannerCost: number;
  costPerUser: number;
  marketingCost: number;
  effectiveness: number;
  baseConversionRate: number;
  adjustedConversionRate: number;
  diminishingFactor: number;
  approvals: number;
  cpa: number;
  reach: ReachSummary;
  conversionAdvisory: ConversionAdvisory;
  warnings: string[];
  breakdown: BreakdownRow[];
  insights: string[];
}

// ── Proposals ──

export interface Proposal {
  id: string;
  partner_id: string;
  reference: string;
  input: CampaignInput;
  quote: CampaignQuote;
  created_at: Date;
}

export interface ProposalSummary {
  id: string;
  reference: string;
  target_users: number;
  marketing_cost: number;
  cpa: number;
  created_at: Date;
}

// ── Reporting ──

export interface ReportRow {
  Category: string;
  Item: string;
  Value: string;
}

export interface InvoiceLine {
  'Item Reference': string;
  Date: string;
  Description: string;
  Quantity: string;
  'Unit Cost (RM)': string;
  'Total Cost (RM)': string;
}
