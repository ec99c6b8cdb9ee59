// ──────────────────────────────────────────
// Pricing: Request validation schemas
// ──────────────────────────────────────────

import { z } from 'zod';
import {
  CHANNEL_METRICS,
  DEFAULT_CONVERSION_RATE_PCT,
  MAX_TARGET_USERS,
  MIN_TARGET_USERS,
} from './rate-card';

const allocation = (recommended: number) =>
  z.number().int().min(0).max(100).default(recommended);

const weeks = (max: number, recommended: number) =>
  z.number().int().min(0).max(max).default(recommended);

export const campaignInputSchema = z.object({
  targetUsers: z.number().int().min(MIN_TARGET_USERS).max(MAX_TARGET_USERS).default(200_000),
  baseConversionRatePct: z.number().min(0.1).max(15).default(DEFAULT_CONVERSION_RATE_PCT),
  sms: allocation(CHANNEL_METRICS.sms.recommended),
  app: allocation(CHANNEL_METRICS.app.recommended),
  edm: allocation(CHANNEL_METRICS.edm.recommended),
  statementWeeks: weeks(CHANNEL_METRICS.statement.maxWeeks, CHANNEL_METRICS.statement.recommendedWeeks),
  bannerWeeks: weeks(CHANNEL_METRICS.banner.maxWeeks, CHANNEL_METRICS.banner.recommendedWeeks),
});

export function parseCampaignBody(body: unknown) {
  return campaignInputSchema.safeParse(body ?? {});
}
