// ──────────────────────────────────────────
// Pricing domain — barrel export
// ──────────────────────────────────────────

export { PricingService } from './pricing.service';
export { createPricingRoutes } from './routes';
export { campaignInputSchema, parseCampaignBody } from './campaign.schema';
export * from './calculations';
export * from './rate-card';
