// ──────────────────────────────────────────
// Entry point — bootstrap + HTTP server
// ──────────────────────────────────────────
// Bootstrap order:
// 1. Load config
// 2. Connect to Postgres and run migrations
// 3. Instantiate platform repos
// 4. Instantiate domains with contract injection
// 5. Listen on port

import { loadConfig } from './config';
import { getDb, closeDb } from './db/connection';
import { runMigrations } from './db/migrate';
import { createApp } from './app';

// Platform
import { PartnerRepo } from './platform/partner';
import { ApiKeyRepo } from './platform/auth';

// Domains
import { PricingService } from './domains/pricing';
import { ProposalRepo, ProposalService } from './domains/proposals';

async function main() {
  const config = loadConfig();
  const db = getDb(config.databaseUrl);
  await runMigrations(db);

  // ── Platform ──
  const partnerRepo = new PartnerRepo(db);
  const apiKeyRepo = new ApiKeyRepo(db);

  // ── Pricing ──
  const pricingService = new PricingService(config.setupFee);

  // ── Proposals ──
  const proposalRepo = new ProposalRepo(db);
  const proposalService = new ProposalService(pricingService, proposalRepo, config.referencePrefix);

  const app = createApp({
    apiKeys: apiKeyRepo,
    partners: partnerRepo,
    pricingService,
    proposalService,
    referencePrefix: config.referencePrefix,
  });

  const server = app.listen(config.port, () => {
    console.log(`[App] Campaign pricing API listening on port ${config.port}`);
  });

  // Graceful shutdown
  const shutdown = () => {
    console.log('[App] Shutting down...');
    server.close(() => {
      closeDb()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          console.error('[App] Failed to close database:', err);
          process.exit(1);
        });
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err) => {
  console.error('[App] Fatal error:', err);
  process.exit(1);
});
