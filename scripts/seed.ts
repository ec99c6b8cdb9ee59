// ──────────────────────────────────────────
// Script: Seed — create demo partner, API key
// and a handful of sample proposals
// ──────────────────────────────────────────

import fs from 'fs';
import path from 'path';
import { faker } from '@faker-js/faker';
import { loadConfig } from '../src/config';
import { getDb, closeDb } from '../src/db/connection';
import { runMigrations } from '../src/db/migrate';
import { PartnerRepo } from '../src/platform/partner';
import { ApiKeyRepo, generateApiKey } from '../src/platform/auth';
import { PricingService, TARGET_USERS_STEP } from '../src/domains/pricing';
import { ProposalRepo, ProposalService } from '../src/domains/proposals';
import type { CampaignInput } from '../src/shared/types';

const SAMPLE_PROPOSALS = 6;

function sampleCampaign(): CampaignInput {
  const sms = faker.number.int({ min: 0, max: 40 });
  const app = faker.number.int({ min: 0, max: 100 - sms });
  return {
    targetUsers: faker.number.int({ min: 5, max: 50 }) * TARGET_USERS_STEP,
    baseConversionRatePct: faker.number.int({ min: 150, max: 750 }) / 100,
    sms,
    app,
    edm: 100 - sms - app,
    statementWeeks: faker.number.int({ min: 0, max: 12 }),
    bannerWeeks: faker.number.int({ min: 0, max: 12 }),
  };
}

async function seed() {
  const config = loadConfig();
  const db = getDb(config.databaseUrl);
  console.log('[Seed] Starting...');

  console.log('[Seed] Running migrations...');
  await runMigrations(db);

  // Clean slate — truncate all tables
  console.log('[Seed] Clearing existing data...');
  await db.raw('TRUNCATE TABLE proposals, api_keys, partners CASCADE');

  // ── 1. Partner ──
  const partnerRepo = new PartnerRepo(db);
  const name = faker.company.name();
  const partner = await partnerRepo.create({
    name,
    slug: faker.helpers.slugify(name).toLowerCase(),
    settings: { currency: 'MYR', timezone: 'Asia/Kuala_Lumpur' },
  });
  console.log(`[Seed] Created partner: ${partner.name} (${partner.id})`);

  // ── 2. API Key ──
  const apiKeyRepo = new ApiKeyRepo(db);
  const { raw, hash } = generateApiKey();
  await apiKeyRepo.create({
    partner_id: partner.id,
    key_hash: hash,
    label: 'Development',
    scopes: ['quote', 'proposals', 'admin'],
    expires_at: null,
  });
  console.log(`[Seed] Created API key: ${raw}`);

  // ── 3. Sample proposals ──
  const pricingService = new PricingService(config.setupFee);
  const proposalService = new ProposalService(pricingService, new ProposalRepo(db), config.referencePrefix);
  for (let i = 0; i < SAMPLE_PROPOSALS; i++) {
    await proposalService.create(partner.id, sampleCampaign());
  }

  console.log(`\n[Seed] ✅ Done!`);
  console.log(`  Partner:    ${partner.name} (${partner.id})`);
  console.log(`  API Key:    ${raw}`);
  console.log(`  Proposals:  ${SAMPLE_PROPOSALS}`);
  console.log(`\n  Test with:`);
  console.log(`  curl -H "x-api-key: ${raw}" localhost:${config.port}/api/v1/proposals`);
  console.log(`\n  Dashboard:`);
  console.log(`  PRICING_API_KEY=${raw} npm run dashboard\n`);

  // Write key to .api_key for the dashboard
  fs.writeFileSync(path.join(__dirname, '..', '.api_key'), raw);

  await closeDb();
}

seed().catch(async (err) => {
  console.error('[Seed] Error:', err);
  await closeDb();
  process.exit(1);
});
