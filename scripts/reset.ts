// ──────────────────────────────────────────
// Script: Reset — drop all tables and re-run migrations
// ──────────────────────────────────────────

import { loadConfig } from '../src/config';
import { getDb, closeDb } from '../src/db/connection';
import { runMigrations } from '../src/db/migrate';

async function reset() {
  const config = loadConfig();
  const db = getDb(config.databaseUrl);
  console.log('[Reset] Dropping all tables...');

  // Drop in reverse FK order
  await db.raw('DROP TABLE IF EXISTS proposals CASCADE');
  await db.raw('DROP TABLE IF EXISTS api_keys CASCADE');
  await db.raw('DROP TABLE IF EXISTS partners CASCADE');
  await db.raw('DROP TABLE IF EXISTS knex_migrations CASCADE');
  await db.raw('DROP TABLE IF EXISTS knex_migrations_lock CASCADE');

  console.log('[Reset] Running migrations...');
  await runMigrations(db);

  console.log('[Reset] ✅ Done — all tables recreated');
  await closeDb();
}

reset().catch(async (err) => {
  console.error('[Reset] Error:', err);
  await closeDb();
  process.exit(1);
});
