// ──────────────────────────────────────────
// Database migrations — run on startup and from scripts
// ──────────────────────────────────────────

import path from 'path';
import type { Knex } from 'knex';

export const MIGRATIONS_DIR = path.resolve(__dirname, 'migrations');

export async function runMigrations(db: Knex): Promise<void> {
  const [batch, applied] = await db.migrate.latest({
    directory: MIGRATIONS_DIR,
    loadExtensions: ['.ts', '.js'],
  });
  if (applied.length > 0) {
    console.log(`[DB] Batch ${batch}: applied ${applied.length} migration(s)`);
  }
}
