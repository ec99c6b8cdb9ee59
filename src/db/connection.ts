// ──────────────────────────────────────────
// Database connection — Knex instance
// ──────────────────────────────────────────

import knex from 'knex';
import type { Knex } from 'knex';

let db: Knex | undefined;

export function getDb(connectionString = process.env.DATABASE_URL): Knex {
  if (!db) {
    if (!connectionString) {
      throw new Error('DATABASE_URL is not set');
    }
    db = knex({
      client: 'pg',
      connection: connectionString,
      pool: { min: 2, max: 10 },
    });
  }
  return db;
}

export async function closeDb(): Promise<void> {
  if (db) {
    await db.destroy();
    db = undefined;
  }
}
