// ──────────────────────────────────────────
// Migration: create all tables
// ──────────────────────────────────────────

import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  // ── Platform tables ──

  await knex.schema.createTable('partners', (t) => {
    t.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    t.string('name', 255).notNullable();
    t.string('slug', 100).unique().notNullable();
    t.jsonb('settings').notNullable().defaultTo('{}');
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable('api_keys', (t) => {
    t.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    t.uuid('partner_id').notNullable().references('id').inTable('partners').onDelete('CASCADE');
    t.string('key_hash', 255).unique().notNullable();
    t.string('label', 100).notNullable();
    t.specificType('scopes', 'text[]').notNullable();
    t.timestamp('last_used', { useTz: true });
    t.timestamp('expires_at', { useTz: true });
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  // ── Proposal tables ──

  await knex.schema.createTable('proposals', (t) => {
    t.uuid('id').primary();
    t.uuid('partner_id').notNullable().references('id').inTable('partners').onDelete('CASCADE');
    t.string('reference', 40).notNullable();
    t.integer('target_users').notNullable();
    t.decimal('marketing_cost', 14, 2).notNullable();
    t.decimal('cpa', 12, 2).notNullable();
    t.jsonb('input').notNullable();
    t.jsonb('quote').notNullable();
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.unique(['partner_id', 'reference']);
  });

  await knex.schema.raw(`
    CREATE INDEX idx_proposals_partner_created ON proposals (partner_id, created_at DESC);
  `);
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('proposals');
  await knex.schema.dropTableIfExists('api_keys');
  await knex.schema.dropTableIfExists('partners');
}
