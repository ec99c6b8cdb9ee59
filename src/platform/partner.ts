// ──────────────────────────────────────────
// Platform: Partner repository
// ──────────────────────────────────────────

import type { Knex } from 'knex';
import type { PartnerStore } from '../shared/contracts';
import type { Partner } from '../shared/types';

export class PartnerRepo implements PartnerStore {
  constructor(private db: Knex) {}

  async findById(id: string): Promise<Partner | null> {
    const row = await this.db('partners').where('id', id).first();
    return row ?? null;
  }

  async create(partner: Omit<Partner, 'id' | 'created_at'>): Promise<Partner> {
    const [row] = await this.db('partners').insert(partner).returning('*');
    return row;
  }
}
