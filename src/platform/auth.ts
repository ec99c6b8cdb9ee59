// ──────────────────────────────────────────
// Platform: Auth middleware + API key resolution
// ──────────────────────────────────────────

import crypto from 'crypto';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { Knex } from 'knex';
import type { ApiKeyStore } from '../shared/contracts';
import type { ApiKey, ApiKeyScope } from '../shared/types';
import { withPartnerScope } from './context';

export class ApiKeyRepo implements ApiKeyStore {
  constructor(private db: Knex) {}

  async findByHash(keyHash: string): Promise<ApiKey | null> {
    const row = await this.db('api_keys').where('key_hash', keyHash).first();
    return row ?? null;
  }

  async create(apiKey: Omit<ApiKey, 'id' | 'created_at' | 'last_used'>): Promise<ApiKey> {
    const [row] = await this.db('api_keys')
      .insert({ ...apiKey, last_used: null })
      .returning('*');
    return row;
  }

  async touchLastUsed(id: string): Promise<void> {
    await this.db('api_keys').where('id', id).update({ last_used: new Date() });
  }
}

export function hashApiKey(rawKey: string): string {
  return crypto.createHash('sha256').update(rawKey).digest('hex');
}

export function generateApiKey(): { raw: string; hash: string } {
  const raw = `cpk_${crypto.randomBytes(24).toString('hex')}`;
  const hash = hashApiKey(raw);
  return { raw, hash };
}

/** `admin` satisfies every scope. */
export function hasScope(apiKey: ApiKey, scope: ApiKeyScope): boolean {
  return apiKey.scopes.includes(scope) || apiKey.scopes.includes('admin');
}

export function apiKeyAuth(apiKeys: ApiKeyStore, requiredScope?: ApiKeyScope): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const rawKey = req.get('x-api-key');
    if (!rawKey) {
      res.status(401).json({ error: 'Missing x-api-key header' });
      return;
    }

    let apiKey: ApiKey | null;
    try {
      apiKey = await apiKeys.findByHash(hashApiKey(rawKey));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error('[Auth] Key lookup failed:', message);
      res.status(500).json({ error: 'Internal error' });
      return;
    }

    if (!apiKey) {
      res.status(401).json({ error: 'Invalid API key' });
      return;
    }

    if (apiKey.expires_at && new Date(apiKey.expires_at) < new Date()) {
      res.status(401).json({ error: 'API key expired' });
      return;
    }

    if (requiredScope && !hasScope(apiKey, requiredScope)) {
      res.status(403).json({ error: `Missing required scope: ${requiredScope}` });
      return;
    }

    // Background touch — the request does not wait on it
    const keyId = apiKey.id;
    apiKeys.touchLastUsed(keyId).catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      console.warn(`[Auth] Failed to touch last_used for key ${keyId}:`, message);
    });

    withPartnerScope(apiKey, () => next());
  };
}
