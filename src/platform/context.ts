// ──────────────────────────────────────────
// Platform: Request scope set by API key auth
// ──────────────────────────────────────────
// Every /api/v1 request runs inside the scope of the key that authenticated
// it: the partner that owns the key and the scopes it was issued with.

import { AsyncLocalStorage } from 'async_hooks';
import type { ApiKey, ApiKeyScope } from '../shared/types';

export interface PartnerScope {
  partnerId: string;
  keyId: string;
  scopes: readonly ApiKeyScope[];
}

const scopeStore = new AsyncLocalStorage<PartnerScope>();

export function withPartnerScope<T>(apiKey: ApiKey, fn: () => T): T {
  return scopeStore.run({ partnerId: apiKey.partner_id, keyId: apiKey.id, scopes: apiKey.scopes }, fn);
}

export function getPartnerScope(): PartnerScope {
  const scope = scopeStore.getStore();
  if (!scope) {
    throw new Error('Request is not scoped to a partner API key');
  }
  return scope;
}

export function getPartnerId(): string {
  return getPartnerScope().partnerId;
}
