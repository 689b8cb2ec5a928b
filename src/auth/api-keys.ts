/**
 * API key validation and management
 *
 * Keys come from two places: the MCP_API_KEYS environment variable and the
 * api_keys table. Successful database validations are cached in an LRU
 * with a short TTL so that each MCP request does not hit the database.
 */

import { LRUCache } from 'lru-cache';
import { createHash, randomBytes, timingSafeEqual } from 'node:crypto';
import { ConfigError } from '../errors.js';
import type { ApiKeyPrincipal, ApiKeyStore, GeneratedApiKey, StoredApiKey } from './types.js';

export interface ApiKeyServiceOptions {
  store: ApiKeyStore | null;
  envKeys: string[];
  cacheTtlMs: number;   // 0 disables caching
  cacheMaxSize?: number; // default: 500
  now?: () => Date;
}

interface CachedPrincipal {
  principal: ApiKeyPrincipal;
  expiresAt: Date | null;
}

const KEY_PREFIX = 'hr_mcp_';
const DISPLAY_PREFIX_LENGTH = 12;

export class ApiKeyService {
  private store: ApiKeyStore | null;
  private envKeyHashes: Buffer[];
  private cache: LRUCache<string, CachedPrincipal> | null;
  private now: () => Date;

  constructor(options: ApiKeyServiceOptions) {
    this.store = options.store;
    this.envKeyHashes = options.envKeys.map(key => Buffer.from(ApiKeyService.hashKey(key), 'hex'));
    this.now = options.now ?? (() => new Date());
    this.cache = options.cacheTtlMs > 0
      ? new LRUCache({
          max: options.cacheMaxSize ?? 500,
          ttl: options.cacheTtlMs,
          updateAgeOnGet: false,
        })
      : null;
  }

  static hashKey(key: string): string {
    return createHash('sha256').update(key).digest('hex');
  }

  /**
   * Mask a key for display: prefix followed by an ellipsis
   */
  static mask(record: StoredApiKey): string {
    return `${record.keyPrefix}...`;
  }

  private isExpired(expiresAt: Date | null): boolean {
    return expiresAt !== null && expiresAt.getTime() < this.now().getTime();
  }

  get hasStore(): boolean {
    return this.store !== null;
  }

  get envKeyCount(): number {
    return this.envKeyHashes.length;
  }

  /**
   * Resolve a presented key to its principal, or null when it is not valid
   */
  async validate(key: string): Promise<ApiKeyPrincipal | null> {
    if (!key) return null;

    const hash = ApiKeyService.hashKey(key);
    const hashBytes = Buffer.from(hash, 'hex');

    const envIndex = this.envKeyHashes.findIndex(candidate => timingSafeEqual(candidate, hashBytes));
    if (envIndex >= 0) {
      return { id: `env:${envIndex + 1}`, name: `env-key-${envIndex + 1}`, source: 'env' };
    }

    const cached = this.cache?.get(hash);
    if (cached) {
      // Cache TTL is independent of key expiry
      if (this.isExpired(cached.expiresAt)) {
        this.cache?.delete(hash);
        return null;
      }
      return cached.principal;
    }

    if (!this.store) return null;

    const record = await this.store.findActiveByHash(hash);
    if (!record) return null;
    if (this.isExpired(record.expiresAt)) {
      return null;
    }

    await this.store.touch(record.id);

    const principal: ApiKeyPrincipal = { id: `db:${record.id}`, name: record.name, source: 'database' };
    this.cache?.set(hash, { principal, expiresAt: record.expiresAt });
    return principal;
  }

  /**
   * Create and store a new key. The clear key is only ever returned here.
   */
  async generate(name: string, expiresInDays: number = 365): Promise<GeneratedApiKey> {
    const store = this.requireStore();
    const key = `${KEY_PREFIX}${randomBytes(32).toString('base64url')}`;
    const expiresAt = new Date(this.now().getTime() + expiresInDays * 24 * 60 * 60 * 1000);

    const record = await store.create({
      name,
      keyHash: ApiKeyService.hashKey(key),
      keyPrefix: key.slice(0, DISPLAY_PREFIX_LENGTH),
      expiresAt,
    });

    return { key, record };
  }

  async list(): Promise<StoredApiKey[]> {
    return this.requireStore().list();
  }

  async countActive(): Promise<number> {
    return this.requireStore().countActive();
  }

  async revoke(id: number): Promise<boolean> {
    const revoked = await this.requireStore().revoke(id);
    // Cached principals are keyed by hash, not id
    this.cache?.clear();
    return revoked;
  }

  private requireStore(): ApiKeyStore {
    if (!this.store) {
      throw new ConfigError('API key storage is not configured');
    }
    return this.store;
  }
}
