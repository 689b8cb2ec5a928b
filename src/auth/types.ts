/**
 * API key authentication types
 */

export interface ApiKeyPrincipal {
  id: string;
  name: string;
  source: 'env' | 'database' | 'anonymous';
}

export interface StoredApiKey {
  id: number;
  name: string;
  /** First characters of the clear key, for display */
  keyPrefix: string;
  isActive: boolean;
  createdAt: Date | null;
  lastUsedAt: Date | null;
  expiresAt: Date | null;
}

export interface NewApiKey {
  name: string;
  keyHash: string;
  keyPrefix: string;
  expiresAt: Date | null;
}

export interface ApiKeyStore {
  ensureTable(): Promise<void>;
  /** Active key with this SHA-256 hash, expired or not */
  findActiveByHash(keyHash: string): Promise<StoredApiKey | null>;
  /** Record a successful use */
  touch(id: number): Promise<void>;
  create(key: NewApiKey): Promise<StoredApiKey>;
  list(): Promise<StoredApiKey[]>;
  revoke(id: number): Promise<boolean>;
  countActive(): Promise<number>;
}

export interface GeneratedApiKey {
  key: string;
  record: StoredApiKey;
}
