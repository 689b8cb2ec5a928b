/**
 * PostgreSQL storage for API keys. Only SHA-256 hashes of keys are stored.
 */

import type { ApiKeyStore, NewApiKey, StoredApiKey } from '../auth/types.js';
import { DatabaseError } from '../errors.js';
import type { SqlClient, SqlRow } from './pool.js';
import { readNumber, readString, readTimestamp } from './rows.js';

const KEY_COLUMNS = 'id, name, key_prefix, is_active, created_at, last_used, expires_at';

function toStoredApiKey(row: SqlRow): StoredApiKey {
  return {
    id: readNumber(row, 'id'),
    name: readString(row, 'name'),
    keyPrefix: readString(row, 'key_prefix'),
    isActive: row.is_active === true,
    createdAt: readTimestamp(row, 'created_at'),
    lastUsedAt: readTimestamp(row, 'last_used'),
    expiresAt: readTimestamp(row, 'expires_at'),
  };
}

export class PgApiKeyStore implements ApiKeyStore {
  private db: SqlClient;

  constructor(db: SqlClient) {
    this.db = db;
  }

  async ensureTable(): Promise<void> {
    await this.db.query(`
      CREATE TABLE IF NOT EXISTS api_keys (
        id SERIAL PRIMARY KEY,
        name VARCHAR(100) NOT NULL,
        key_hash CHAR(64) UNIQUE NOT NULL,
        key_prefix VARCHAR(16) NOT NULL,
        is_active BOOLEAN NOT NULL DEFAULT TRUE,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        last_used TIMESTAMPTZ NULL,
        expires_at TIMESTAMPTZ NULL
      )`);
  }

  async findActiveByHash(keyHash: string): Promise<StoredApiKey | null> {
    const rows = await this.db.query(
      `SELECT ${KEY_COLUMNS} FROM api_keys WHERE key_hash = $1 AND is_active = TRUE`,
      [keyHash]
    );
    return rows.length > 0 ? toStoredApiKey(rows[0]) : null;
  }

  async touch(id: number): Promise<void> {
    await this.db.query('UPDATE api_keys SET last_used = NOW() WHERE id = $1', [id]);
  }

  async create(key: NewApiKey): Promise<StoredApiKey> {
    const rows = await this.db.query(
      `INSERT INTO api_keys (name, key_hash, key_prefix, expires_at)
       VALUES ($1, $2, $3, $4)
       RETURNING ${KEY_COLUMNS}`,
      [key.name, key.keyHash, key.keyPrefix, key.expiresAt]
    );
    if (rows.length === 0) {
      throw new DatabaseError('API key insert returned no row');
    }
    return toStoredApiKey(rows[0]);
  }

  async list(): Promise<StoredApiKey[]> {
    const rows = await this.db.query(`SELECT ${KEY_COLUMNS} FROM api_keys ORDER BY created_at DESC`);
    return rows.map(toStoredApiKey);
  }

  async revoke(id: number): Promise<boolean> {
    const rows = await this.db.query(
      'UPDATE api_keys SET is_active = FALSE WHERE id = $1 AND is_active = TRUE RETURNING id',
      [id]
    );
    return rows.length > 0;
  }

  async countActive(): Promise<number> {
    const rows = await this.db.query('SELECT COUNT(*) AS count FROM api_keys WHERE is_active = TRUE');
    return rows.length > 0 ? readNumber(rows[0], 'count') : 0;
  }
}
