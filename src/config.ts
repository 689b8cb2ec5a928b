/**
 * Configuration management for the HR Leave MCP Server
 */

import 'dotenv/config';
import { ConfigError } from './errors.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';
import { WEIGHT_SUM_EPSILON } from './employees/name-matcher.js';
import { EDIT_SIMILARITY_KINDS, NAME_VARIANTS, type EditSimilarityKind, type NameVariant } from './employees/types.js';

export interface Config {
  server: {
    port: number;
    host: string;
    nodeEnv: 'development' | 'production' | 'test';
  };
  database: {
    connectionString?: string;
    host: string;
    port: number;
    user?: string;
    password?: string;
    database: string;
    maxConnections: number;
    connectionTimeoutMs: number;
  };
  security: {
    requireApiKey: boolean;
    apiKeys: string[];
    apiKeyHeader: string;
    allowedOrigins: string[];
    keyCacheTtlMs: number;
    sessionTtlHours: number;
  };
  rateLimit: {
    enabled: boolean;
    windowMs: number;
    maxRequests: number;
  };
  matching: {
    threshold: number;
    editWeight: number;
    sequenceWeight: number;
    maxFuzzyCandidates: number;
    editSimilarity: EditSimilarityKind;
    variants: NameVariant[];
  };
  leave: {
    unknownTypeDays: number;
  };
  logging: {
    level: LogLevel;
  };
}

type Env = Record<string, string | undefined>;

const NODE_ENVS = ['development', 'production', 'test'] as const;

function getEnvOrDefault(env: Env, key: string, defaultValue: string): string {
  return env[key] || defaultValue;
}

function getNumber(env: Env, key: string, defaultValue: number): number {
  const raw = env[key];
  if (!raw) return defaultValue;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`Environment variable ${key} must be a number, got "${raw}"`);
  }
  return value;
}

function getFraction(env: Env, key: string, defaultValue: number): number {
  const value = getNumber(env, key, defaultValue);
  if (value < 0 || value > 1) {
    throw new ConfigError(`Environment variable ${key} must be between 0 and 1, got ${value}`);
  }
  return value;
}

function getPositiveInteger(env: Env, key: string, defaultValue: number): number {
  const value = getNumber(env, key, defaultValue);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`Environment variable ${key} must be a positive integer, got ${value}`);
  }
  return value;
}

function getBoolean(env: Env, key: string, defaultValue: boolean): boolean {
  const raw = env[key];
  if (!raw) return defaultValue;
  return raw.trim().toLowerCase() === 'true';
}

function getOneOf<T extends string>(env: Env, key: string, allowed: readonly T[], defaultValue: T): T {
  const raw = env[key];
  if (!raw) return defaultValue;
  const match = allowed.find(value => value === raw.trim().toLowerCase());
  if (!match) {
    throw new ConfigError(`Environment variable ${key} must be one of ${allowed.join(', ')}, got "${raw}"`);
  }
  return match;
}

function getList(env: Env, key: string, defaultValue: string): string[] {
  return getEnvOrDefault(env, key, defaultValue)
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

function getVariants(env: Env): NameVariant[] {
  const raw = env.NAME_MATCH_VARIANTS;
  if (!raw) return [...NAME_VARIANTS];
  if (raw.trim().toLowerCase() === 'none') return [];

  return getList(env, 'NAME_MATCH_VARIANTS', '').map(item => {
    const variant = NAME_VARIANTS.find(v => v === item.toLowerCase());
    if (!variant) {
      throw new ConfigError(
        `Environment variable NAME_MATCH_VARIANTS must list ${NAME_VARIANTS.join(', ')} or none, got "${item}"`
      );
    }
    return variant;
  });
}

function getMatching(env: Env): Config['matching'] {
  const editWeight = getFraction(env, 'NAME_MATCH_EDIT_WEIGHT', 0.6);
  const sequenceWeight = getFraction(env, 'NAME_MATCH_SEQUENCE_WEIGHT', 0.4);
  if (Math.abs(editWeight + sequenceWeight - 1) > WEIGHT_SUM_EPSILON) {
    throw new ConfigError(
      `NAME_MATCH_EDIT_WEIGHT and NAME_MATCH_SEQUENCE_WEIGHT must sum to 1, got ${editWeight} + ${sequenceWeight}`
    );
  }

  return {
    threshold: getFraction(env, 'NAME_MATCH_THRESHOLD', 0.6),
    editWeight,
    sequenceWeight,
    maxFuzzyCandidates: getPositiveInteger(env, 'NAME_MATCH_MAX_CANDIDATES', 5),
    editSimilarity: getOneOf(env, 'NAME_MATCH_EDIT_DISTANCE', EDIT_SIMILARITY_KINDS, 'levenshtein'),
    variants: getVariants(env),
  };
}

export function loadConfig(env: Env = process.env): Config {
  return {
    server: {
      port: getNumber(env, 'PORT', 8080),
      host: getEnvOrDefault(env, 'HOST', '0.0.0.0'),
      nodeEnv: getOneOf(env, 'NODE_ENV', NODE_ENVS, 'development'),
    },
    database: {
      connectionString: env.DATABASE_URL || undefined,
      host: getEnvOrDefault(env, 'DB_HOST', 'localhost'),
      port: getNumber(env, 'DB_PORT', 5432),
      user: env.DB_USER || undefined,
      password: env.DB_PASSWORD || undefined,
      database: getEnvOrDefault(env, 'DB_NAME', 'hr'),
      maxConnections: getNumber(env, 'DB_POOL_MAX', 10),
      connectionTimeoutMs: getNumber(env, 'DB_CONNECTION_TIMEOUT_MS', 10000),
    },
    security: {
      requireApiKey: getBoolean(env, 'REQUIRE_API_KEY', true),
      apiKeys: getList(env, 'MCP_API_KEYS', ''),
      apiKeyHeader: getEnvOrDefault(env, 'API_KEY_HEADER', 'x-api-key').toLowerCase(),
      allowedOrigins: getList(env, 'ALLOWED_ORIGINS', '*'),
      keyCacheTtlMs: getNumber(env, 'API_KEY_CACHE_TTL_MS', 60000),
      sessionTtlHours: getNumber(env, 'SESSION_TTL_HOURS', 24),
    },
    rateLimit: {
      enabled: getBoolean(env, 'ENABLE_RATE_LIMIT', true),
      windowMs: getNumber(env, 'RATE_LIMIT_WINDOW_MS', 60000), // 1 minute
      maxRequests: getNumber(env, 'RATE_LIMIT', 100),
    },
    matching: getMatching(env),
    leave: {
      unknownTypeDays: getNumber(env, 'LEAVE_UNKNOWN_TYPE_DAYS', 1),
    },
    logging: {
      level: getOneOf(env, 'LOG_LEVEL', LOG_LEVELS, 'info'),
    },
  };
}
