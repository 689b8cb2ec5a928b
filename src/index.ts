/**
 * HR Leave MCP Server - Entry Point
 *
 * A remote MCP server exposing employees, leave balances and work reports.
 * Clients authenticate with API keys; employee names are resolved with
 * exact lookup first and fuzzy matching as the fallback.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { createApp } from './app.js';
import { createPool, createSqlClient } from './db/pool.js';
import { PgHrRepository } from './db/hr-repository.js';
import { PgApiKeyStore } from './db/api-key-repository.js';
import { ApiKeyService } from './auth/api-keys.js';
import { EmployeeResolver, NameMatcher, detectEditSimilarity } from './employees/index.js';
import { createLeavePolicy } from './leave/index.js';
import { MemorySessionStore } from './session/memory-store.js';
import { registerTools } from './tools/index.js';
import { SERVER_NAME, SERVER_VERSION } from './version.js';

const SESSION_SWEEP_INTERVAL_MS = 15 * 60 * 1000;

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logging.level);

  const pool = createPool(config.database, logger);
  const db = createSqlClient(pool, logger);
  const hr = new PgHrRepository(db);
  const apiKeyStore = new PgApiKeyStore(db);

  const apiKeys = new ApiKeyService({
    store: apiKeyStore,
    envKeys: config.security.apiKeys,
    cacheTtlMs: config.security.keyCacheTtlMs,
  });

  const editSimilarity = await detectEditSimilarity(config.matching.editSimilarity, logger);
  const matcher = new NameMatcher(editSimilarity, {
    editWeight: config.matching.editWeight,
    sequenceWeight: config.matching.sequenceWeight,
    threshold: config.matching.threshold,
    variants: config.matching.variants,
  });
  const resolver = new EmployeeResolver(hr, matcher, {
    threshold: config.matching.threshold,
    maxFuzzyCandidates: config.matching.maxFuzzyCandidates,
  });
  const leavePolicy = createLeavePolicy({ unknownTypeDays: config.leave.unknownTypeDays });

  if (await db.ping()) {
    logger.info('Database connection: OK');
    await apiKeyStore.ensureTable();

    if (config.security.requireApiKey && config.security.apiKeys.length === 0 && await apiKeys.countActive() === 0) {
      const { key } = await apiKeys.generate('default-admin-key');
      logger.warn(`No API keys configured. Generated default key (shown once): ${key}`);
    }
  } else {
    logger.error('Database connection: FAILED - tools will report lookup errors until it recovers');
  }

  if (!config.security.requireApiKey) {
    logger.warn('API key authentication: DISABLED');
  } else {
    logger.info(`API key authentication: ENABLED (${config.security.apiKeys.length} env keys + database keys)`);
  }

  const sessionStore = new MemorySessionStore();

  const { app, closeSession } = createApp({
    config,
    logger,
    apiKeys,
    sessionStore,
    createMcpServer: () => {
      const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
      registerTools(server, { resolver, hr, apiKeys, leavePolicy });
      return server;
    },
    checkDatabase: () => db.ping(),
  });

  // Close sessions idle for longer than the session TTL
  const sessionTtlMs = config.security.sessionTtlHours * 60 * 60 * 1000;
  const sweep = setInterval(() => {
    const expired = sessionStore.cleanup(sessionTtlMs);
    Promise.all(expired.map(id => closeSession(id)))
      .then(() => {
        if (expired.length > 0) {
          logger.info(`Closed ${expired.length} idle session(s)`);
        }
      })
      .catch((error: unknown) => logger.error('Session sweep failed:', error));
  }, SESSION_SWEEP_INTERVAL_MS);
  sweep.unref();

  const { port, host } = config.server;
  const httpServer = app.listen(port, host, () => {
    logger.info(`${SERVER_NAME} ${SERVER_VERSION} running at http://${host}:${port}`);
    logger.info(`MCP endpoint: http://${host}:${port}/mcp`);
    logger.info(`Name matching: ${matcher.editSimilarityKind}, variants: ${config.matching.variants.join(', ') || 'none'}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    clearInterval(sweep);
    httpServer.close(() => {
      db.close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Failed to close database pool:', error);
          process.exit(1);
        });
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
