/**
 * HTTP application
 *
 * Express app serving the MCP Streamable HTTP endpoint behind API key
 * authentication and rate limiting, plus public health and info endpoints.
 */

import express from 'express';
import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { randomUUID } from 'node:crypto';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';

import type { Config } from './config.js';
import type { Logger } from './logger.js';
import type { ApiKeyService } from './auth/api-keys.js';
import { ANONYMOUS_PRINCIPAL, createApiKeyMiddleware } from './auth/middleware.js';
import type { SessionStore } from './session/types.js';
import { SERVER_NAME, SERVER_VERSION } from './version.js';

export interface AppDependencies {
  config: Config;
  logger: Logger;
  apiKeys: ApiKeyService;
  sessionStore: SessionStore;
  /** Fresh MCP server per session */
  createMcpServer: () => McpServer;
  checkDatabase: () => Promise<boolean>;
}

export interface McpHttpApp {
  app: express.Express;
  /** Close the transport of a session and forget it */
  closeSession(sessionId: string): Promise<void>;
}

const PUBLIC_PATHS = ['/health', '/'];

const RATE_LIMIT_MESSAGE = {
  jsonrpc: '2.0',
  error: { code: -32000, message: 'Too many requests, please try again later' },
  id: null,
};

function jsonRpcError(res: Response, status: number, message: string): void {
  res.status(status).json({
    jsonrpc: '2.0',
    error: { code: -32000, message },
    id: null,
  });
}

function asyncHandler(fn: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}

export function createApp(deps: AppDependencies): McpHttpApp {
  const { config, logger, apiKeys, sessionStore } = deps;

  // Active transports by session ID
  const transports = new Map<string, StreamableHTTPServerTransport>();

  const app = express();

  // ============================================
  // MIDDLEWARE SETUP
  // ============================================

  app.use(express.json());

  const corsOptions: cors.CorsOptions = {
    origin: (origin, callback) => {
      // Requests with no origin (curl, same-origin, server-to-server)
      if (!origin) {
        callback(null, true);
        return;
      }
      if (config.security.allowedOrigins.includes(origin) || config.security.allowedOrigins.includes('*')) {
        callback(null, true);
      } else {
        callback(new Error('Not allowed by CORS'));
      }
    },
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'mcp-session-id', 'Authorization', config.security.apiKeyHeader],
    exposedHeaders: ['mcp-session-id'],
    maxAge: 86400, // Cache preflight for 24 hours
  };
  app.use(cors(corsOptions));

  // Request logging
  app.use((req, res, next) => {
    const start = Date.now();

    res.on('finish', () => {
      const line = `${req.method} ${req.path} ${res.statusCode} ${Date.now() - start}ms`;
      if (res.statusCode >= 500) {
        logger.error(line);
      } else if (res.statusCode >= 400) {
        logger.warn(line);
      } else {
        logger.info(line);
      }
    });

    next();
  });

  // Failed authentications are limited per client IP before any key lookup
  if (config.rateLimit.enabled) {
    app.use(rateLimit({
      windowMs: config.rateLimit.windowMs,
      limit: config.rateLimit.maxRequests,
      standardHeaders: true,
      legacyHeaders: false,
      message: RATE_LIMIT_MESSAGE,
      skip: (req) => PUBLIC_PATHS.includes(req.path),
      skipSuccessfulRequests: true,
      requestWasSuccessful: (_req, res) => res.statusCode !== 401 && res.statusCode !== 403,
    }));
  }

  app.use(createApiKeyMiddleware({
    service: apiKeys,
    requireApiKey: config.security.requireApiKey,
    headerName: config.security.apiKeyHeader,
    publicPaths: PUBLIC_PATHS,
    logger,
  }));

  // Rate limiting per API key, falling back to client IP
  if (config.rateLimit.enabled) {
    app.use(rateLimit({
      windowMs: config.rateLimit.windowMs,
      limit: config.rateLimit.maxRequests,
      standardHeaders: true,
      legacyHeaders: false,
      keyGenerator: (req) => req.principal?.id ?? req.ip ?? 'unknown',
      message: RATE_LIMIT_MESSAGE,
      skip: (req) => PUBLIC_PATHS.includes(req.path),
    }));
  }

  /**
   * Transport for an existing session, checking it belongs to the caller.
   * Sends the error response itself and returns null on failure.
   */
  async function sessionTransport(req: Request, res: Response): Promise<StreamableHTTPServerTransport | null> {
    const sessionId = req.header('mcp-session-id');
    const transport = sessionId ? transports.get(sessionId) : undefined;
    if (!sessionId || !transport) {
      jsonRpcError(res, 400, 'Invalid session');
      return null;
    }

    const session = await sessionStore.get(sessionId);
    const principal = req.principal ?? ANONYMOUS_PRINCIPAL;
    if (session && session.apiKeyId !== principal.id) {
      jsonRpcError(res, 403, 'Session belongs to a different API key');
      return null;
    }

    await sessionStore.touch(sessionId);
    return transport;
  }

  /**
   * MCP Endpoint - POST /mcp
   * Handles JSON-RPC requests, notifications, and responses
   */
  app.post('/mcp', asyncHandler(async (req, res) => {
    const sessionId = req.header('mcp-session-id');

    if (sessionId) {
      const transport = await sessionTransport(req, res);
      if (transport) {
        await transport.handleRequest(req, res, req.body);
      }
      return;
    }

    if (!isInitializeRequest(req.body)) {
      jsonRpcError(res, 400, 'Invalid session or missing MCP-Session-Id header');
      return;
    }

    const principal = req.principal ?? ANONYMOUS_PRINCIPAL;
    const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: async (id) => {
        transports.set(id, transport);
        const now = new Date();
        await sessionStore.set(id, {
          id,
          apiKeyId: principal.id,
          apiKeyName: principal.name,
          createdAt: now,
          lastAccessedAt: now,
        });
        logger.info(`Session initialized: ${id} (key: ${principal.name})`);
      },
      onsessionclosed: async (id) => {
        transports.delete(id);
        await sessionStore.delete(id);
        logger.info(`Session closed: ${id}`);
      },
    });

    transport.onclose = () => {
      if (transport.sessionId) {
        transports.delete(transport.sessionId);
      }
    };

    const server = deps.createMcpServer();
    await server.connect(transport);
    await transport.handleRequest(req, res, req.body);
  }));

  /**
   * MCP Endpoint - GET /mcp
   * Opens SSE stream for server-initiated messages
   */
  app.get('/mcp', asyncHandler(async (req, res) => {
    const transport = await sessionTransport(req, res);
    if (transport) {
      await transport.handleRequest(req, res);
    }
  }));

  /**
   * MCP Endpoint - DELETE /mcp
   * Terminates session
   */
  app.delete('/mcp', asyncHandler(async (req, res) => {
    const transport = await sessionTransport(req, res);
    if (transport) {
      await transport.handleRequest(req, res);
    }
  }));

  /**
   * Health check endpoint
   */
  app.get('/health', asyncHandler(async (_req, res) => {
    const databaseConnected = await deps.checkDatabase();
    res.json({
      status: databaseConnected ? 'ok' : 'degraded',
      version: SERVER_VERSION,
      database: { connected: databaseConnected },
      authentication: {
        required: config.security.requireApiKey,
        env_keys: apiKeys.envKeyCount,
        database_keys: apiKeys.hasStore,
      },
      activeSessions: await sessionStore.count(),
    });
  }));

  /**
   * Service information
   */
  app.get('/', (_req, res) => {
    res.json({
      service: SERVER_NAME,
      version: SERVER_VERSION,
      status: 'running',
      authentication: config.security.requireApiKey
        ? `Use ${config.security.apiKeyHeader} header or Authorization: Bearer <key>`
        : 'disabled',
      rate_limit: config.rateLimit.enabled
        ? `${config.rateLimit.maxRequests} requests per ${Math.round(config.rateLimit.windowMs / 1000)}s`
        : 'disabled',
      endpoints: {
        health: '/health (GET)',
        mcp: '/mcp (POST, GET, DELETE)',
      },
    });
  });

  const errorHandler: ErrorRequestHandler = (error, _req, res, _next) => {
    logger.error('Request failed:', error);
    if (res.headersSent) {
      return;
    }
    jsonRpcError(res, 500, 'Internal server error');
  };
  app.use(errorHandler);

  return {
    app,
    async closeSession(sessionId) {
      const transport = transports.get(sessionId);
      transports.delete(sessionId);
      await sessionStore.delete(sessionId);
      if (transport) {
        await transport.close();
      }
    },
  };
}
