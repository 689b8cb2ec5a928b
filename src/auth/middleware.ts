/**
 * Express middleware enforcing API key authentication
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { Logger } from '../logger.js';
import type { ApiKeyService } from './api-keys.js';
import type { ApiKeyPrincipal } from './types.js';

export interface ApiKeyMiddlewareOptions {
  service: ApiKeyService;
  requireApiKey: boolean;
  /** Lower-case header name, e.g. x-api-key */
  headerName: string;
  publicPaths: string[];
  logger: Logger;
}

export const ANONYMOUS_PRINCIPAL: ApiKeyPrincipal = { id: 'anonymous', name: 'anonymous', source: 'anonymous' };

/**
 * Key from the configured header, or from `Authorization: Bearer <key>`
 */
export function extractApiKey(req: Request, headerName: string): string | null {
  const headerKey = req.header(headerName);
  if (headerKey) {
    return headerKey.trim();
  }

  const authorization = req.header('authorization');
  if (authorization?.startsWith('Bearer ')) {
    return authorization.slice('Bearer '.length).trim();
  }

  return null;
}

export function createApiKeyMiddleware(options: ApiKeyMiddlewareOptions): RequestHandler {
  const { service, requireApiKey, headerName, publicPaths, logger } = options;

  return (req: Request, res: Response, next: NextFunction) => {
    if (publicPaths.includes(req.path)) {
      next();
      return;
    }

    if (!requireApiKey) {
      req.principal = ANONYMOUS_PRINCIPAL;
      next();
      return;
    }

    const apiKey = extractApiKey(req, headerName);
    if (!apiKey) {
      logger.warn(`API key missing for request to ${req.path}`);
      res.status(401).json({
        error: 'API key required',
        message: `Provide ${headerName} header or Authorization: Bearer <key>`,
      });
      return;
    }

    service
      .validate(apiKey)
      .then((principal) => {
        if (!principal) {
          logger.warn(`Invalid API key provided for request to ${req.path}`);
          res.status(403).json({
            error: 'Invalid API key',
            message: 'The provided API key is invalid, expired, or has been revoked',
          });
          return;
        }

        logger.debug(`API key "${principal.name}" used for ${req.path}`);
        req.principal = principal;
        next();
      })
      .catch((error: unknown) => {
        logger.error('API key validation failed:', error);
        res.status(503).json({
          error: 'Authentication unavailable',
          message: 'API keys could not be validated, please try again later',
        });
      });
  };
}
