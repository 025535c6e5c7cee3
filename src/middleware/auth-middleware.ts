/**
 * Authentication Middleware
 * Checks the shared API key on protected routes
 */

import { timingSafeEqual } from 'crypto';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { UnauthorizedError } from '../utils';

export const API_KEY_HEADER = 'X-API-Key';

export interface AuthMiddlewareDependencies {
  apiKey: string;
}

/**
 * Exact comparison that does not leak how many leading characters matched
 */
export function apiKeyMatches(provided: string | undefined, expected: string): boolean {
  if (provided === undefined) {
    return false;
  }

  const providedBuffer = Buffer.from(provided, 'utf-8');
  const expectedBuffer = Buffer.from(expected, 'utf-8');

  if (providedBuffer.length !== expectedBuffer.length) {
    return false;
  }

  return timingSafeEqual(providedBuffer, expectedBuffer);
}

/**
 * Create middleware that rejects requests without the configured API key
 * with 401 `{ error: 'Unauthorized' }`
 */
export function createAuthMiddleware(deps: AuthMiddlewareDependencies): RequestHandler {
  const { apiKey } = deps;

  return (req: Request, _res: Response, next: NextFunction): void => {
    if (!apiKeyMatches(req.get(API_KEY_HEADER), apiKey)) {
      next(new UnauthorizedError());
      return;
    }

    next();
  };
}
