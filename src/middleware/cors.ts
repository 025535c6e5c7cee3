import { Request, Response, NextFunction, RequestHandler } from 'express';
import { API_KEY_HEADER } from './auth-middleware';

export const CORS_ALLOWED_METHODS = 'GET, POST, OPTIONS';
export const CORS_ALLOWED_HEADERS = `${API_KEY_HEADER}, Content-Type`;

/**
 * Permissive cross-origin headers on every response. Preflight requests are
 * answered here, before authentication.
 */
export function createCorsMiddleware(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Headers', CORS_ALLOWED_HEADERS);

    if (req.method === 'OPTIONS') {
      res.setHeader('Access-Control-Allow-Methods', CORS_ALLOWED_METHODS);
      res.status(200).end();
      return;
    }

    next();
  };
}
