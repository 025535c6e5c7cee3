import { Request, Response, NextFunction, RequestHandler } from 'express';
import { getLogger } from '../utils';

export function createRequestLogger(): RequestHandler {
  const logger = getLogger('http');

  return (req: Request, res: Response, next: NextFunction): void => {
    const startedAt = Date.now();

    res.on('finish', () => {
      logger.debug(`${req.method} ${req.originalUrl}`, {
        status: res.statusCode,
        ip: req.ip,
        durationMs: Date.now() - startedAt,
      });
    });

    next();
  };
}
