import { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { getLogger } from './logger';

export class AppError extends Error {
  readonly statusCode: number;
  readonly isOperational: boolean;
  readonly code?: string;

  constructor(message: string, statusCode: number, code?: string) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = true;
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Not found') {
    super(message, 404, 'NOT_FOUND');
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, 'VALIDATION_ERROR');
  }
}

export class UnauthorizedError extends AppError {
  constructor() {
    super('Unauthorized', 401, 'AUTH_REQUIRED');
  }
}

/**
 * Fatal configuration problem. Raised once at startup, never at request time.
 */
export class ConfigError extends AppError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`, 500, 'CONFIG_ERROR');
    this.problems = problems;
  }
}

export interface ErrorResponse {
  error: string;
  code?: string;
}

function formatErrorResponse(err: Error): ErrorResponse {
  if (err instanceof UnauthorizedError) {
    return { error: err.message };
  }

  if (err instanceof AppError) {
    return {
      error: err.message,
      code: err.code,
    };
  }

  return {
    error: 'An unexpected error occurred',
    code: 'INTERNAL_ERROR',
  };
}

/**
 * Reads a numeric status from errors raised by Express body parsers
 * (for example a malformed JSON body carries `status: 400`).
 */
function getHttpStatus(err: Error): number | null {
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }

  return null;
}

export function createErrorHandler(): ErrorRequestHandler {
  const logger = getLogger('error-handler');

  return (err: Error, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const clientStatus = getHttpStatus(err);
    const statusCode = err instanceof AppError ? err.statusCode : clientStatus ?? 500;

    const errorContext: Record<string, unknown> = {
      error: err.message,
      path: req.path,
      method: req.method,
      statusCode,
      query: Object.keys(req.query).length > 0 ? req.query : undefined,
      ip: req.ip,
    };

    if (err instanceof AppError) {
      logger.warn('API error', { ...errorContext, code: err.code });
    } else if (clientStatus !== null) {
      logger.warn('Bad request', errorContext);
      res.status(clientStatus).json({ error: err.message, code: 'BAD_REQUEST' });
      return;
    } else {
      logger.error('Unhandled error', {
        ...errorContext,
        stack: err.stack,
        errorName: err.name,
      });
    }

    res.status(statusCode).json(formatErrorResponse(err));
  };
}

export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): (req: Request, res: Response, next: NextFunction) => void {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
