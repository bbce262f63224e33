import { Request, Response, NextFunction } from 'express';
import { ZodError, ZodType, ZodTypeDef } from 'zod';
import { config } from '../config.js';

export interface ApiError extends Error {
  statusCode: number;
  details?: unknown;
}

// Domain errors and body-parser errors (e.g. 413) both carry statusCode
function isApiError(err: Error): err is ApiError {
  return 'statusCode' in err && typeof err.statusCode === 'number';
}

// Fallthrough for unmatched routes
export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ error: 'Not found' });
}

// Error handling middleware
export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  console.error('[HTTP] Error:', err);

  if (err instanceof ZodError) {
    res.status(400).json({
      error: 'Validation error',
      details: err.errors,
    });
    return;
  }

  const statusCode = isApiError(err) ? err.statusCode : 500;

  // In production, mask internal error messages on 500s to avoid leaking implementation details
  const message = statusCode >= 500 && config.env === 'production'
    ? 'Internal server error'
    : err.message || 'Internal server error';

  res.status(statusCode).json({
    error: message,
    ...(isApiError(err) && err.details !== undefined ? { details: err.details } : {}),
  });
}

// Validation middleware factory
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, source: 'body' | 'query' = 'body') {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req[source]);

    if (!result.success) {
      throw result.error;
    }

    // Replace with parsed data (includes defaults and transformations)
    if (source === 'body') {
      req.body = result.data;
    } else {
      Object.assign(req.query, result.data);
    }
    next();
  };
}
