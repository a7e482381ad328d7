import type { ErrorRequestHandler, Request, Response } from 'express';
import { ZodError } from 'zod';
import { AppError } from '../../errors.js';
import type { Logger } from '../../logger.js';

export interface FailureEnvelope {
  status: 'failure';
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

/**
 * Turns anything thrown by a route into a `{ status: "failure" }` envelope.
 * Import and query failures are client-visible as HTTP 400.
 */
export function createErrorHandler(logger: Logger, exposeInternals: boolean): ErrorRequestHandler {
  return (err: unknown, req, res, _next): void => {
    logger.error('API Error', { method: req.method, path: req.path, error: err });

    if (err instanceof ZodError) {
      res.status(400).json({
        status: 'failure',
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Invalid request parameters',
          details: err.errors.map((e) => ({
            field: e.path.join('.'),
            message: e.message,
          })),
        },
      } satisfies FailureEnvelope);
      return;
    }

    if (err instanceof AppError) {
      res.status(err.statusCode).json({
        status: 'failure',
        error: { code: err.code, message: err.message, details: err.details },
      } satisfies FailureEnvelope);
      return;
    }

    res.status(400).json({
      status: 'failure',
      error: {
        code: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
        details: exposeInternals && err instanceof Error ? err.message : undefined,
      },
    } satisfies FailureEnvelope);
  };
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    status: 'failure',
    error: {
      code: 'NOT_FOUND',
      message: `Route ${req.method} ${req.path} not found`,
    },
  } satisfies FailureEnvelope);
}
