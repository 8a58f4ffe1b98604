/**
 * Global Error Handler Middleware
 * Layer: Interfaces (HTTP)
 *
 * Sits at the end of the Express chain. Express 5 forwards rejected promises
 * from async handlers here as well.
 *
 *   - AppError: logged at warn; the client gets its statusCode and message.
 *   - Anything else: logged at error; the client gets a generic 500.
 *
 * Errors are logged through `req.log` when the access logger has bound one,
 * so they carry the same span fields as the access line.
 */
import { logger } from '@core/logger';
import { AppError } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';

export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
  const log = req.log ?? logger;

  if (err instanceof AppError && err.isOperational) {
    log.warn({ statusCode: err.statusCode, message: err.message }, 'Operational error');
    res.status(err.statusCode).json({
      status: 'error',
      message: err.message,
    });
    return;
  }

  log.error({ err }, 'Unhandled error');
  res.status(500).json({
    status: 'error',
    message: 'Internal server error',
  });
}
