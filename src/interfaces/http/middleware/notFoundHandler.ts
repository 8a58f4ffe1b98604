/**
 * Fallthrough for requests no route matched. Registered after the routes and
 * before errorHandler, which turns the NotFoundError into a JSON 404.
 */
import { NotFoundError } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';

export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError('Route', `${req.method} ${req.path}`));
}
