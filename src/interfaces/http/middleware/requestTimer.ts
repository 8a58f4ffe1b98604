/**
 * Request Timer Middleware
 * Layer: Interfaces (HTTP)
 *
 * Records when a request entered the pipeline: a monotonic nanosecond stamp
 * for %T/%D and a wall-clock Date for %t. MUST be the first middleware so
 * the measurement covers everything after it.
 */
import type { NextFunction, Request, Response } from 'express';

export function requestTimer(req: Request, _res: Response, next: NextFunction): void {
  req.requestStartTime = process.hrtime.bigint();
  req.requestStartedAt = new Date();
  next();
}
