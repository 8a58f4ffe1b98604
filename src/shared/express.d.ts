/**
 * Express Request Augmentation
 * Layer: Shared (type declarations)
 *
 * requestTimer stamps the request on entry; the access logger reads those
 * stamps to compute the elapsed time and attaches the per-request logger
 * (carrying the span bindings) as `req.log`.
 *
 * `OutgoingMessage.getRawHeaderNames()` has existed since Node 15.13 but
 * @types/node only declares it on ClientRequest.
 */
import type { Logger } from 'pino';

declare module 'http' {
  interface OutgoingMessage {
    /** Header names as set, in their original casing. */
    getRawHeaderNames(): string[];
  }
}

declare global {
  namespace Express {
    interface Request {
      /** process.hrtime.bigint() when the request entered the pipeline. */
      requestStartTime?: bigint;
      /** Wall-clock time the request entered the pipeline; printed by %t. */
      requestStartedAt?: Date;
      /** Logger bound to this request's span; set by the access logger. */
      log?: Logger;
    }
  }
}

export {};
