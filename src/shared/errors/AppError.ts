/**
 * Custom Error Hierarchy
 * Layer: Shared
 *
 * Two kinds of failure show up in this service:
 *
 *   1. Operational errors: expected HTTP problems like an unknown route.
 *      The error handler returns the error's statusCode and message.
 *
 *   2. Programmer errors: a broken access-log template or a bad custom tag
 *      registration. These happen at startup, before any request is served,
 *      and are marked `isOperational = false` so nothing leaks to a client
 *      if one ever escapes into a request.
 *
 * `Object.setPrototypeOf(this, new.target.prototype)` keeps `instanceof`
 * working for subclasses regardless of the compilation target.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode = 500, isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier: string) {
    super(`${resource} not found: ${identifier}`, 404);
  }
}

/**
 * Raised by `compile()` for a malformed access-log template.
 * `offset` is the UTF-8 byte offset of the directive (or parenthesis) at fault.
 */
export class TemplateSyntaxError extends AppError {
  public readonly offset: number;

  constructor(reason: string, offset: number) {
    super(`Invalid access log format at byte ${offset}: ${reason}`, 500, false);
    this.offset = offset;
  }
}

export class TagRegistrationError extends AppError {
  constructor(message: string) {
    super(message, 500, false);
  }
}
