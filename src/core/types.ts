/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * tsyringe resolves dependencies by token. Symbols keep the tokens unique
 * and out of any serialised output.
 */
export const TOKENS = {
  // Infrastructure
  Logger: Symbol.for('Logger'),

  // Access logging
  AccessLogTemplate: Symbol.for('AccessLogTemplate'),
  AccessLogFormatter: Symbol.for('AccessLogFormatter'),
} as const;
