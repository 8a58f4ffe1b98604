/**
 * Dependency Injection Container
 * Layer: Core
 *
 * The one place where tokens are bound to implementations.
 *
 *   - `reflect-metadata` must load first: tsyringe reads the constructor
 *     metadata that @injectable/@inject record.
 *   - The configured access log format is compiled here, so a malformed
 *     ACCESS_LOG_FORMAT throws while the process starts, not on the first
 *     request.
 *   - The formatter is a singleton: tag registrations made during startup
 *     (server.ts) must be the ones the middleware renders with.
 */
import 'reflect-metadata';
import { container, Lifecycle } from 'tsyringe';

import { TOKENS } from './types';
import { config } from './config';
import { logger } from './logger';

import { compile } from '@application/format/DirectiveParser';
import { AccessLogFormatter } from '@application/services/AccessLogFormatter';

container.register(TOKENS.Logger, { useValue: logger });
container.register(TOKENS.AccessLogTemplate, { useValue: compile(config.accessLog.format) });
container.register(
  TOKENS.AccessLogFormatter,
  { useClass: AccessLogFormatter },
  { lifecycle: Lifecycle.Singleton },
);

export { container };
