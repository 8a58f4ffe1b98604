/**
 * Express Application Factory
 * Layer: Interfaces (HTTP)
 * Pattern: Factory Function
 *
 * Assembles a fresh Express app per call (one per cluster worker, one per
 * integration test file). Middleware order:
 *
 *   1. requestTimer  : stamps the request; must be first.
 *   2. helmet()      : security headers.
 *   3. cors()        : cross-origin access.
 *   4. accessLogger  : template-driven access line, per-request span logger.
 *   5. compression() : gzips bodies over 1 KiB. Mounted after the access
 *                      logger, so %b counts the bytes actually sent.
 *   6. Routes
 *   7. notFoundHandler, then errorHandler: must be last.
 *
 * `import '@core/container'` bootstraps DI (and compiles the configured
 * format) before anything is resolved.
 */
import '@core/container';

import type { AccessLogFormatter } from '@application/services/AccessLogFormatter';
import { config } from '@core/config';
import { container } from '@core/container';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import { createAccessLogger } from '@interfaces/http/middleware/accessLogger';
import { errorHandler } from '@interfaces/http/middleware/errorHandler';
import { notFoundHandler } from '@interfaces/http/middleware/notFoundHandler';
import { requestTimer } from '@interfaces/http/middleware/requestTimer';
import { healthRoutes } from '@interfaces/http/routes/healthRoutes';
import { helloRoutes } from '@interfaces/http/routes/helloRoutes';
import compression from 'compression';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';

export function createApp(): express.Express {
  const app = express();

  // Request timing (must be first)
  app.use(requestTimer);

  // Security
  app.use(helmet());
  app.use(cors());

  // Access logging
  app.use(
    createAccessLogger({
      formatter: container.resolve<AccessLogFormatter>(TOKENS.AccessLogFormatter),
      logger: container.resolve<Logger>(TOKENS.Logger),
      exclude: config.accessLog.exclude,
      excludePatterns: config.accessLog.excludePatterns,
    }),
  );
  app.use(compression());

  // Routes
  app.use('/api/v1', healthRoutes);
  app.use('/api/v1', helloRoutes);

  // Fallthrough + global error handler (must be registered last)
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
