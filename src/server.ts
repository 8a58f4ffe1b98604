/**
 * Server Entry Point: Clustering & Graceful Shutdown
 * Layer: Entry Point
 *
 * The primary process forks one worker per CPU (or WEB_CONCURRENCY) and
 * replaces any that die. Each worker registers the standard access log tags
 * on its formatter, optionally the request-id span factory, and only then
 * builds the Express app, because creating the access logger seals the
 * formatter.
 *
 * On SIGTERM/SIGINT a worker stops accepting connections, lets in-flight
 * requests (and their access lines) finish, flushes the logger and exits.
 */
import cluster from 'node:cluster';
import os from 'node:os';

import { registerStandardTags, requestIdSpan } from '@application/format/standardTags';
import type { AccessLogFormatter } from '@application/services/AccessLogFormatter';
import { config } from '@core/config';
import { container } from '@core/container';
import { logger } from '@core/logger';
import { TOKENS } from '@core/types';
import { createApp } from '@interfaces/http/app';

const numWorkers = config.cluster.workers || os.cpus().length;

if (cluster.isPrimary) {
  logger.info(
    { pid: process.pid, workers: numWorkers, format: config.accessLog.format },
    `Primary process starting >> forking ${numWorkers} workers`,
  );

  for (let i = 0; i < numWorkers; i++) {
    cluster.fork();
  }

  cluster.on('exit', (worker, code, signal) => {
    logger.warn({ pid: worker.process.pid, code, signal }, 'Worker died, restarting');
    cluster.fork();
  });
} else {
  const formatter = registerStandardTags(
    container.resolve<AccessLogFormatter>(TOKENS.AccessLogFormatter),
  );
  if (config.accessLog.requestId) {
    formatter.withSpanFactory(requestIdSpan);
  }

  const app = createApp();

  const server = app.listen(config.port, () => {
    logger.info({ pid: process.pid, port: config.port }, `Worker listening on :${config.port}`);
  });

  const shutdown = (signal: string): void => {
    logger.info({ pid: process.pid, signal }, 'Graceful shutdown initiated');
    server.close(() => {
      logger.flush();
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}
