/**
 * Access Logger Middleware
 * Layer: Interfaces (HTTP)
 *
 * Emits one line per exchange, rendered from the configured format:
 *
 *   127.0.0.1 "GET /api/v1/hello HTTP/1.1" 200 12 "-" "curl/8.5.0" 0.000412
 *
 * On entry it snapshots the request, skips excluded paths and asks the
 * formatter for span bindings. The bindings become a pino child logger,
 * exposed as `req.log` so handler logs carry the same correlation fields.
 * The body bytes handed to `res.write`/`res.end` are counted for %b. When
 * the response finishes (or the connection closes first) it builds the
 * RenderContext and writes the rendered line through that logger at info.
 * A render failure is logged at error and the exchange is left alone.
 *
 * Creating the middleware seals the formatter: custom tags must be
 * registered before the app is assembled.
 */
import type { AccessLogFormatter } from '@application/services/AccessLogFormatter';
import type { Logger } from '@core/logger';
import { HeaderMap } from '@domain/entities/HeaderMap';
import type { RenderContext, RequestView, ResponseView } from '@domain/entities/RenderContext';
import type { NextFunction, Request, RequestHandler, Response } from 'express';

export interface AccessLoggerOptions {
  formatter: AccessLogFormatter;
  logger: Logger;
  /** Exact paths that are never logged. */
  exclude?: readonly string[];
  /** A path matching any of these is never logged. */
  excludePatterns?: readonly RegExp[];
  /** Source for %{NAME}e; defaults to process.env. */
  environment?: Readonly<Record<string, string | undefined>>;
}

const FORWARDED_FOR = /for=(?:"([^"]*)"|([^;,\s]+))/i;

/** Client address: `Forwarded: for=`, then the first `X-Forwarded-For` hop, then the socket peer. */
function clientAddress(headers: HeaderMap, peerAddress: string | undefined): string | undefined {
  const forwarded = headers.get('forwarded')?.[0];
  if (forwarded) {
    const match = FORWARDED_FOR.exec(forwarded);
    const address = match?.[1] ?? match?.[2];
    if (address) return address;
  }

  const forwardedFor = headers.get('x-forwarded-for')?.[0]?.split(',')[0]?.trim();
  if (forwardedFor) return forwardedFor;

  return peerAddress;
}

export function toRequestView(req: Request): RequestView {
  const headers = new HeaderMap();
  for (let i = 0; i + 1 < req.rawHeaders.length; i += 2) {
    headers.append(req.rawHeaders[i] ?? '', req.rawHeaders[i + 1] ?? '');
  }

  const url = req.originalUrl;
  const queryStart = url.indexOf('?');
  const peerAddress = req.socket.remoteAddress;

  return {
    method: req.method,
    path: queryStart === -1 ? url : url.slice(0, queryStart),
    query: queryStart === -1 ? undefined : url.slice(queryStart + 1),
    httpVersion: req.httpVersion ? `HTTP/${req.httpVersion}` : undefined,
    remoteAddress: clientAddress(headers, peerAddress),
    peerAddress,
    headers,
  };
}

type WriteCallback = (error: Error | null | undefined) => void;

function chunkBytes(chunk: unknown, encoding: unknown): number {
  if (typeof chunk === 'string') {
    return Buffer.byteLength(
      chunk,
      typeof encoding === 'string' && Buffer.isEncoding(encoding) ? encoding : undefined,
    );
  }
  return chunk instanceof Uint8Array ? chunk.byteLength : 0;
}

/**
 * Wraps `res.write` and `res.end` to sum the body bytes passed through them.
 * A HEAD response, where Express calls `end()` with no body, counts 0.
 */
export function countBodyBytes(res: Response): () => number {
  let bytes = 0;
  const write = res.write.bind(res);
  const end = res.end.bind(res);

  res.write = (
    chunk: unknown,
    encodingOrCallback?: BufferEncoding | WriteCallback,
    callback?: WriteCallback,
  ): boolean => {
    bytes += chunkBytes(chunk, encodingOrCallback);
    return typeof encodingOrCallback === 'string'
      ? write(chunk, encodingOrCallback, callback)
      : write(chunk, encodingOrCallback);
  };

  res.end = (
    chunk?: unknown,
    encodingOrCallback?: BufferEncoding | (() => void),
    callback?: () => void,
  ): Response => {
    bytes += chunkBytes(chunk, encodingOrCallback);
    return typeof encodingOrCallback === 'string'
      ? end(chunk, encodingOrCallback, callback)
      : end(chunk, encodingOrCallback);
  };

  return () => bytes;
}

export function toResponseView(res: Response, bodyBytes: number): ResponseView {
  const headers = new HeaderMap();
  for (const name of res.getRawHeaderNames()) {
    const value = res.getHeader(name);
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const item of value) headers.append(name, item);
    } else {
      headers.append(name, String(value));
    }
  }

  return {
    status: res.statusCode,
    bodyBytes,
    headers,
  };
}

export function createAccessLogger(options: AccessLoggerOptions): RequestHandler {
  const { formatter, logger } = options;
  const exclude = new Set(options.exclude ?? []);
  // A g or y flag would make test() resume from lastIndex between requests.
  const excludePatterns = (options.excludePatterns ?? []).map(
    (pattern) => new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, '')),
  );
  const environment = options.environment ?? process.env;

  formatter.seal();

  const isExcluded = (path: string): boolean =>
    exclude.has(path) || excludePatterns.some((pattern) => pattern.test(path));

  return (req: Request, res: Response, next: NextFunction): void => {
    const startTime = req.requestStartTime ?? process.hrtime.bigint();
    const startedAt = req.requestStartedAt ?? new Date();
    const request = toRequestView(req);

    if (isExcluded(request.path)) {
      next();
      return;
    }

    const span = formatter.makeSpan(request);
    const log = span ? logger.child(span) : logger;
    req.log = log;
    const bodyBytes = countBodyBytes(res);

    let emitted = false;
    const emit = (): void => {
      if (emitted) return;
      emitted = true;

      const elapsedNs = process.hrtime.bigint() - startTime;
      try {
        const ctx: RenderContext = {
          request,
          response: toResponseView(res, bodyBytes()),
          startedAt,
          elapsedNs,
          environment,
        };
        log.info(formatter.render(ctx));
      } catch (err) {
        log.error({ err, path: request.path }, 'Failed to render access log line');
      }
    };

    res.once('finish', emit);
    res.once('close', emit);
    next();
  };
}
