/**
 * Render Context
 * Layer: Domain
 *
 * The read-only snapshot of one request/response exchange. The HTTP layer
 * assembles it once the response has finished (see accessLogger.ts) and
 * hands it to the renderer; it never outlives that single render call.
 *
 * Request and response are split into separate views because custom tags
 * receive exactly one of them: `%{NAME}xi` gets the RequestView and
 * `%{NAME}xo` the ResponseView.
 */
import type { HeaderMap } from '@domain/entities/HeaderMap';

export interface RequestView {
  readonly method: string;
  /** Path without the query string. */
  readonly path: string;
  /** Raw query string without the leading `?`; undefined when the URL has none. */
  readonly query?: string;
  /** Protocol label such as `HTTP/1.1`; undefined when the transport does not report one. */
  readonly httpVersion?: string;
  /** Client address, honouring `Forwarded` and `X-Forwarded-For`. */
  readonly remoteAddress?: string;
  /** Address of the socket peer (the proxy, when there is one). */
  readonly peerAddress?: string;
  readonly headers: HeaderMap;
}

export interface ResponseView {
  readonly status: number;
  readonly bodyBytes: number;
  readonly headers: HeaderMap;
}

export interface RenderContext {
  readonly request: RequestView;
  readonly response: ResponseView;
  /** Wall-clock instant the exchange started. */
  readonly startedAt: Date;
  /** Time from request entry to response finish, in nanoseconds. */
  readonly elapsedNs: bigint;
  /** Environment variables visible to `%{NAME}e`, captured by the caller. */
  readonly environment: Readonly<Record<string, string | undefined>>;
}
