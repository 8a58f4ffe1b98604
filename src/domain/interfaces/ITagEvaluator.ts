/**
 * Custom Tag & Span Contracts
 * Layer: Domain
 *
 * Evaluators registered for `%{NAME}xi` / `%{NAME}xo` receive one view of
 * the exchange and return the text to splice into the line. They may run for
 * many requests at once, so they must only read the view they are given.
 * By convention they return "-" rather than an empty string when there is
 * nothing to print.
 *
 * A SpanFactory derives correlation fields (pino bindings) from the request
 * before it is handled. The engine never looks inside them; the HTTP layer
 * turns them into a child logger that both handler logs and the access line
 * go through.
 */
import type { RequestView, ResponseView } from '@domain/entities/RenderContext';
import type { Bindings } from 'pino';

export type RequestTagEvaluator = (request: RequestView) => string;
export type ResponseTagEvaluator = (response: ResponseView) => string;

export type SpanBindings = Bindings;
export type SpanFactory = (request: RequestView) => SpanBindings;
