/**
 * Built-in Directive Evaluators
 * Layer: Application
 *
 * One pure function per single-character key. Durations are printed with a
 * fixed six fractional digits so 278µs reads 0.000278 (%T) and 0.278000 (%D).
 */
import type { RenderContext, RequestView } from '@domain/entities/RenderContext';
import type { BuiltinKey } from '@domain/entities/Template';
import { PLACEHOLDER } from '@shared/constants';

type Evaluator = (ctx: RenderContext) => string;

const NS_PER_SECOND = 1e9;
const NS_PER_MILLISECOND = 1e6;

/** `YYYY-MM-DDThh:mm:ss`, UTC, second precision. */
export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19);
}

function requestLine(request: RequestView): string {
  const target = request.query !== undefined ? `${request.path}?${request.query}` : request.path;
  return `${request.method} ${target} ${request.httpVersion ?? '?'}`;
}

export const builtinDirectives: Readonly<Record<BuiltinKey, Evaluator>> = {
  t: (ctx) => formatTimestamp(ctx.startedAt),
  a: (ctx) => ctx.request.remoteAddress ?? PLACEHOLDER,
  r: (ctx) => requestLine(ctx.request),
  M: (ctx) => ctx.request.method,
  U: (ctx) => ctx.request.path,
  Q: (ctx) => ctx.request.query ?? PLACEHOLDER,
  V: (ctx) => ctx.request.httpVersion ?? '?',
  s: (ctx) => String(ctx.response.status),
  b: (ctx) => String(ctx.response.bodyBytes),
  T: (ctx) => (Number(ctx.elapsedNs) / NS_PER_SECOND).toFixed(6),
  D: (ctx) => (Number(ctx.elapsedNs) / NS_PER_MILLISECOND).toFixed(6),
};
