/**
 * Standard Custom Tags & Span Factory
 * Layer: Application
 *
 * Ready-made evaluators the server wires onto its formatter:
 *
 *   %{ALL_REQ_HEADERS}xi   {Host:localhost:3000,Accept:text/html}
 *   %{ALL_RES_HEADERS}xo   {Content-Type:text/plain; charset=utf-8,...}
 *
 * Only the tags the configured format actually references are registered.
 * `requestIdSpan` tags each request with the caller's X-Request-Id or a
 * fresh UUID.
 */
import { randomUUID } from 'node:crypto';

import type { AccessLogFormatter } from '@application/services/AccessLogFormatter';
import type { HeaderMap } from '@domain/entities/HeaderMap';
import type { SpanFactory } from '@domain/interfaces/ITagEvaluator';
import { REQUEST_ID_HEADER } from '@shared/constants';

export const ALL_REQUEST_HEADERS_TAG = 'ALL_REQ_HEADERS';
export const ALL_RESPONSE_HEADERS_TAG = 'ALL_RES_HEADERS';

export function formatHeaderPairs(headers: HeaderMap): string {
  const pairs: string[] = [];
  for (const [name, values] of headers) {
    pairs.push(`${name}:${values.join(',')}`);
  }
  return `{${pairs.join(',')}}`;
}

export const requestIdSpan: SpanFactory = (request) => ({
  requestId: request.headers.get(REQUEST_ID_HEADER)?.[0] ?? randomUUID(),
});

export function registerStandardTags(formatter: AccessLogFormatter): AccessLogFormatter {
  const { template } = formatter;

  if (template.customTags('request').includes(ALL_REQUEST_HEADERS_TAG)) {
    formatter.registerRequestTag(ALL_REQUEST_HEADERS_TAG, (request) =>
      formatHeaderPairs(request.headers),
    );
  }
  if (template.customTags('response').includes(ALL_RESPONSE_HEADERS_TAG)) {
    formatter.registerResponseTag(ALL_RESPONSE_HEADERS_TAG, (response) =>
      formatHeaderPairs(response.headers),
    );
  }

  return formatter;
}
