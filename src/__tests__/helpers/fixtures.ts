/**
 * Test Fixtures: Reusable Exchange Snapshots
 * Layer: Test Helpers
 *
 * Every call builds fresh header maps, so a test that appends to one cannot
 * leak into the next. Times are fixed for deterministic %t/%T/%D output.
 */
import { HeaderMap } from '@domain/entities/HeaderMap';
import type { RenderContext, RequestView, ResponseView } from '@domain/entities/RenderContext';

export const sampleStartedAt = new Date('2024-06-05T09:30:15.250Z');

/** 278 microseconds. */
export const sampleElapsedNs = 278_000n;

export function makeRequest(overrides: Partial<RequestView> = {}): RequestView {
  return {
    method: 'GET',
    path: '/api/v1/hello',
    query: 'lang=en&page=2',
    httpVersion: 'HTTP/1.1',
    remoteAddress: '203.0.113.7',
    peerAddress: '10.0.0.5',
    headers: HeaderMap.from({
      'User-Agent': 'jest-agent/1.0',
      Referer: 'https://example.com/start',
      Accept: ['text/html', 'application/json'],
    }),
    ...overrides,
  };
}

export function makeResponse(overrides: Partial<ResponseView> = {}): ResponseView {
  return {
    status: 200,
    bodyBytes: 12,
    headers: HeaderMap.from({
      'Content-Type': 'text/plain; charset=utf-8',
      'Set-Cookie': ['a=1', 'b=2'],
    }),
    ...overrides,
  };
}

export interface ContextOverrides {
  request?: Partial<RequestView>;
  response?: Partial<ResponseView>;
  startedAt?: Date;
  elapsedNs?: bigint;
  environment?: Record<string, string | undefined>;
}

export function makeContext(overrides: ContextOverrides = {}): RenderContext {
  return {
    request: makeRequest(overrides.request),
    response: makeResponse(overrides.response),
    startedAt: overrides.startedAt ?? sampleStartedAt,
    elapsedNs: overrides.elapsedNs ?? sampleElapsedNs,
    environment: overrides.environment ?? { DEPLOY_REGION: 'ap-southeast-2' },
  };
}
