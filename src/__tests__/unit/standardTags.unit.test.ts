/**
 * Unit Tests: Standard Tags & Request-Id Span
 */
import { compile } from '@application/format/DirectiveParser';
import {
  ALL_REQUEST_HEADERS_TAG,
  ALL_RESPONSE_HEADERS_TAG,
  formatHeaderPairs,
  registerStandardTags,
  requestIdSpan,
} from '@application/format/standardTags';
import { AccessLogFormatter } from '@application/services/AccessLogFormatter';
import { HeaderMap } from '@domain/entities/HeaderMap';

import { createCapturingLogger } from '../helpers/captureLogger';
import { makeContext, makeRequest } from '../helpers/fixtures';

describe('formatHeaderPairs()', () => {
  it('should print name:value pairs in braces, joining repeated values', () => {
    const headers = HeaderMap.from({ Host: 'localhost', Accept: ['a', 'b'] });

    expect(formatHeaderPairs(headers)).toBe('{Host:localhost,Accept:a,b}');
  });

  it('should print empty braces when there are no headers', () => {
    expect(formatHeaderPairs(new HeaderMap())).toBe('{}');
  });
});

describe('registerStandardTags()', () => {
  it('should register only the tags the format references', () => {
    const capture = createCapturingLogger();
    const formatter = new AccessLogFormatter(
      compile(`REQ:%{${ALL_REQUEST_HEADERS_TAG}}xi`),
      capture.logger,
    );

    registerStandardTags(formatter);

    expect(formatter.render(makeContext())).toBe(
      'REQ:{User-Agent:jest-agent/1.0,Referer:https://example.com/start,' +
        'Accept:text/html,application/json}',
    );
    expect(capture.records).toHaveLength(0);
  });

  it('should render response headers for the response tag', () => {
    const formatter = registerStandardTags(
      new AccessLogFormatter(
        compile(`RES:%{${ALL_RESPONSE_HEADERS_TAG}}xo`),
        createCapturingLogger().logger,
      ),
    );

    expect(formatter.render(makeContext())).toBe(
      'RES:{Content-Type:text/plain; charset=utf-8,Set-Cookie:a=1,b=2}',
    );
  });
});

describe('requestIdSpan', () => {
  it('should reuse the X-Request-Id header', () => {
    const request = makeRequest({ headers: HeaderMap.from({ 'X-Request-Id': 'req-123' }) });

    expect(requestIdSpan(request)).toEqual({ requestId: 'req-123' });
  });

  it('should generate a UUID when the header is absent', () => {
    const span = requestIdSpan(makeRequest());

    expect(span.requestId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });
});
