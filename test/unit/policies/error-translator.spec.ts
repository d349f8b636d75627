import { describe, it, expect } from 'vitest';
import { ErrorTranslator } from '../../../src/application/error-translator';
import {
  MalformedResponseError,
  RawHttpError,
  StructuredApiError,
} from '../../../src/domain/errors/scan-client.errors';
import { problem } from '../helpers/test-fixtures';

const json = (value: unknown) => Buffer.from(JSON.stringify(value));

describe('ErrorTranslator', () => {
  it('produces a StructuredApiError from a problem document', () => {
    const error = ErrorTranslator.translate(400, json(problem(400, { code: 'IMAGE_TOO_SMALL' })));

    expect(error).toBeInstanceOf(StructuredApiError);
    expect(error.code).toBe('IMAGE_TOO_SMALL');
    expect(error.statusCode).toBe(400);
    expect(error.retryable).toBe(false);
    expect(error.detail).toBe('Problem with status 400');
  });

  it('prefers the body retryAfterMs over the Retry-After header', () => {
    const error = ErrorTranslator.translate(429, json(problem(429, { retryAfterMs: 2000 })), {
      'retry-after': '5',
    });

    expect(error).toBeInstanceOf(StructuredApiError);
    if (!(error instanceof StructuredApiError)) return;
    expect(error.retryAfterMs).toBe(2000);
  });

  it('falls back to the Retry-After header in milliseconds', () => {
    const error = ErrorTranslator.translate(429, json(problem(429)), { 'Retry-After': '5' });

    if (!(error instanceof StructuredApiError)) throw new Error('expected StructuredApiError');
    expect(error.retryAfterMs).toBe(5000);
  });

  it('leaves retryAfterMs undefined when neither source gives one', () => {
    const error = ErrorTranslator.translate(503, json(problem(503)));

    if (!(error instanceof StructuredApiError)) throw new Error('expected StructuredApiError');
    expect(error.retryAfterMs).toBeUndefined();
  });

  it('reports an unparseable 2xx body as malformed', () => {
    const error = ErrorTranslator.translate(202, Buffer.from('{"success":true'));

    expect(error).toBeInstanceOf(MalformedResponseError);
    expect(error.code).toBe('MALFORMED_RESPONSE');
    expect(error.statusCode).toBe(202);
  });

  it('falls back to RawHttpError for a non-JSON error body', () => {
    const error = ErrorTranslator.translate(502, Buffer.from('Bad Gateway'));

    expect(error).toBeInstanceOf(RawHttpError);
    expect(error.code).toBe('HTTP_502');
    expect(error.retryable).toBe(true);
    expect(error.message).toBe('Server error (HTTP 502)');
    if (!(error instanceof RawHttpError)) return;
    expect(error.bodyText).toBe('Bad Gateway');
  });

  it('keeps the header delay on a raw 429', () => {
    const error = ErrorTranslator.translate(429, Buffer.alloc(0), { 'retry-after': '3' });

    if (!(error instanceof RawHttpError)) throw new Error('expected RawHttpError');
    expect(error.retryAfterMs).toBe(3000);
    expect(error.bodyText).toBeUndefined();
  });

  it('marks a raw 4xx other than 429 as not retryable', () => {
    expect(ErrorTranslator.translate(404, Buffer.from('Not Found')).retryable).toBe(false);
  });
});
