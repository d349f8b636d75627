import { describe, it, expect } from 'vitest';
import { serializeScanJobEvent } from '../../../src/scanning/scan-event.serializer';
import { BookResult } from '../../../src/domain/value-objects/book-result.vo';
import { StreamTerminalError } from '../../../src/domain/errors/scan-client.errors';

describe('serializeScanJobEvent', () => {
  it('serializes a failure through the error JSON form', () => {
    const error = new StreamTerminalError({ message: 'OCR failed', code: 'OCR_FAILED' });

    expect(serializeScanJobEvent({ type: 'failed', jobId: 'J1', error })).toEqual({
      type: 'failed',
      jobId: 'J1',
      error: {
        kind: 'stream_terminal',
        code: 'OCR_FAILED',
        message: 'OCR failed',
        retryable: false,
        statusCode: undefined,
        detail: 'OCR failed',
      },
    });
  });

  it('adds a result count to completions', () => {
    const book = BookResult.create({ title: 'Clean Code', author: 'Robert C. Martin' });

    expect(
      serializeScanJobEvent({ type: 'completed', jobId: 'J1', results: [book], source: 'inline' }),
    ).toEqual({
      type: 'completed',
      jobId: 'J1',
      source: 'inline',
      resultCount: 1,
      results: [book],
    });
  });

  it('copies other events as they are', () => {
    expect(serializeScanJobEvent({ type: 'progress', message: 'Reading' })).toEqual({
      type: 'progress',
      message: 'Reading',
    });
  });
});
