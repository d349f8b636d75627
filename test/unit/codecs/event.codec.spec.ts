import { describe, it, expect } from 'vitest';
import { EventCodec, isTerminalLabel } from '../../../src/application/codecs/event.codec';
import { EnrichmentStatus } from '../../../src/domain/value-objects/book-result.vo';

const book = {
  title: 'Clean Code',
  author: 'Robert C. Martin',
  isbn: '9780132350884',
  confidence: 0.92,
  enrichmentStatus: 'success',
};

describe('EventCodec', () => {
  describe('progress', () => {
    it('decodes the message', () => {
      expect(EventCodec.decode('progress', '{"message":"scanning"}')).toEqual({
        ok: true,
        value: { type: 'progress', message: 'scanning' },
      });
    });

    it('fails without a message', () => {
      expect(EventCodec.decode('progress', '{"stage":"ocr"}').ok).toBe(false);
    });
  });

  describe('result', () => {
    it('decodes one book result', () => {
      const result = EventCodec.decode('result', JSON.stringify(book));

      expect(result.ok).toBe(true);
      if (!result.ok || result.value.type !== 'resultItem') return;
      expect(result.value.book).toEqual({
        title: 'Clean Code',
        author: 'Robert C. Martin',
        isbn: '9780132350884',
        confidence: 0.92,
        enrichmentStatus: EnrichmentStatus.SUCCESS,
      });
      expect(Object.isFrozen(result.value.book)).toBe(true);
    });

    it('drops an enrichment status it does not know', () => {
      const result = EventCodec.decode(
        'result',
        JSON.stringify({ ...book, enrichmentStatus: 'cached' }),
      );

      expect(result.ok).toBe(true);
      if (!result.ok || result.value.type !== 'resultItem') return;
      expect(result.value.book.enrichmentStatus).toBeUndefined();
    });

    it('fails on a confidence outside [0, 1]', () => {
      expect(EventCodec.decode('result', JSON.stringify({ ...book, confidence: 1.5 })).ok).toBe(
        false,
      );
    });

    it('accepts an empty title', () => {
      const result = EventCodec.decode('result', '{"title":"","author":"Unknown"}');

      expect(result).toEqual({
        ok: true,
        value: { type: 'resultItem', book: { title: '', author: 'Unknown' } },
      });
    });

    it('fails without an author', () => {
      expect(EventCodec.decode('result', '{"title":"Clean Code"}').ok).toBe(false);
    });
  });

  describe('completed', () => {
    it.each(['complete', 'completed'])('accepts the "%s" label', (label) => {
      expect(EventCodec.decode(label, '{"resultsUrl":"/v3/jobs/results/abc"}')).toEqual({
        ok: true,
        value: { type: 'completed', resultsEndpoint: '/v3/jobs/results/abc' },
      });
    });

    it('decodes inline books alongside the results endpoint', () => {
      const result = EventCodec.decode(
        'completed',
        JSON.stringify({ resultsUrl: '/v3/jobs/results/abc', books: [book] }),
      );

      expect(result.ok).toBe(true);
      if (!result.ok || result.value.type !== 'completed') return;
      expect(result.value.resultsEndpoint).toBe('/v3/jobs/results/abc');
      expect(result.value.inlineItems).toHaveLength(1);
      expect(result.value.inlineItems?.[0]?.title).toBe('Clean Code');
    });

    it('treats an empty payload as the legacy form with both fields absent', () => {
      const result = EventCodec.decode('completed', '');

      expect(result).toEqual({ ok: true, value: { type: 'completed' } });
    });

    it('treats a non-JSON payload as the legacy form', () => {
      expect(EventCodec.decode('complete', 'done')).toEqual({
        ok: true,
        value: { type: 'completed' },
      });
    });

    it('leaves inline items absent when the books array is malformed', () => {
      const result = EventCodec.decode(
        'completed',
        JSON.stringify({ resultsUrl: '/v3/jobs/results/abc', books: [{ title: 'No author' }] }),
      );

      expect(result.ok).toBe(true);
      if (!result.ok || result.value.type !== 'completed') return;
      expect(result.value.inlineItems).toBeUndefined();
      expect(result.value.resultsEndpoint).toBe('/v3/jobs/results/abc');
    });
  });

  describe('error', () => {
    it('decodes message and optional fields', () => {
      expect(
        EventCodec.decode(
          'error',
          '{"message":"OCR failed","code":"OCR_FAILED","retryable":true,"jobId":"J1"}',
        ),
      ).toEqual({
        ok: true,
        value: {
          type: 'error',
          message: 'OCR failed',
          code: 'OCR_FAILED',
          retryable: true,
          jobId: 'J1',
        },
      });
    });

    it('fails without a message', () => {
      expect(EventCodec.decode('error', '{"code":"OCR_FAILED"}').ok).toBe(false);
    });
  });

  it('decodes canceled and ping without a payload', () => {
    expect(EventCodec.decode('canceled', '')).toEqual({ ok: true, value: { type: 'canceled' } });
    expect(EventCodec.decode('ping', '')).toEqual({ ok: true, value: { type: 'ping' } });
  });

  it('tolerates a partial enrichment_degraded payload', () => {
    expect(
      EventCodec.decode('enrichment_degraded', '{"isbn":"9780132350884","reason":"timeout"}'),
    ).toEqual({
      ok: true,
      value: { type: 'enrichmentDegraded', isbn: '9780132350884', reason: 'timeout' },
    });
  });

  it('maps an unknown label to ignoredUnknown, never to a failure', () => {
    expect(EventCodec.decode('segmented', 'not json at all')).toEqual({
      ok: true,
      value: { type: 'ignoredUnknown', label: 'segmented' },
    });
  });

  it('knows which labels are terminal', () => {
    expect(['complete', 'completed', 'error', 'canceled'].every(isTerminalLabel)).toBe(true);
    expect(isTerminalLabel('progress')).toBe(false);
    expect(isTerminalLabel('ping')).toBe(false);
  });
});
