import { z } from 'zod';
import { BookResult, EnrichmentStatus } from '../../domain/value-objects/book-result.vo';
import { StreamEvent } from '../../domain/events/stream-event';
import { DecodeResult, decodeWith, decoded, parseJson } from './decode-result';

const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

const optionalNumber = z
  .number()
  .nullish()
  .transform((value) => value ?? undefined);

export const BookResultSchema = z
  .object({
    title: z.string(),
    author: z.string(),
    isbn: optionalString,
    coverUrl: optionalString,
    publisher: optionalString,
    publishedDate: optionalString,
    pageCount: z
      .number()
      .int()
      .nullish()
      .transform((value) => value ?? undefined),
    format: optionalString,
    confidence: z
      .number()
      .min(0)
      .max(1)
      .nullish()
      .transform((value) => value ?? undefined),
    // Statuses added by newer servers are dropped, not rejected.
    enrichmentStatus: z.nativeEnum(EnrichmentStatus).optional().catch(undefined),
  })
  .transform((book) => BookResult.create(book));

const ProgressSchema = z.object({ message: z.string() });

const CompletedSchema = z.object({
  resultsUrl: optionalString,
  books: z.unknown().optional(),
});

const ErrorSchema = z.object({
  message: z.string(),
  code: optionalString,
  retryable: z
    .boolean()
    .nullish()
    .transform((value) => value ?? undefined),
  jobId: optionalString,
});

const EnrichmentDegradedSchema = z.object({
  jobId: optionalString,
  isbn: optionalString,
  title: optionalString,
  reason: optionalString,
  fallbackSource: optionalString,
  timestamp: z
    .union([z.string(), optionalNumber])
    .transform((value) => (value === undefined ? undefined : String(value))),
});

function decodeJson<S extends z.ZodTypeAny>(schema: S, data: string): DecodeResult<z.output<S>> {
  const json = parseJson(data);
  return json.ok ? decodeWith(schema, json.value) : json;
}

function decodeCompleted(data: string): DecodeResult<StreamEvent> {
  // Older servers send `completed` with an empty or non-JSON payload.
  const json = data.trim().length > 0 ? parseJson(data) : undefined;
  if (json === undefined || !json.ok) {
    return decoded<StreamEvent>({ type: 'completed' });
  }

  const result = decodeWith(CompletedSchema, json.value);
  if (!result.ok) {
    return decoded<StreamEvent>({ type: 'completed' });
  }

  const { resultsUrl, books } = result.value;
  // A malformed `books` array leaves the items absent so the results are fetched instead.
  const inline = books === undefined ? undefined : decodeWith(z.array(BookResultSchema), books);
  const inlineItems = inline !== undefined && inline.ok ? inline.value : undefined;

  return decoded<StreamEvent>({
    type: 'completed',
    resultsEndpoint: resultsUrl,
    inlineItems,
  });
}

/**
 * Event Codec
 * Turns one stream record into a {@link StreamEvent}. Labels this client does
 * not know become `ignoredUnknown`; a failure is only reported when a known
 * label's required fields are missing or malformed.
 */
export const EventCodec = {
  decode(label: string, data: string): DecodeResult<StreamEvent> {
    switch (label) {
      case 'progress': {
        const result = decodeJson(ProgressSchema, data);
        return result.ok
          ? decoded<StreamEvent>({ type: 'progress', message: result.value.message })
          : result;
      }

      case 'result': {
        const result = decodeJson(BookResultSchema, data);
        return result.ok ? decoded<StreamEvent>({ type: 'resultItem', book: result.value }) : result;
      }

      case 'complete':
      case 'completed':
        return decodeCompleted(data);

      case 'error': {
        const result = decodeJson(ErrorSchema, data);
        return result.ok ? decoded<StreamEvent>({ type: 'error', ...result.value }) : result;
      }

      case 'canceled':
        return decoded<StreamEvent>({ type: 'canceled' });

      case 'ping':
        return decoded<StreamEvent>({ type: 'ping' });

      case 'enrichment_degraded': {
        if (data.trim().length === 0) {
          return decoded<StreamEvent>({ type: 'enrichmentDegraded' });
        }
        const result = decodeJson(EnrichmentDegradedSchema, data);
        return result.ok
          ? decoded<StreamEvent>({ type: 'enrichmentDegraded', ...result.value })
          : result;
      }

      default:
        return decoded<StreamEvent>({ type: 'ignoredUnknown', label });
    }
  },
};

/**
 * Labels whose decode failure ends the stream instead of being skipped.
 */
export function isTerminalLabel(label: string): boolean {
  return label === 'complete' || label === 'completed' || label === 'error' || label === 'canceled';
}
