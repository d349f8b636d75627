import { ProblemDetailsCodec } from './codecs/problem-details.codec';
import { ApiHeaders } from './ports/output/scan-api.port';
import { headerValue, parseRetryAfter } from './policies/retry-after';
import {
  MalformedResponseError,
  RawHttpError,
  ScanClientError,
  StructuredApiError,
} from '../domain/errors/scan-client.errors';

const MAX_BODY_TEXT = 512;

/**
 * Error Translator
 * Maps a received HTTP response to a typed client error. Holds no state and
 * is shared by every job.
 */
export const ErrorTranslator = {
  translate(statusCode: number, body: Buffer, headers: ApiHeaders = {}): ScanClientError {
    const problem = ProblemDetailsCodec.decode(body);
    const headerDelayMs = parseRetryAfter(headerValue(headers, 'retry-after'));

    if (problem.ok) {
      // The body's retryAfterMs always wins over the header.
      return new StructuredApiError(problem.value, problem.value.retryAfterMs ?? headerDelayMs);
    }

    if (statusCode >= 200 && statusCode < 300) {
      return new MalformedResponseError(
        `Unparseable response body (HTTP ${statusCode}): ${problem.failure.reason}`,
        statusCode,
      );
    }

    const text = body.toString('utf8').slice(0, MAX_BODY_TEXT);
    return new RawHttpError(statusCode, text.length > 0 ? text : undefined, headerDelayMs);
  },
};
