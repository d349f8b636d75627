import { z } from 'zod';
import { ProblemDetails } from '../../domain/value-objects/problem-details.vo';
import { DecodeResult, decodeWith, decoded, parseJson } from './decode-result';

export const ProblemDetailsSchema = z.object({
  success: z.boolean(),
  type: z.string(),
  title: z.string(),
  status: z.number().int(),
  detail: z.string(),
  code: z.string(),
  retryable: z.boolean(),
  retryAfterMs: z.number().nonnegative().nullish(),
  instance: z.string().nullish(),
  // A metadata map of the wrong shape is dropped rather than failing the document.
  metadata: z.record(z.string()).nullish().catch(undefined),
});

/**
 * Problem Details Codec
 * Decodes the error envelope returned with every non-2xx response. Only the
 * seven core fields are required; absent or null optional fields stay
 * undefined.
 */
export const ProblemDetailsCodec = {
  decode(body: Buffer | string): DecodeResult<ProblemDetails> {
    const json = parseJson(body);
    if (!json.ok) {
      return json;
    }

    const result = decodeWith(ProblemDetailsSchema, json.value);
    if (!result.ok) {
      return result;
    }

    const { retryAfterMs, instance, metadata, ...required } = result.value;
    return decoded<ProblemDetails>({
      ...required,
      ...(retryAfterMs != null && { retryAfterMs }),
      ...(instance != null && { instance }),
      ...(metadata != null && { metadata }),
    });
  },
};
