import { z } from 'zod';

export interface DecodeFailure {
  readonly reason: string;
}

export type DecodeResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly failure: DecodeFailure };

export function decoded<T>(value: T): DecodeResult<T> {
  return { ok: true, value };
}

export function decodeFailure<T>(reason: string): DecodeResult<T> {
  return { ok: false, failure: { reason } };
}

export function parseJson(data: Buffer | string): DecodeResult<unknown> {
  const text = typeof data === 'string' ? data : data.toString('utf8');
  try {
    return decoded<unknown>(JSON.parse(text));
  } catch (error) {
    return decodeFailure(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Runs a zod schema and flattens its issues into a one-line reason.
 */
export function decodeWith<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
): DecodeResult<z.output<S>> {
  const result = schema.safeParse(input);
  if (result.success) {
    return decoded(result.data);
  }
  const reason = result.error.errors
    .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('; ');
  return decodeFailure(reason);
}
