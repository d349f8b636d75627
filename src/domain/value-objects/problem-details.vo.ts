/**
 * Problem Details Value Object
 * The error envelope (RFC 9457 style) carried by every non-2xx response.
 * Built per response and never persisted.
 */
export interface ProblemDetails {
  readonly success: boolean;
  readonly type: string;
  readonly title: string;
  readonly status: number;
  readonly detail: string;
  readonly code: string;
  readonly retryable: boolean;
  /** Server-requested delay; wins over a `Retry-After` header. */
  readonly retryAfterMs?: number;
  readonly instance?: string;
  readonly metadata?: Readonly<Record<string, string>>;
}
