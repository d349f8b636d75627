import { ProblemDetails } from '../value-objects/problem-details.vo';

export type ScanClientErrorKind =
  | 'transport'
  | 'structured_api'
  | 'malformed_response'
  | 'raw_http'
  | 'stream_terminal'
  | 'aborted';

export interface ScanClientErrorJSON {
  kind: ScanClientErrorKind;
  code: string;
  message: string;
  retryable: boolean;
  statusCode?: number;
  detail: string;
}

/**
 * Base class for every failure this client surfaces. Each terminal failure
 * carries a machine-readable code, a retryable flag and a readable detail so
 * callers can choose between offering a retry and giving up.
 */
export abstract class ScanClientError extends Error {
  abstract readonly kind: ScanClientErrorKind;
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly statusCode?: number;

  protected constructor(message: string, statusCode?: number, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }

  get detail(): string {
    return this.message;
  }

  toJSON(): ScanClientErrorJSON {
    return {
      kind: this.kind,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      statusCode: this.statusCode,
      detail: this.detail,
    };
  }
}

export type TransportErrorCode =
  | 'TRANSPORT_ERROR'
  | 'STREAM_IDLE_TIMEOUT'
  | 'STREAM_DISCONNECTED'
  | 'STREAM_RECONNECT_EXHAUSTED';

/**
 * Connectivity failure: refused connection, reset socket, timeout, or a
 * stream that dropped before its terminal event.
 */
export class TransportError extends ScanClientError {
  readonly kind = 'transport';
  readonly retryable = true;

  constructor(
    message: string,
    readonly code: TransportErrorCode = 'TRANSPORT_ERROR',
    options?: ErrorOptions,
  ) {
    super(message, undefined, options);
  }
}

/**
 * A non-2xx response whose body decoded as {@link ProblemDetails}.
 */
export class StructuredApiError extends ScanClientError {
  readonly kind = 'structured_api';

  constructor(
    readonly problem: ProblemDetails,
    /** Body `retryAfterMs`, else the `Retry-After` header in milliseconds. */
    readonly retryAfterMs?: number,
  ) {
    super(problem.detail, problem.status);
  }

  get code(): string {
    return this.problem.code;
  }

  get retryable(): boolean {
    return this.problem.retryable;
  }

  get title(): string {
    return this.problem.title;
  }
}

/**
 * The server answered with a body that violates the API schema. Signals a
 * defect on one side of the wire, not a business failure.
 */
export class MalformedResponseError extends ScanClientError {
  readonly kind = 'malformed_response';
  readonly code = 'MALFORMED_RESPONSE';
  readonly retryable = false;

  constructor(message: string, statusCode?: number) {
    super(message, statusCode);
  }
}

/**
 * Last-resort error for a non-2xx response whose body is not a problem
 * document.
 */
export class RawHttpError extends ScanClientError {
  readonly kind = 'raw_http';

  constructor(
    statusCode: number,
    readonly bodyText?: string,
    /** From the `Retry-After` header, in milliseconds. */
    readonly retryAfterMs?: number,
  ) {
    super(`Server error (HTTP ${statusCode})`, statusCode);
  }

  get code(): string {
    return `HTTP_${this.statusCode}`;
  }

  get retryable(): boolean {
    const status = this.statusCode ?? 0;
    return status === 429 || status >= 500;
  }
}

export interface StreamErrorInfo {
  message: string;
  code?: string;
  retryable?: boolean;
  jobId?: string;
}

/**
 * The job itself failed: the server sent an `error` event on the stream.
 */
export class StreamTerminalError extends ScanClientError {
  readonly kind = 'stream_terminal';
  readonly code: string;
  readonly retryable: boolean;
  readonly jobId?: string;

  constructor(info: StreamErrorInfo) {
    super(info.message);
    this.code = info.code ?? 'STREAM_ERROR';
    this.retryable = info.retryable ?? false;
    this.jobId = info.jobId;
  }
}

/**
 * The caller cancelled the job's task. The server-side job is left alone.
 */
export class JobAbortedError extends ScanClientError {
  readonly kind = 'aborted';
  readonly code = 'JOB_ABORTED';
  readonly retryable = true;

  constructor(reason?: unknown) {
    super('Scan job was aborted by the caller', undefined, { cause: reason });
  }
}

export function isScanClientError(error: unknown): error is ScanClientError {
  return error instanceof ScanClientError;
}
