import { Logger } from '@nestjs/common';
import type { DelayPort } from '../ports/output/delay.port';
import type { EventStreamConnection, ScanApiPort } from '../ports/output/scan-api.port';
import { EventCodec, isTerminalLabel } from '../codecs/event.codec';
import { SseRecord, SseRecordParser } from '../codecs/sse-record.parser';
import { ErrorTranslator } from '../error-translator';
import { abortableWait, throwIfAborted } from '../policies/abort';
import { JobHandle } from '../../domain/value-objects/job-handle.vo';
import { RetryStateVO } from '../../domain/value-objects/retry-state.vo';
import { StreamEvent, isTerminalStreamEvent } from '../../domain/events/stream-event';
import {
  JobAbortedError,
  MalformedResponseError,
  RawHttpError,
  ScanClientError,
  StructuredApiError,
  TransportError,
} from '../../domain/errors/scan-client.errors';

export interface EventStreamOptions {
  maxReconnectAttempts: number;
  reconnectBaseDelayMs: number;
  reconnectMaxDelayMs: number;
  idleTimeoutMs: number;
  emitPings: boolean;
}

export const DEFAULT_EVENT_STREAM_OPTIONS: EventStreamOptions = {
  maxReconnectAttempts: 5,
  reconnectBaseDelayMs: 1000,
  reconnectMaxDelayMs: 30000,
  idleTimeoutMs: 90000,
  emitPings: false,
};

const MAX_ERROR_BODY_BYTES = 64 * 1024;

type ChunkOutcome =
  | { kind: 'chunk'; chunk: Buffer | string }
  | { kind: 'end' }
  | { kind: 'idle' }
  | { kind: 'failed'; error: unknown };

/**
 * Event stream of one job. Owns the job's {@link RetryStateVO}; one instance
 * per handle, never shared.
 *
 * Disconnects, idle windows, 429 and 5xx on connect are all handled by
 * reconnecting with jittered exponential backoff and `Last-Event-ID`. The
 * attempt counter resets whenever a record is processed.
 */
export class JobEventStream {
  private readonly logger = new Logger(JobEventStream.name);
  private retryState = RetryStateVO.initial();
  private connections = 0;

  constructor(
    private readonly handle: JobHandle,
    private readonly scanApi: ScanApiPort,
    private readonly delay: DelayPort,
    private readonly options: EventStreamOptions = DEFAULT_EVENT_STREAM_OPTIONS,
    private readonly random: () => number = Math.random,
  ) {}

  get lastEventId(): string | undefined {
    return this.retryState.lastEventId;
  }

  async *events(signal?: AbortSignal): AsyncGenerator<StreamEvent, void, undefined> {
    for (;;) {
      throwIfAborted(signal);
      const disconnect = yield* this.connectOnce(signal);
      if (disconnect === undefined) {
        return;
      }
      await this.scheduleReconnect(disconnect, signal);
    }
  }

  /**
   * Runs one connection. Returns the reason it dropped, or `undefined` once
   * a terminal event has been yielded.
   */
  private async *connectOnce(
    signal?: AbortSignal,
  ): AsyncGenerator<StreamEvent, ScanClientError | undefined, undefined> {
    const isReconnect = this.connections > 0;
    this.connections += 1;

    let connection: EventStreamConnection;
    try {
      connection = await this.scanApi.openEventStream(this.handle.streamEndpoint, {
        headers: this.requestHeaders(isReconnect),
        signal,
      });
    } catch (error) {
      throwIfAborted(signal);
      if (error instanceof TransportError) {
        return error;
      }
      throw error;
    }

    try {
      if (connection.statusCode !== 200) {
        return await this.rejectConnection(connection, signal);
      }

      this.logger.debug(
        isReconnect
          ? `Job ${this.handle.jobId}: stream reconnected (Last-Event-ID: ${this.lastEventId ?? 'none'})`
          : `Job ${this.handle.jobId}: stream connected`,
      );

      const parser = new SseRecordParser();
      const iterator = connection.body[Symbol.asyncIterator]();

      for (;;) {
        const outcome = await this.nextChunk(iterator, signal);
        if (outcome.kind === 'idle') {
          return new TransportError(
            `No data received for ${this.options.idleTimeoutMs}ms`,
            'STREAM_IDLE_TIMEOUT',
          );
        }
        if (outcome.kind === 'end') {
          return new TransportError(
            'Event stream closed before a terminal event',
            'STREAM_DISCONNECTED',
          );
        }
        if (outcome.kind === 'failed') {
          return new TransportError(
            `Event stream connection failed: ${describe(outcome.error)}`,
            'STREAM_DISCONNECTED',
            { cause: outcome.error },
          );
        }

        for (const record of parser.push(outcome.chunk)) {
          const event = this.processRecord(record);
          if (event === undefined) {
            continue;
          }
          yield event;
          if (isTerminalStreamEvent(event)) {
            return undefined;
          }
        }
      }
    } finally {
      connection.close();
    }
  }

  /**
   * Non-200 on connect: 429 and 5xx are treated as disconnects, anything else
   * ends the stream.
   */
  private async rejectConnection(
    connection: EventStreamConnection,
    signal?: AbortSignal,
  ): Promise<ScanClientError> {
    const body = await this.readErrorBody(connection, signal);
    const error = ErrorTranslator.translate(connection.statusCode, body, connection.headers);

    if (connection.statusCode === 429 || connection.statusCode >= 500) {
      return error;
    }
    throw error;
  }

  /**
   * Reads the error body of a rejected connection under the same idle window
   * as the event stream; a body that stalls is cut short.
   */
  private async readErrorBody(
    connection: EventStreamConnection,
    signal?: AbortSignal,
  ): Promise<Buffer> {
    const iterator = connection.body[Symbol.asyncIterator]();
    const chunks: Buffer[] = [];
    let size = 0;

    while (size < MAX_ERROR_BODY_BYTES) {
      const outcome = await this.nextChunk(iterator, signal);
      if (outcome.kind !== 'chunk') {
        break;
      }
      const buffer =
        typeof outcome.chunk === 'string' ? Buffer.from(outcome.chunk, 'utf8') : outcome.chunk;
      chunks.push(buffer);
      size += buffer.length;
    }
    return Buffer.concat(chunks).subarray(0, MAX_ERROR_BODY_BYTES);
  }

  private async nextChunk(
    iterator: AsyncIterator<Buffer | string>,
    signal?: AbortSignal,
  ): Promise<ChunkOutcome> {
    throwIfAborted(signal);

    let idleTimer: NodeJS.Timeout | undefined;
    let stopListening = (): void => undefined;

    const idle = new Promise<ChunkOutcome>((resolve) => {
      idleTimer = setTimeout(() => resolve({ kind: 'idle' }), this.options.idleTimeoutMs);
    });
    const aborted = new Promise<never>((_, reject) => {
      if (signal === undefined) {
        return;
      }
      const onAbort = () => reject(new JobAbortedError(signal.reason));
      signal.addEventListener('abort', onAbort, { once: true });
      stopListening = () => signal.removeEventListener('abort', onAbort);
    });
    const read = iterator.next().then(
      (result): ChunkOutcome =>
        result.done ? { kind: 'end' } : { kind: 'chunk', chunk: result.value },
      (error: unknown): ChunkOutcome => ({ kind: 'failed', error }),
    );

    try {
      return await Promise.race([read, idle, aborted]);
    } finally {
      clearTimeout(idleTimer);
      stopListening();
    }
  }

  /**
   * Applies one record to the retry state and decodes it. Returns the event to
   * deliver, or `undefined` when the record is consumed silently.
   */
  private processRecord(record: SseRecord): StreamEvent | undefined {
    // The id is recorded before decoding so a bad payload does not lose the replay position.
    if (record.id !== undefined) {
      this.retryState = this.retryState.withEventId(record.id);
    }

    const decoded = EventCodec.decode(record.event, record.data);
    if (!decoded.ok) {
      if (isTerminalLabel(record.event)) {
        throw new MalformedResponseError(
          `Malformed "${record.event}" event: ${decoded.failure.reason}`,
        );
      }
      this.logger.warn(
        `Job ${this.handle.jobId}: skipping malformed "${record.event}" event: ${decoded.failure.reason}`,
      );
      return undefined;
    }

    const event = decoded.value;
    if (event.type === 'ignoredUnknown') {
      this.logger.debug(`Job ${this.handle.jobId}: ignoring unknown event "${event.label}"`);
      return undefined;
    }

    this.retryState = this.retryState.withProgress();

    if (event.type === 'ping' && !this.options.emitPings) {
      return undefined;
    }
    return event;
  }

  private async scheduleReconnect(reason: ScanClientError, signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal);
    const attempt = this.retryState.attemptCount;
    if (attempt >= this.options.maxReconnectAttempts) {
      throw new TransportError(
        `Event stream for job ${this.handle.jobId} could not reconnect after ${attempt} attempts: ${reason.message}`,
        'STREAM_RECONNECT_EXHAUSTED',
        { cause: reason },
      );
    }

    const serverDelayMs =
      reason instanceof StructuredApiError || reason instanceof RawHttpError
        ? reason.retryAfterMs
        : undefined;
    const delayMs = serverDelayMs ?? this.backoffDelay(attempt);
    this.retryState = this.retryState.withFailedAttempt(delayMs);

    this.logger.warn(
      `Job ${this.handle.jobId}: stream dropped (${reason.code}), reconnect ` +
        `${attempt + 1}/${this.options.maxReconnectAttempts} in ${delayMs}ms`,
    );
    await abortableWait(this.delay, delayMs, signal);
  }

  /**
   * Exponential backoff with equal jitter: half the capped delay is fixed,
   * the other half random.
   */
  private backoffDelay(attempt: number): number {
    const capped = Math.min(
      this.options.reconnectMaxDelayMs,
      this.options.reconnectBaseDelayMs * 2 ** attempt,
    );
    const half = capped / 2;
    return Math.round(half + this.random() * half);
  }

  private requestHeaders(isReconnect: boolean): Record<string, string> {
    const lastEventId = this.retryState.lastEventId;
    return {
      ...JobHandle.authHeaders(this.handle),
      Accept: 'text/event-stream',
      'Cache-Control': 'no-cache',
      ...(isReconnect && lastEventId !== undefined && { 'Last-Event-ID': lastEventId }),
    };
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
