import { BookResult } from '../value-objects/book-result.vo';

/**
 * Stream Events
 * Typed form of the records received on a job's event stream.
 * `completed`, `error` and `canceled` are terminal: nothing follows them.
 */
export interface ProgressStreamEvent {
  readonly type: 'progress';
  readonly message: string;
}

export interface ResultItemStreamEvent {
  readonly type: 'resultItem';
  readonly book: BookResult;
}

export interface CompletedStreamEvent {
  readonly type: 'completed';
  readonly resultsEndpoint?: string;
  readonly inlineItems?: ReadonlyArray<BookResult>;
}

export interface ErrorStreamEvent {
  readonly type: 'error';
  readonly message: string;
  readonly code?: string;
  readonly retryable?: boolean;
  readonly jobId?: string;
}

export interface CanceledStreamEvent {
  readonly type: 'canceled';
}

export interface PingStreamEvent {
  readonly type: 'ping';
}

/** Informational: a book was enriched from a fallback source. */
export interface EnrichmentDegradedStreamEvent {
  readonly type: 'enrichmentDegraded';
  readonly jobId?: string;
  readonly isbn?: string;
  readonly title?: string;
  readonly reason?: string;
  readonly fallbackSource?: string;
  readonly timestamp?: string;
}

/** A label this client does not know. Never an error, never terminal. */
export interface IgnoredUnknownStreamEvent {
  readonly type: 'ignoredUnknown';
  readonly label: string;
}

export type StreamEvent =
  | ProgressStreamEvent
  | ResultItemStreamEvent
  | CompletedStreamEvent
  | ErrorStreamEvent
  | CanceledStreamEvent
  | PingStreamEvent
  | EnrichmentDegradedStreamEvent
  | IgnoredUnknownStreamEvent;

export type TerminalStreamEvent = CompletedStreamEvent | ErrorStreamEvent | CanceledStreamEvent;

export function isTerminalStreamEvent(event: StreamEvent): event is TerminalStreamEvent {
  return event.type === 'completed' || event.type === 'error' || event.type === 'canceled';
}
