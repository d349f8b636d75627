import { BookResult } from '../value-objects/book-result.vo';
import { ScanClientError } from '../errors/scan-client.errors';
import {
  EnrichmentDegradedStreamEvent,
  PingStreamEvent,
  ProgressStreamEvent,
  ResultItemStreamEvent,
} from './stream-event';

/**
 * Scan Job Events
 * What a coordinator delivers to its caller. Inline and fetched results are
 * reconciled into a single `completed` event carrying the full list.
 */
export interface JobCompletedEvent {
  readonly type: 'completed';
  readonly jobId: string;
  readonly results: ReadonlyArray<BookResult>;
  readonly source: 'inline' | 'fetched';
}

export interface JobFailedEvent {
  readonly type: 'failed';
  readonly jobId?: string;
  readonly error: ScanClientError;
}

export interface JobCanceledEvent {
  readonly type: 'canceled';
  readonly jobId: string;
}

export type ScanJobEvent =
  | ProgressStreamEvent
  | ResultItemStreamEvent
  | EnrichmentDegradedStreamEvent
  | PingStreamEvent
  | JobCompletedEvent
  | JobFailedEvent
  | JobCanceledEvent;

export type TerminalScanJobEvent = JobCompletedEvent | JobFailedEvent | JobCanceledEvent;

export function isTerminalScanJobEvent(event: ScanJobEvent): event is TerminalScanJobEvent {
  return event.type === 'completed' || event.type === 'failed' || event.type === 'canceled';
}
