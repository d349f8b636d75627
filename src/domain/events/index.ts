/**
 * Domain Events Barrel Export
 */
export {
  isTerminalStreamEvent,
  type StreamEvent,
  type TerminalStreamEvent,
  type ProgressStreamEvent,
  type ResultItemStreamEvent,
  type CompletedStreamEvent,
  type ErrorStreamEvent,
  type CanceledStreamEvent,
  type PingStreamEvent,
  type EnrichmentDegradedStreamEvent,
  type IgnoredUnknownStreamEvent,
} from './stream-event';
export {
  isTerminalScanJobEvent,
  type ScanJobEvent,
  type TerminalScanJobEvent,
  type JobCompletedEvent,
  type JobFailedEvent,
  type JobCanceledEvent,
} from './scan-job-event';
