/**
 * Use Cases Barrel Export
 */
export { SubmitScanUseCase, UploadEnvelopeSchema } from './submit-scan.use-case';
export {
  JobEventStream,
  DEFAULT_EVENT_STREAM_OPTIONS,
  type EventStreamOptions,
} from './job-event-stream';
export { StreamJobEventsUseCase } from './stream-job-events.use-case';
export { ResolveResultsUseCase, ResultsEnvelopeSchema } from './resolve-results.use-case';
export { CleanupJobUseCase } from './cleanup-job.use-case';
export { ScanJobCoordinator, type ScanJobCoordinatorDeps } from './scan-job-coordinator';
export { ScanJobCoordinatorFactory } from './scan-job-coordinator.factory';
export { RunScanJobUseCase } from './run-scan-job.use-case';
