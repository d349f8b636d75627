import 'reflect-metadata';

export { ScanClientModule } from './app.module';
export { ScanSessionService, type ScanOptions, type ScanEventListener } from './scanning/scan-session.service';
export { serializeScanJobEvent } from './scanning/scan-event.serializer';
export {
  ScanJobCoordinator,
  ScanJobCoordinatorFactory,
  RunScanJobUseCase,
  SubmitScanUseCase,
  StreamJobEventsUseCase,
  ResolveResultsUseCase,
  CleanupJobUseCase,
  JobEventStream,
} from './application/use-cases';
export type { CleanupOutcome } from './application/ports/input';
export { SCAN_API_PORT, type ScanApiPort, DELAY_PORT, type DelayPort } from './application/ports/output';
export { EventCodec, ProblemDetailsCodec, SseRecordParser } from './application/codecs';
export { ErrorTranslator } from './application/error-translator';
export { HTTP_DISPATCHER } from './shared/http/http-client.service';
export * from './domain';
