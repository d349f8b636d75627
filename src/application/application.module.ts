import { Module } from '@nestjs/common';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { TimingModule } from '../shared/timing/timing.module';
import { HttpRetryPolicy } from './policies/http-retry.policy';

// Use Cases
import {
  SubmitScanUseCase,
  StreamJobEventsUseCase,
  ResolveResultsUseCase,
  CleanupJobUseCase,
  ScanJobCoordinatorFactory,
  RunScanJobUseCase,
} from './use-cases';

/**
 * Application Module
 * Contains all use cases and application services
 *
 * Use cases depend on output ports (interfaces) only; the implementations
 * are bound by token in the InfrastructureModule and TimingModule.
 */
@Module({
  imports: [InfrastructureModule, TimingModule],
  providers: [
    HttpRetryPolicy,

    // Use Cases
    SubmitScanUseCase,
    StreamJobEventsUseCase,
    ResolveResultsUseCase,
    CleanupJobUseCase,
    ScanJobCoordinatorFactory,
    RunScanJobUseCase,
  ],
  exports: [
    SubmitScanUseCase,
    StreamJobEventsUseCase,
    ResolveResultsUseCase,
    CleanupJobUseCase,
    ScanJobCoordinatorFactory,
    RunScanJobUseCase,
  ],
})
export class ApplicationModule {}
