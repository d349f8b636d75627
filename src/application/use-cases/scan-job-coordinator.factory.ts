import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../../config/configuration';
import { SubmitScanUseCase } from './submit-scan.use-case';
import { StreamJobEventsUseCase } from './stream-job-events.use-case';
import { ResolveResultsUseCase } from './resolve-results.use-case';
import { CleanupJobUseCase } from './cleanup-job.use-case';
import { ScanJobCoordinator } from './scan-job-coordinator';

/**
 * Builds one {@link ScanJobCoordinator} per job. The use cases it hands out
 * are stateless; all per-job state lives in the coordinator.
 */
@Injectable()
export class ScanJobCoordinatorFactory {
  private readonly defaultDeviceId: string;

  constructor(
    private readonly submitScan: SubmitScanUseCase,
    private readonly streamEvents: StreamJobEventsUseCase,
    private readonly resolveResults: ResolveResultsUseCase,
    private readonly cleanupJob: CleanupJobUseCase,
    configService: ConfigService<AppConfig>,
  ) {
    this.defaultDeviceId = configService.getOrThrow('scanApi', { infer: true }).deviceId;
  }

  create(deviceId: string = this.defaultDeviceId): ScanJobCoordinator {
    return new ScanJobCoordinator(
      {
        submitScan: this.submitScan,
        streamEvents: this.streamEvents,
        resolveResults: this.resolveResults,
        cleanupJob: this.cleanupJob,
      },
      deviceId,
    );
  }
}
