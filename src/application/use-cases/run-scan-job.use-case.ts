import { Injectable } from '@nestjs/common';
import { RunScanJobCommand, RunScanJobPort } from '../ports/input/run-scan-job.port';
import { ScanJobEvent } from '../../domain/events/scan-job-event';
import { ScanJobCoordinatorFactory } from './scan-job-coordinator.factory';

/**
 * Run Scan Job Use Case
 * One-call entry point: a new coordinator per command.
 */
@Injectable()
export class RunScanJobUseCase implements RunScanJobPort {
  constructor(private readonly coordinators: ScanJobCoordinatorFactory) {}

  execute(command: RunScanJobCommand): AsyncGenerator<ScanJobEvent, void, undefined> {
    return this.coordinators.create(command.deviceId).run(command.image, command.signal);
  }
}
