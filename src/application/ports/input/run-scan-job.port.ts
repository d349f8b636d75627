import { ScanJobEvent } from '../../../domain/events/scan-job-event';

export interface RunScanJobCommand {
  image: Buffer;
  deviceId?: string;
  signal?: AbortSignal;
}

/**
 * Run Scan Job Port (Driving Port)
 * Upload, stream, resolve and clean up one job, delivering its events in
 * order. Upload failures arrive as a `failed` event.
 */
export interface RunScanJobPort {
  execute(command: RunScanJobCommand): AsyncGenerator<ScanJobEvent, void, undefined>;
}
