import { JobHandle } from '../../../domain/value-objects/job-handle.vo';

export interface SubmitScanCommand {
  image: Buffer;
  /** Defaults to the configured device identity. */
  deviceId?: string;
  signal?: AbortSignal;
}

/**
 * Submit Scan Port (Driving Port)
 * Uploads one image and returns the handle of the accepted job. Retries are
 * applied internally; callers only see the final outcome.
 */
export interface SubmitScanPort {
  execute(command: SubmitScanCommand): Promise<JobHandle>;
}
