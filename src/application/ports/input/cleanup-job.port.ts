import { JobHandle } from '../../../domain/value-objects/job-handle.vo';

export type CleanupOutcome =
  | { status: 'succeeded'; statusCode: number }
  | { status: 'failed'; error: Error }
  | { status: 'skipped'; reason: string };

export interface CleanupJobCommand {
  handle: JobHandle;
  signal?: AbortSignal;
}

/**
 * Cleanup Job Port (Driving Port)
 * Releases a job's server-side resources. Best effort: failures are reported
 * in the outcome and never thrown.
 */
export interface CleanupJobPort {
  execute(command: CleanupJobCommand): Promise<CleanupOutcome>;
}
