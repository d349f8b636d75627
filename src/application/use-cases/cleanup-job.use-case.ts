import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  CleanupJobCommand,
  CleanupJobPort,
  CleanupOutcome,
} from '../ports/input/cleanup-job.port';
import { SCAN_API_PORT } from '../ports/output/scan-api.port';
import type { ScanApiPort } from '../ports/output/scan-api.port';
import { ErrorTranslator } from '../error-translator';
import { JobHandle } from '../../domain/value-objects/job-handle.vo';

/** A job the server already forgot counts as cleaned up. */
const CLEANED_UP_STATUSES = new Set([200, 204, 404]);

/**
 * Cleanup Job Use Case
 * Best-effort DELETE of a job's server-side resources. Idempotent on the
 * server; never throws.
 */
@Injectable()
export class CleanupJobUseCase implements CleanupJobPort {
  private readonly logger = new Logger(CleanupJobUseCase.name);

  constructor(@Inject(SCAN_API_PORT) private readonly scanApi: ScanApiPort) {}

  async execute(command: CleanupJobCommand): Promise<CleanupOutcome> {
    const { jobId } = command.handle;

    try {
      const response = await this.scanApi.cleanupJob(jobId, {
        headers: JobHandle.authHeaders(command.handle),
        signal: command.signal,
      });

      if (CLEANED_UP_STATUSES.has(response.statusCode)) {
        this.logger.debug(`Cleaned up job ${jobId} (HTTP ${response.statusCode})`);
        return { status: 'succeeded', statusCode: response.statusCode };
      }

      const error = ErrorTranslator.translate(response.statusCode, response.body, response.headers);
      this.logger.warn(`Cleanup of job ${jobId} failed: ${error.code} ${error.message}`);
      return { status: 'failed', error };
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      this.logger.warn(`Cleanup of job ${jobId} failed: ${failure.message}`);
      return { status: 'failed', error: failure };
    }
  }
}
