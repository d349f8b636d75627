import { Logger } from '@nestjs/common';
import type { SubmitScanPort } from '../ports/input/submit-scan.port';
import type { StreamJobEventsPort } from '../ports/input/stream-job-events.port';
import type { ResolveResultsPort } from '../ports/input/resolve-results.port';
import type { CleanupJobPort, CleanupOutcome } from '../ports/input/cleanup-job.port';
import { ScanJobEntity } from '../../domain/entities/scan-job.entity';
import { JobHandle } from '../../domain/value-objects/job-handle.vo';
import { ScanJobStatus } from '../../domain/value-objects/scan-job-status.vo';
import { CompletedStreamEvent } from '../../domain/events/stream-event';
import { ScanJobEvent, TerminalScanJobEvent } from '../../domain/events/scan-job-event';
import {
  JobAbortedError,
  MalformedResponseError,
  ScanClientError,
  StreamTerminalError,
  TransportError,
  isScanClientError,
} from '../../domain/errors/scan-client.errors';

export interface ScanJobCoordinatorDeps {
  submitScan: SubmitScanPort;
  streamEvents: StreamJobEventsPort;
  resolveResults: ResolveResultsPort;
  cleanupJob: CleanupJobPort;
}

function toClientError(error: unknown, context: string): ScanClientError {
  if (isScanClientError(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(`${context}: ${message}`, 'TRANSPORT_ERROR', { cause: error });
}

/**
 * Scan Job Coordinator
 * Drives one job through Created → Uploading → Streaming → [Resolving] →
 * Completed | Failed | Canceled and reconciles inline and fetched results
 * into a single `completed` event.
 *
 * Every terminal state triggers exactly one best-effort cleanup, awaited
 * before the terminal event is delivered. A caller abort stops the job's
 * tasks without cleanup and leaves the state where it was.
 */
export class ScanJobCoordinator {
  private readonly logger = new Logger(ScanJobCoordinator.name);
  private job: ScanJobEntity;
  private cleanupRun?: Promise<CleanupOutcome>;
  private cleanupResult?: CleanupOutcome;

  constructor(
    private readonly deps: ScanJobCoordinatorDeps,
    deviceId: string,
  ) {
    this.job = ScanJobEntity.create({ deviceId });
  }

  get state(): ScanJobStatus {
    return this.job.status.value;
  }

  get entity(): ScanJobEntity {
    return this.job;
  }

  get handle(): JobHandle | undefined {
    return this.job.handle;
  }

  get cleanupOutcome(): CleanupOutcome | undefined {
    return this.cleanupResult;
  }

  async submit(image: Buffer, signal?: AbortSignal): Promise<JobHandle> {
    this.job = this.job.startUpload();

    try {
      const handle = await this.deps.submitScan.execute({
        image,
        deviceId: this.job.deviceId,
        signal,
      });
      this.job = this.job.attachHandle(handle);
      return handle;
    } catch (error) {
      if (error instanceof JobAbortedError) {
        throw error;
      }
      const failure = toClientError(error, 'Upload failed');
      this.job = this.job.fail(failure);
      this.cleanupResult = { status: 'skipped', reason: 'Upload did not create a job' };
      throw failure;
    }
  }

  async *events(signal?: AbortSignal): AsyncGenerator<ScanJobEvent, void, undefined> {
    const handle = this.job.handle;
    if (handle === undefined || this.state !== ScanJobStatus.STREAMING) {
      throw new Error(`Cannot stream events for a job in state ${this.state}`);
    }

    let terminal: TerminalScanJobEvent | undefined;
    let completion: CompletedStreamEvent | undefined;
    try {
      for await (const event of this.deps.streamEvents.execute({ handle, signal })) {
        switch (event.type) {
          case 'progress':
          case 'resultItem':
          case 'enrichmentDegraded':
          case 'ping':
            yield event;
            break;
          case 'completed':
            completion = event;
            break;
          case 'error':
            terminal = this.failWith(new StreamTerminalError(event));
            break;
          case 'canceled':
            this.job = this.job.cancel();
            terminal = { type: 'canceled', jobId: handle.jobId };
            break;
          case 'ignoredUnknown':
            break;
        }
        if (terminal !== undefined || completion !== undefined) {
          break;
        }
      }
      // the event stream is closed by now; results are fetched on a fresh request
      if (completion !== undefined) {
        terminal = await this.complete(handle, completion, signal);
      }
      terminal ??= this.failWith(
        new TransportError('Event stream ended without a terminal event', 'STREAM_DISCONNECTED'),
      );
    } catch (error) {
      if (error instanceof JobAbortedError) {
        this.logger.log(`Job ${handle.jobId} aborted by caller in state ${this.state}`);
        throw error;
      }
      terminal = this.failWith(toClientError(error, 'Event stream failed'));
    }

    await this.cleanup();
    yield terminal;
  }

  /**
   * Upload then stream. An upload failure is delivered as a `failed` event.
   */
  async *run(image: Buffer, signal?: AbortSignal): AsyncGenerator<ScanJobEvent, void, undefined> {
    try {
      await this.submit(image, signal);
    } catch (error) {
      if (error instanceof JobAbortedError) {
        throw error;
      }
      yield { type: 'failed', error: toClientError(error, 'Upload failed') };
      return;
    }
    yield* this.events(signal);
  }

  /**
   * Best-effort release of server-side resources. Memoized: at most one
   * request per job. Never throws.
   */
  cleanup(): Promise<CleanupOutcome> {
    if (this.cleanupRun !== undefined) {
      return this.cleanupRun;
    }

    const handle = this.job.handle;
    if (handle === undefined) {
      const skipped: CleanupOutcome = this.cleanupResult ?? {
        status: 'skipped',
        reason: 'No job was created',
      };
      this.cleanupResult = skipped;
      this.cleanupRun = Promise.resolve(skipped);
      return this.cleanupRun;
    }

    this.cleanupRun = this.deps.cleanupJob.execute({ handle }).then((outcome) => {
      this.cleanupResult = outcome;
      if (outcome.status === 'failed') {
        this.logger.warn(`Cleanup of job ${handle.jobId} failed: ${outcome.error.message}`);
      }
      return outcome;
    });
    return this.cleanupRun;
  }

  private async complete(
    handle: JobHandle,
    event: CompletedStreamEvent,
    signal?: AbortSignal,
  ): Promise<TerminalScanJobEvent> {
    const inlineItems = event.inlineItems ?? [];
    if (inlineItems.length > 0) {
      this.job = this.job.complete(inlineItems, 'inline');
      return { type: 'completed', jobId: handle.jobId, results: inlineItems, source: 'inline' };
    }

    if (event.resultsEndpoint === undefined) {
      return this.failWith(
        new MalformedResponseError('Completed event carried neither results nor a results endpoint'),
      );
    }

    this.job = this.job.beginResolving();
    try {
      const results = await this.deps.resolveResults.execute({
        handle,
        resultsEndpoint: event.resultsEndpoint,
        signal,
      });
      this.job = this.job.complete(results, 'fetched');
      return { type: 'completed', jobId: handle.jobId, results, source: 'fetched' };
    } catch (error) {
      if (error instanceof JobAbortedError) {
        throw error;
      }
      return this.failWith(toClientError(error, 'Results fetch failed'));
    }
  }

  private failWith(error: ScanClientError): TerminalScanJobEvent {
    this.job = this.job.fail(error);
    this.logger.warn(`Job ${this.job.jobId ?? '(none)'} failed: ${error.code} ${error.message}`);
    return { type: 'failed', jobId: this.job.jobId, error };
  }
}
