import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../config/configuration';
import { ScanJobCoordinatorFactory } from '../application/use-cases/scan-job-coordinator.factory';
import { throwIfAborted } from '../application/policies/abort';
import {
  ScanJobEvent,
  TerminalScanJobEvent,
  isTerminalScanJobEvent,
} from '../domain/events/scan-job-event';
import { JobAbortedError, TransportError, isScanClientError } from '../domain/errors/scan-client.errors';

export interface ScanOptions {
  deviceId?: string;
  signal?: AbortSignal;
}

export type ScanEventListener = (jobIndex: number, event: ScanJobEvent) => void;

/**
 * Scan Session Service
 * Runs many scan jobs at once, each on its own coordinator, with at most
 * `maxConcurrentStreams` jobs active. Queued jobs start in FIFO order as
 * slots free up. The limiter only counts slots; it never sees job state.
 */
@Injectable()
export class ScanSessionService {
  private readonly logger = new Logger(ScanSessionService.name);
  private readonly maxConcurrent: number;
  private active = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(
    private readonly coordinators: ScanJobCoordinatorFactory,
    configService: ConfigService<AppConfig>,
  ) {
    this.maxConcurrent = configService.get('session', { infer: true })?.maxConcurrentStreams ?? 5;
  }

  get activeCount(): number {
    return this.active;
  }

  get queueDepth(): number {
    return this.waiting.length;
  }

  /**
   * Events of one job. The slot is taken on first iteration and released
   * when the sequence ends, whatever the outcome.
   */
  async *scan(image: Buffer, options: ScanOptions = {}): AsyncGenerator<ScanJobEvent, void, undefined> {
    await this.acquire(options.signal);
    try {
      yield* this.coordinators.create(options.deviceId).run(image, options.signal);
    } finally {
      this.release();
    }
  }

  /**
   * Runs every image to its terminal event, reporting each event as it
   * arrives. Resolves with one terminal event per image, in input order; an
   * aborted job is reported as failed with {@link JobAbortedError}.
   */
  async scanAll(
    images: ReadonlyArray<Buffer>,
    onEvent: ScanEventListener,
    options: ScanOptions = {},
  ): Promise<TerminalScanJobEvent[]> {
    this.logger.log(`Scanning ${images.length} image(s), ${this.maxConcurrent} at a time`);
    return Promise.all(images.map((image, index) => this.drain(index, image, onEvent, options)));
  }

  private async drain(
    index: number,
    image: Buffer,
    onEvent: ScanEventListener,
    options: ScanOptions,
  ): Promise<TerminalScanJobEvent> {
    let terminal: TerminalScanJobEvent | undefined;
    try {
      for await (const event of this.scan(image, options)) {
        onEvent(index, event);
        if (isTerminalScanJobEvent(event)) {
          terminal = event;
        }
      }
    } catch (error) {
      const failure = isScanClientError(error)
        ? error
        : new TransportError(String(error), 'TRANSPORT_ERROR', { cause: error });
      terminal = { type: 'failed', error: failure };
      onEvent(index, terminal);
    }
    return (
      terminal ?? {
        type: 'failed',
        error: new TransportError('Scan job ended without an outcome', 'STREAM_DISCONNECTED'),
      }
    );
  }

  private acquire(signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal);
    if (this.active < this.maxConcurrent) {
      this.active += 1;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        const position = this.waiting.indexOf(grant);
        if (position !== -1) {
          this.waiting.splice(position, 1);
        }
        reject(new JobAbortedError(signal?.reason));
      };
      const grant = () => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiting.push(grant);
    });
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) {
      // The slot passes straight to the next job; the active count is unchanged.
      next();
    } else {
      this.active -= 1;
    }
  }
}
