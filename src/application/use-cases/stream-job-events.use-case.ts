import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../../config/configuration';
import {
  StreamJobEventsCommand,
  StreamJobEventsPort,
} from '../ports/input/stream-job-events.port';
import { DELAY_PORT } from '../ports/output/delay.port';
import type { DelayPort } from '../ports/output/delay.port';
import { SCAN_API_PORT } from '../ports/output/scan-api.port';
import type { ScanApiPort } from '../ports/output/scan-api.port';
import { JobHandle } from '../../domain/value-objects/job-handle.vo';
import { StreamEvent } from '../../domain/events/stream-event';
import {
  DEFAULT_EVENT_STREAM_OPTIONS,
  EventStreamOptions,
  JobEventStream,
} from './job-event-stream';

/**
 * Stream Job Events Use Case
 * Creates a fresh {@link JobEventStream} per handle, so reconnection state is
 * never shared between jobs.
 */
@Injectable()
export class StreamJobEventsUseCase implements StreamJobEventsPort {
  private readonly options: EventStreamOptions;

  constructor(
    @Inject(SCAN_API_PORT) private readonly scanApi: ScanApiPort,
    @Inject(DELAY_PORT) private readonly delay: DelayPort,
    configService: ConfigService<AppConfig>,
  ) {
    this.options = configService.get('stream', { infer: true }) ?? DEFAULT_EVENT_STREAM_OPTIONS;
  }

  open(handle: JobHandle): JobEventStream {
    return new JobEventStream(handle, this.scanApi, this.delay, this.options);
  }

  execute(command: StreamJobEventsCommand): AsyncGenerator<StreamEvent, void, undefined> {
    return this.open(command.handle).events(command.signal);
  }
}
