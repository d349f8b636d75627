import { JobHandle } from '../../../domain/value-objects/job-handle.vo';
import { StreamEvent } from '../../../domain/events/stream-event';

export interface StreamJobEventsCommand {
  handle: JobHandle;
  signal?: AbortSignal;
}

/**
 * Stream Job Events Port (Driving Port)
 * Follows a job's event stream, reconnecting with `Last-Event-ID` as needed.
 * The sequence ends after a terminal event.
 */
export interface StreamJobEventsPort {
  execute(command: StreamJobEventsCommand): AsyncGenerator<StreamEvent, void, undefined>;
}
