import { ScanJobEvent } from '../domain/events/scan-job-event';

/**
 * Plain-JSON form of a {@link ScanJobEvent}; errors become their
 * `toJSON()` shape.
 */
export function serializeScanJobEvent(event: ScanJobEvent): Record<string, unknown> {
  switch (event.type) {
    case 'failed':
      return { type: event.type, jobId: event.jobId, error: event.error.toJSON() };
    case 'completed':
      return {
        type: event.type,
        jobId: event.jobId,
        source: event.source,
        resultCount: event.results.length,
        results: event.results,
      };
    default:
      return { ...event };
  }
}
