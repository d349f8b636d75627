import { BookResult } from '../../../domain/value-objects/book-result.vo';
import { JobHandle } from '../../../domain/value-objects/job-handle.vo';

export interface ResolveResultsCommand {
  handle: JobHandle;
  resultsEndpoint: string;
  signal?: AbortSignal;
}

/**
 * Resolve Results Port (Driving Port)
 * Fetches the full result list of a completed job. A pure read: repeated
 * calls return the same data.
 */
export interface ResolveResultsPort {
  execute(command: ResolveResultsCommand): Promise<BookResult[]>;
}
