export const SCAN_API_PORT = 'ScanApiPort';

export type ApiHeaders = Readonly<Record<string, string | string[] | undefined>>;

/**
 * A complete HTTP response, whatever its status. Interpreting the status is
 * left to the application layer.
 */
export interface ApiResponse {
  statusCode: number;
  headers: ApiHeaders;
  body: Buffer;
}

/**
 * An open `text/event-stream` response.
 */
export interface EventStreamConnection {
  statusCode: number;
  headers: ApiHeaders;
  body: AsyncIterable<Buffer | string>;
  /** Drops the connection. Safe to call more than once. */
  close(): void;
}

export interface UploadScanRequest {
  image: Buffer;
  deviceId: string;
  signal?: AbortSignal;
}

export interface JobRequest {
  headers: Record<string, string>;
  signal?: AbortSignal;
}

/**
 * Scan API Port (Driven Port)
 * Raw access to the scan service. Implementations throw `TransportError` when
 * no response was received and `JobAbortedError` when the signal aborted;
 * every received response is returned, never thrown.
 */
export interface ScanApiPort {
  /**
   * POST the image as multipart form data.
   */
  uploadScan(request: UploadScanRequest): Promise<ApiResponse>;

  /**
   * GET the job's event stream. The body is read lazily.
   */
  openEventStream(url: URL, request: JobRequest): Promise<EventStreamConnection>;

  /**
   * GET a results document.
   */
  fetchResults(url: URL, request: JobRequest): Promise<ApiResponse>;

  /**
   * DELETE the server-side resources of a job.
   */
  cleanupJob(jobId: string, request: JobRequest): Promise<ApiResponse>;
}
