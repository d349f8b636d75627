import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Blob } from 'node:buffer';
import { FormData } from 'undici';
import { AppConfig } from '../../../config/configuration';
import {
  ApiResponse,
  EventStreamConnection,
  JobRequest,
  ScanApiPort,
  UploadScanRequest,
} from '../../../application/ports/output/scan-api.port';
import { HttpClientService } from '../../../shared/http/http-client.service';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';
import { JobAbortedError, TransportError } from '../../../domain/errors/scan-client.errors';

const UPLOAD_PATH = '/v3/jobs/scans';

/**
 * Scan API HTTP Adapter
 * Implements ScanApiPort over undici. Responses are returned as received;
 * only failures to get a response are thrown.
 */
@Injectable()
export class ScanApiHttpAdapter implements ScanApiPort {
  private readonly baseUrl: string;
  private readonly logger: PinoLoggerService;

  constructor(
    private readonly httpClient: HttpClientService,
    configService: ConfigService<AppConfig>,
    logger: PinoLoggerService,
  ) {
    this.baseUrl = configService.getOrThrow('scanApi', { infer: true }).baseUrl;
    this.logger = logger.child({ adapter: ScanApiHttpAdapter.name });
  }

  async uploadScan(request: UploadScanRequest): Promise<ApiResponse> {
    const form = new FormData();
    form.append('deviceId', request.deviceId);
    form.append('image', new Blob([request.image], { type: 'image/jpeg' }), 'spine.jpg');

    this.logger.withDeviceId(request.deviceId).debug(
      { bytes: request.image.length },
      'Uploading scan image',
    );

    return this.call('upload', request.signal, () =>
      this.httpClient.postForm(this.endpoint(UPLOAD_PATH), form, {
        headers: { 'X-Device-Id': request.deviceId, Accept: 'application/json' },
        signal: request.signal,
      }),
    );
  }

  async openEventStream(url: URL, request: JobRequest): Promise<EventStreamConnection> {
    return this.call('event stream', request.signal, () =>
      this.httpClient.openStream(url.toString(), {
        headers: request.headers,
        signal: request.signal,
      }),
    );
  }

  async fetchResults(url: URL, request: JobRequest): Promise<ApiResponse> {
    return this.call('results fetch', request.signal, () =>
      this.httpClient.get(url.toString(), {
        headers: { ...request.headers, Accept: 'application/json' },
        signal: request.signal,
      }),
    );
  }

  async cleanupJob(jobId: string, request: JobRequest): Promise<ApiResponse> {
    const path = `${UPLOAD_PATH}/${encodeURIComponent(jobId)}/cleanup`;

    this.logger.withJobId(jobId).debug({ path }, 'Cleaning up job');

    return this.call('cleanup', request.signal, () =>
      this.httpClient.delete(this.endpoint(path), {
        headers: request.headers,
        signal: request.signal,
      }),
    );
  }

  private endpoint(path: string): string {
    return new URL(path, this.baseUrl).toString();
  }

  private async call<T>(
    operation: string,
    signal: AbortSignal | undefined,
    send: () => Promise<T>,
  ): Promise<T> {
    try {
      return await send();
    } catch (error) {
      if (signal?.aborted) {
        throw new JobAbortedError(signal.reason);
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn({ operation, error: message }, 'Scan API request failed');
      throw new TransportError(`Scan API ${operation} failed: ${message}`, 'TRANSPORT_ERROR', {
        cause: error,
      });
    }
  }
}
