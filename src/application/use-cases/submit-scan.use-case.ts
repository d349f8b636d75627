import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { AppConfig } from '../../config/configuration';
import { SubmitScanCommand, SubmitScanPort } from '../ports/input/submit-scan.port';
import { SCAN_API_PORT } from '../ports/output/scan-api.port';
import type { ApiResponse, ScanApiPort } from '../ports/output/scan-api.port';
import { HttpRetryPolicy } from '../policies/http-retry.policy';
import { throwIfAborted } from '../policies/abort';
import { ErrorTranslator } from '../error-translator';
import { decodeWith, parseJson } from '../codecs/decode-result';
import { JobHandle } from '../../domain/value-objects/job-handle.vo';
import { MalformedResponseError } from '../../domain/errors/scan-client.errors';

const optionalEndpoint = z
  .string()
  .min(1)
  .nullish()
  .transform((value) => value ?? undefined);

/**
 * Upload acceptance envelope. `sseUrl` and `statusUrl` are the names older
 * servers use for the two endpoints.
 */
export const UploadEnvelopeSchema = z.object({
  success: z.boolean(),
  data: z
    .object({
      jobId: z.string().min(1),
      streamEndpoint: optionalEndpoint,
      sseUrl: optionalEndpoint,
      authToken: optionalEndpoint,
      statusEndpoint: optionalEndpoint,
      statusUrl: optionalEndpoint,
    })
    .transform(({ streamEndpoint, sseUrl, statusEndpoint, statusUrl, ...rest }) => ({
      ...rest,
      streamEndpoint: streamEndpoint ?? sseUrl,
      statusEndpoint: statusEndpoint ?? statusUrl,
    }))
    .refine((data) => data.streamEndpoint !== undefined, {
      message: 'Required',
      path: ['streamEndpoint'],
    }),
});

/**
 * Submit Scan Use Case
 * Uploads an image and turns the acceptance envelope into a {@link JobHandle}.
 */
@Injectable()
export class SubmitScanUseCase implements SubmitScanPort {
  private readonly logger = new Logger(SubmitScanUseCase.name);
  private readonly baseUrl: string;
  private readonly defaultDeviceId: string;

  constructor(
    @Inject(SCAN_API_PORT) private readonly scanApi: ScanApiPort,
    private readonly retryPolicy: HttpRetryPolicy,
    configService: ConfigService<AppConfig>,
  ) {
    const scanApiConfig = configService.getOrThrow('scanApi', { infer: true });
    this.baseUrl = scanApiConfig.baseUrl;
    this.defaultDeviceId = scanApiConfig.deviceId;
  }

  async execute(command: SubmitScanCommand): Promise<JobHandle> {
    const deviceId = command.deviceId ?? this.defaultDeviceId;
    throwIfAborted(command.signal);

    this.logger.log(`Uploading scan (${command.image.length} bytes) for device ${deviceId}`);

    const handle = await this.retryPolicy.execute(
      'Scan upload',
      async () => {
        const response = await this.scanApi.uploadScan({
          image: command.image,
          deviceId,
          signal: command.signal,
        });
        return this.toJobHandle(response, deviceId);
      },
      command.signal,
    );

    this.logger.log(`Scan accepted as job ${handle.jobId}`);
    return handle;
  }

  private toJobHandle(response: ApiResponse, deviceId: string): JobHandle {
    const { statusCode, body, headers } = response;
    if (statusCode < 200 || statusCode >= 300) {
      throw ErrorTranslator.translate(statusCode, body, headers);
    }

    const json = parseJson(body);
    if (!json.ok) {
      throw new MalformedResponseError(`Upload response: ${json.failure.reason}`, statusCode);
    }

    const envelope = decodeWith(UploadEnvelopeSchema, json.value);
    if (!envelope.ok) {
      throw new MalformedResponseError(`Upload response: ${envelope.failure.reason}`, statusCode);
    }
    if (!envelope.value.success) {
      throw new MalformedResponseError('Upload response reported success: false', statusCode);
    }

    const { jobId, streamEndpoint, statusEndpoint, authToken } = envelope.value.data;
    if (streamEndpoint === undefined) {
      throw new MalformedResponseError('Upload response: data.streamEndpoint: Required', statusCode);
    }

    return JobHandle.create({
      jobId,
      streamEndpoint: this.resolveEndpoint(streamEndpoint, statusCode),
      statusEndpoint:
        statusEndpoint === undefined ? undefined : this.resolveEndpoint(statusEndpoint, statusCode),
      authToken,
      deviceId,
    });
  }

  private resolveEndpoint(endpoint: string, statusCode: number): URL {
    try {
      return new URL(endpoint, this.baseUrl);
    } catch {
      throw new MalformedResponseError(`Upload response: invalid endpoint "${endpoint}"`, statusCode);
    }
  }
}
