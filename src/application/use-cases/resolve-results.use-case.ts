import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { AppConfig } from '../../config/configuration';
import { ResolveResultsCommand, ResolveResultsPort } from '../ports/input/resolve-results.port';
import { SCAN_API_PORT } from '../ports/output/scan-api.port';
import type { ApiResponse, ScanApiPort } from '../ports/output/scan-api.port';
import { HttpRetryPolicy } from '../policies/http-retry.policy';
import { BookResultSchema } from '../codecs/event.codec';
import { decodeWith, parseJson } from '../codecs/decode-result';
import { ErrorTranslator } from '../error-translator';
import { BookResult } from '../../domain/value-objects/book-result.vo';
import { JobHandle } from '../../domain/value-objects/job-handle.vo';
import { MalformedResponseError } from '../../domain/errors/scan-client.errors';

export const ResultsEnvelopeSchema = z.object({
  success: z.boolean(),
  data: z.object({
    jobId: z.string(),
    status: z.string(),
    results: z.array(BookResultSchema),
  }),
});

/**
 * Resolve Results Use Case
 * Fetches the compact (`format=lite`) result list of a completed job whose
 * `completed` event carried no inline items.
 */
@Injectable()
export class ResolveResultsUseCase implements ResolveResultsPort {
  private readonly logger = new Logger(ResolveResultsUseCase.name);
  private readonly baseUrl: string;

  constructor(
    @Inject(SCAN_API_PORT) private readonly scanApi: ScanApiPort,
    private readonly retryPolicy: HttpRetryPolicy,
    configService: ConfigService<AppConfig>,
  ) {
    this.baseUrl = configService.getOrThrow('scanApi', { infer: true }).baseUrl;
  }

  async execute(command: ResolveResultsCommand): Promise<BookResult[]> {
    const url = this.resultsUrl(command.resultsEndpoint);
    this.logger.debug(`Fetching results for job ${command.handle.jobId} from ${url.pathname}`);

    const results = await this.retryPolicy.execute(
      'Results fetch',
      async () => {
        const response = await this.scanApi.fetchResults(url, {
          headers: JobHandle.authHeaders(command.handle),
          signal: command.signal,
        });
        return this.parseResults(response);
      },
      command.signal,
    );

    this.logger.log(`Fetched ${results.length} result(s) for job ${command.handle.jobId}`);
    return results;
  }

  private resultsUrl(endpoint: string): URL {
    let url: URL;
    try {
      url = new URL(endpoint, this.baseUrl);
    } catch {
      throw new MalformedResponseError(`Invalid results endpoint "${endpoint}"`);
    }
    url.searchParams.set('format', 'lite');
    return url;
  }

  private parseResults(response: ApiResponse): BookResult[] {
    const { statusCode, body, headers } = response;
    if (statusCode < 200 || statusCode >= 300) {
      throw ErrorTranslator.translate(statusCode, body, headers);
    }

    const json = parseJson(body);
    if (!json.ok) {
      throw new MalformedResponseError(`Results response: ${json.failure.reason}`, statusCode);
    }
    const envelope = decodeWith(ResultsEnvelopeSchema, json.value);
    if (!envelope.ok) {
      throw new MalformedResponseError(`Results response: ${envelope.failure.reason}`, statusCode);
    }
    if (!envelope.value.success) {
      throw new MalformedResponseError('Results response reported success: false', statusCode);
    }
    return envelope.value.data.results;
  }
}
