import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../../config/configuration';
import { DELAY_PORT } from '../ports/output/delay.port';
import type { DelayPort } from '../ports/output/delay.port';
import {
  RawHttpError,
  ScanClientError,
  StructuredApiError,
  TransportError,
  isScanClientError,
} from '../../domain/errors/scan-client.errors';
import { abortableWait } from './abort';

export interface HttpRetryOptions {
  maxServerRetries: number;
  retryBaseDelayMs: number;
  rateLimitDefaultDelayMs: number;
}

export const DEFAULT_HTTP_RETRY_OPTIONS: HttpRetryOptions = {
  maxServerRetries: 3,
  retryBaseDelayMs: 1000,
  rateLimitDefaultDelayMs: 2000,
};

export interface RetryBudget {
  serverRetries: number;
  rateLimitRetried: boolean;
}

/**
 * HTTP Retry Policy
 * Status-class retry rules for one-shot calls (upload, results fetch):
 * - 429: exactly one retry after the resolved delay
 * - 5xx and transport failures: up to `maxServerRetries` retries with
 *   exponential backoff
 * - anything else: surfaced immediately
 *
 * Counters live in each `execute` call, never on the instance.
 */
@Injectable()
export class HttpRetryPolicy {
  private readonly logger = new Logger(HttpRetryPolicy.name);
  private readonly options: HttpRetryOptions;

  constructor(
    @Inject(DELAY_PORT) private readonly delay: DelayPort,
    configService: ConfigService<AppConfig>,
  ) {
    this.options = configService.get('retry', { infer: true }) ?? DEFAULT_HTTP_RETRY_OPTIONS;
  }

  async execute<T>(
    operation: string,
    attempt: () => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    const budget: RetryBudget = { serverRetries: 0, rateLimitRetried: false };

    for (;;) {
      try {
        return await attempt();
      } catch (error) {
        if (!isScanClientError(error)) {
          throw error;
        }

        const delayMs = this.nextDelay(error, budget);
        if (delayMs === undefined) {
          throw error;
        }

        this.logger.warn(
          `${operation} failed (${error.code}), retrying in ${delayMs}ms ` +
            `[server retries: ${budget.serverRetries}/${this.options.maxServerRetries}]`,
        );
        await abortableWait(this.delay, delayMs, signal);
      }
    }
  }

  /**
   * Returns the delay before the next attempt and consumes budget, or
   * `undefined` when the error must be surfaced.
   */
  nextDelay(error: ScanClientError, budget: RetryBudget): number | undefined {
    const retryAfterMs =
      error instanceof StructuredApiError || error instanceof RawHttpError
        ? error.retryAfterMs
        : undefined;

    if (error.statusCode === 429) {
      if (budget.rateLimitRetried) {
        return undefined;
      }
      budget.rateLimitRetried = true;
      return retryAfterMs ?? this.options.rateLimitDefaultDelayMs;
    }

    const isServerError = error.statusCode !== undefined && error.statusCode >= 500;
    if (isServerError || error instanceof TransportError) {
      if (budget.serverRetries >= this.options.maxServerRetries) {
        return undefined;
      }
      const backoff = this.options.retryBaseDelayMs * 2 ** budget.serverRetries;
      budget.serverRetries += 1;
      return retryAfterMs ?? backoff;
    }

    return undefined;
  }
}
