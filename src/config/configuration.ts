/**
 * Application Configuration
 *
 * Loads and validates environment variables and exposes them as a typed,
 * read-only `AppConfig`. Every scan job shares this object; nothing in it is
 * mutated after bootstrap.
 *
 * ## Usage:
 * ```typescript
 * constructor(private configService: ConfigService<AppConfig>) {}
 *
 * const stream = this.configService.get('stream', { infer: true });
 * ```
 *
 * @module Configuration
 */

import { v4 as uuidv4 } from 'uuid';
import { validateEnv, EnvConfig } from './validation.schema';

/**
 * Application configuration interface.
 *
 * Grouped by the component that consumes each setting.
 */
export interface AppConfig {
  nodeEnv: string;
  logLevel: string;
  scanApi: {
    baseUrl: string;
    deviceId: string;
    requestTimeoutMs: number;
  };
  /**
   * Retry policy applied to upload and results-fetch calls.
   *
   * ### maxServerRetries (Environment: UPLOAD_MAX_SERVER_RETRIES)
   * - Retries after a 5xx or a transport failure; 3 means 4 tries in total
   * - Delays grow as `retryBaseDelayMs * 2^attempt` (1s, 2s, 4s by default)
   *
   * ### rateLimitDefaultDelayMs (Environment: RATE_LIMIT_DEFAULT_DELAY_MS)
   * - Used for the single 429 retry when neither `retryAfterMs` in the body
   *   nor a `Retry-After` header is present
   */
  retry: {
    maxServerRetries: number;
    retryBaseDelayMs: number;
    rateLimitDefaultDelayMs: number;
  };
  /**
   * Event stream reconnection policy.
   *
   * ### idleTimeoutMs (Environment: STREAM_IDLE_TIMEOUT_MS)
   * - Window without any bytes (pings included) after which the connection is
   *   treated as dropped
   * - Keep it at 2-3x the server's 30s ping cadence; the default is 90s
   *
   * ### maxReconnectAttempts (Environment: STREAM_MAX_RECONNECT_ATTEMPTS)
   * - Consecutive reconnects allowed without receiving a record; the counter
   *   resets whenever a record arrives
   */
  stream: {
    maxReconnectAttempts: number;
    reconnectBaseDelayMs: number;
    reconnectMaxDelayMs: number;
    idleTimeoutMs: number;
    emitPings: boolean;
  };
  session: {
    maxConcurrentStreams: number;
  };
}

export function buildConfig(env: EnvConfig): AppConfig {
  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    scanApi: {
      baseUrl: env.SCAN_API_BASE_URL,
      deviceId: env.SCAN_DEVICE_ID ?? uuidv4(),
      requestTimeoutMs: env.SCAN_REQUEST_TIMEOUT_MS,
    },
    retry: {
      maxServerRetries: env.UPLOAD_MAX_SERVER_RETRIES,
      retryBaseDelayMs: env.UPLOAD_RETRY_BASE_DELAY_MS,
      rateLimitDefaultDelayMs: env.RATE_LIMIT_DEFAULT_DELAY_MS,
    },
    stream: {
      maxReconnectAttempts: env.STREAM_MAX_RECONNECT_ATTEMPTS,
      reconnectBaseDelayMs: env.STREAM_RECONNECT_BASE_DELAY_MS,
      reconnectMaxDelayMs: env.STREAM_RECONNECT_MAX_DELAY_MS,
      idleTimeoutMs: env.STREAM_IDLE_TIMEOUT_MS,
      emitPings: env.STREAM_EMIT_PINGS,
    },
    session: {
      maxConcurrentStreams: env.MAX_CONCURRENT_STREAMS,
    },
  };
}

export default (): AppConfig => buildConfig(validateEnv(process.env));
