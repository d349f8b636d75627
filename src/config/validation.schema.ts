import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

export const envSchema = z.object({
  // Core
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  // Scan API
  SCAN_API_BASE_URL: z.string().url(),
  SCAN_DEVICE_ID: z.string().min(1).optional(),
  SCAN_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  // Upload retry policy
  UPLOAD_MAX_SERVER_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  UPLOAD_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  RATE_LIMIT_DEFAULT_DELAY_MS: z.coerce.number().int().min(0).default(2000),

  // Event stream
  STREAM_MAX_RECONNECT_ATTEMPTS: z.coerce.number().int().min(0).max(50).default(5),
  STREAM_RECONNECT_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  STREAM_RECONNECT_MAX_DELAY_MS: z.coerce.number().int().min(0).default(30000),
  STREAM_IDLE_TIMEOUT_MS: z.coerce.number().int().positive().default(90000),
  STREAM_EMIT_PINGS: booleanFlag,

  // Bulk scanning
  MAX_CONCURRENT_STREAMS: z.coerce.number().int().min(1).max(50).default(5),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}
