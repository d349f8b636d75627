export const DELAY_PORT = 'DelayPort';

/**
 * Delay Port (Driven Port)
 * Every backoff and rate-limit wait goes through this port so tests can
 * record the requested delays instead of sleeping.
 */
export interface DelayPort {
  /**
   * Resolves after `ms` milliseconds. Rejects as soon as `signal` aborts.
   */
  wait(ms: number, signal?: AbortSignal): Promise<void>;
}
