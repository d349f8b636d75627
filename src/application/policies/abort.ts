import { JobAbortedError } from '../../domain/errors/scan-client.errors';
import type { DelayPort } from '../ports/output/delay.port';

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new JobAbortedError(signal.reason);
  }
}

/**
 * Waits through the delay port; a cancelled wait surfaces as
 * {@link JobAbortedError}.
 */
export async function abortableWait(
  delay: DelayPort,
  ms: number,
  signal?: AbortSignal,
): Promise<void> {
  throwIfAborted(signal);
  try {
    await delay.wait(ms, signal);
  } catch (error) {
    throwIfAborted(signal);
    throw error;
  }
}
