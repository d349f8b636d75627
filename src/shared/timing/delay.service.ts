import { Injectable } from '@nestjs/common';
import { setTimeout as delay } from 'node:timers/promises';
import type { DelayPort } from '../../application/ports/output/delay.port';

/**
 * Timer-backed implementation of {@link DelayPort}. A cancelled wait rejects
 * with the signal's abort reason.
 */
@Injectable()
export class DelayService implements DelayPort {
  async wait(ms: number, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    if (ms <= 0) {
      return;
    }

    try {
      await delay(ms, undefined, { signal });
    } catch (error) {
      if (signal?.aborted) {
        throw signal.reason;
      }
      throw error;
    }
  }
}
