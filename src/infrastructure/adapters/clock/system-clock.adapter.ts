import { Injectable } from '@nestjs/common';
import { ClockPort } from '../../../application/ports/output/clock.port';

/**
 * System Clock Adapter
 * Wall-clock time and timer-based sleep that wakes up on abort
 */
@Injectable()
export class SystemClockAdapter implements ClockPort {
  now(): number {
    return Date.now();
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      const onAbort = () => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
