/**
 * Default Scheduler backed by the event loop's timers.
 */

import type { Scheduler } from './types/stream-types';

export class SleepAbortedError extends Error {
  constructor() {
    super('Sleep aborted');
    this.name = 'SleepAbortedError';
  }
}

/**
 * Resolve after `ms`, or reject with SleepAbortedError as soon as the signal
 * aborts. The timer and the abort listener are released on both paths.
 */
export function cancellableSleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal.aborted) {
      reject(new SleepAbortedError());
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new SleepAbortedError());
    };

    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal.addEventListener('abort', onAbort, { once: true });
  });
}

export const timerScheduler: Scheduler = {
  now: () => new Date(),
  sleep: cancellableSleep,
};
