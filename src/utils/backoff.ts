/**
 * Backoff & Sleep Utilities
 *
 * Loop-level delay calculation and an abortable sleep.
 */

import { TIMING } from '../config/constants.js';

/**
 * Sleeps for `ms`, or until the signal aborts, whichever comes first.
 * Never rejects on abort: callers check `signal.aborted` afterwards.
 */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Backoff after a loop-level failure: `min(cap, interval * 2)` seconds.
 */
export function computeBackoffSeconds(
  intervalSeconds: number,
  maxBackoffSeconds: number = TIMING.MAX_BACKOFF_SECONDS
): number {
  return Math.min(maxBackoffSeconds, intervalSeconds * TIMING.BACKOFF_MULTIPLIER);
}

export const sleep: SleepFn = (ms, signal) =>
  new Promise<void>(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }

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
