/**
 * @stackwright/shared - Abortable sleep
 */

import { CancelledError } from '../errors/index.js';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Resolve after `ms`, or reject with CancelledError as soon as `signal` aborts.
 */
export const sleep: Sleep = (ms, signal) =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
