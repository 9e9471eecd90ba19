import { setTimeout as delay } from 'node:timers/promises';
import type { Sleep } from '../types/common.js';
import { CancelledError } from '../errors.js';

/** Cancellable sleep. An aborted signal rejects with CancelledError. */
export const sleep: Sleep = async (ms, signal) => {
  throwIfAborted(signal);
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (signal?.aborted) throw new CancelledError('Sleep interrupted by shutdown');
    throw err;
  }
};

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}
