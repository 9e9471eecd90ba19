/**
 * Small seams shared across services so time never has to pass for real in tests.
 */

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/** Resolves after `ms`, rejects with the signal's reason if aborted first. */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RunOptions {
  signal?: AbortSignal;
}
