/**
 * @fileoverview Injectable time sources.
 *
 * Components that wait or measure elapsed time take a `Clock` and a `Sleep`
 * so tests can drive them without real delays.
 *
 * @module @minutely/contracts/timing
 */

import { setTimeout as delay } from 'node:timers/promises';

/** Milliseconds since the epoch. */
export type Clock = () => number;

/** Resolves after roughly `ms` milliseconds. */
export type Sleep = (ms: number) => Promise<void>;

export const systemClock: Clock = () => Date.now();

export const sleep: Sleep = async (ms) => {
  if (ms > 0) {
    await delay(ms);
  }
};
