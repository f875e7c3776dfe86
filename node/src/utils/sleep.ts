import { setTimeout as delay } from 'node:timers/promises';
import { CancelledError } from './errors';

/** Waits `ms`, rejecting with CancelledError as soon as `signal` aborts. */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) throw new CancelledError();
  if (ms <= 0) return;
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (signal?.aborted) throw new CancelledError();
    throw err;
  }
}

export type Sleep = typeof sleep;
