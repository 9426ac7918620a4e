import { setTimeout as delay } from 'timers/promises';

/**
 * Waits for `ms` milliseconds unless the signal aborts first. Resolves to
 * false when the wait was cut short.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return false;
  }
  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (error) {
    if (signal?.aborted) {
      return false;
    }
    throw error;
  }
}
