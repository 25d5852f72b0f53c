import { setTimeout as delay } from 'timers/promises';

/**
 * Waits `ms` milliseconds. Rejects with an AbortError as soon as `signal` fires.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) {
    signal?.throwIfAborted();
    return;
  }
  await delay(ms, undefined, { signal });
}

/**
 * Uniformly distributed integer in [min, max]
 */
export function randomBetween(min: number, max: number): number {
  if (max <= min) return min;
  return min + Math.floor(Math.random() * (max - min + 1));
}

export function isAbortError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === 'AbortError' || error.name === 'CanceledError')
  );
}
