// src/utils/timeout.ts
import { TimeoutError } from './errors.js';

/**
 * Race an operation against a timer. The timer is cleared once the race
 * settles so no handle outlives the call.
 *
 * @throws {TimeoutError} when `timeoutMs` elapses first.
 */
export async function raceWithTimeout<T>(
  operation: string,
  operationPromise: Promise<T>,
  timeoutMs: number
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operationPromise, timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}
