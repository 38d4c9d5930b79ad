/**
 * @summary Suspension helper shared by the rate limiter and the retry loop.
 */

/**
 * Suspends the caller for a number of milliseconds. Injected wherever the
 * SDK waits so tests can observe waits without spending real time.
 */
export type SleepFn = (ms: number) => Promise<void>;

/**
 * Sleep for a specified duration.
 *
 * @param ms - Duration in milliseconds
 * @returns Promise that resolves after the delay
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}
