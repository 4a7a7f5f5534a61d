export const CLOCK_PORT = 'ClockPort';

/**
 * Clock Port (Driven Port)
 * Time source and sleep used by the poll loop and the submission backoff
 */
export interface ClockPort {
  /**
   * Current time in epoch milliseconds
   */
  now(): number;

  /**
   * Wait `ms` milliseconds. Resolves early, without throwing, once `signal`
   * is aborted.
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}
