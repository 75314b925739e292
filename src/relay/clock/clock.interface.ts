export const CLOCK = Symbol('CLOCK');

/**
 * Time source for the relay. Swapped for a manual clock in tests so backoff
 * can be asserted without waiting.
 */
export interface Clock {
  /** Milliseconds since the epoch */
  now(): number;

  /**
   * Resolve after `ms` milliseconds.
   *
   * @throws {Error} Rejects early when `signal` aborts
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}
