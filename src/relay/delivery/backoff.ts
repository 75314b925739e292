export interface RetryPolicy {
  /** Retries allowed after the first attempt */
  maxRetries: number;
  initialBackoff: number;
  maxBackoff: number;
}

/**
 * Wait before the given retry (1-based): `initialBackoff` doubled per retry,
 * capped at `maxBackoff`.
 */
export function computeBackoff(retry: number, policy: Pick<RetryPolicy, 'initialBackoff' | 'maxBackoff'>): number {
  if (retry < 1) {
    return 0;
  }
  const exponent = Math.min(retry - 1, 52);
  return Math.min(policy.initialBackoff * 2 ** exponent, policy.maxBackoff);
}

/**
 * Every wait a run takes if all attempts fail.
 */
export function backoffSchedule(policy: RetryPolicy): number[] {
  return Array.from({ length: policy.maxRetries }, (_, index) => computeBackoff(index + 1, policy));
}
