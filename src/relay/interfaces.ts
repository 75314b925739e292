import type { RetryPolicy } from './delivery/backoff';

export const RETRY_POLICY = Symbol('RETRY_POLICY');

export type { RetryPolicy };
