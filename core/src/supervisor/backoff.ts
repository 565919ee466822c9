import { BackoffPolicy } from '../types';

/** Delay before the given 1-based attempt: `initial * multiplier^(attempt-1)`, capped. */
export function backoffDelay(policy: BackoffPolicy, attempt: number): number {
  const exponent = Math.max(1, attempt) - 1;
  return Math.min(policy.initialDelayMs * Math.pow(policy.multiplier, exponent), policy.maxDelayMs);
}
