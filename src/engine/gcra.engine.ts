import {
  GcraOutcome,
  RETRY_NOT_APPLICABLE,
} from '../interfaces/rate-limiter.interface';
import { RateLimiterConfig } from '../models/rate-limiter-config.model';
import { fromNanos } from '../utils/time-units';

/**
 * Decide whether a request passes a GCRA limit.
 *
 * Pure and total over configs built by {@link RateLimiterConfig.create}. The
 * caller must also have checked `config.assertArrivalInRange(max(now,
 * storedArrival))`.
 *
 * @param storedArrival Persisted theoretical arrival time; null or 0 is a fresh bucket
 * @param config Validated limit parameters, including the cost
 * @param now Current instant in nanoseconds
 * @returns The verdict and, unless the request was limited, the state to persist
 */
export function decide(
  storedArrival: bigint | null,
  config: RateLimiterConfig,
  now: bigint,
): GcraOutcome {
  const { emissionInterval, tolerance, increment, limit } = config;

  const arrival =
    storedArrival !== null && storedArrival !== 0n ? storedArrival : now;

  const candidate = (now > arrival ? now : arrival) + increment;
  const allowAt = candidate - tolerance;
  const diff = now - allowAt;

  let limited: boolean;
  let ttl: bigint;
  let retryAfterSeconds = RETRY_NOT_APPLICABLE;

  if (diff < 0n) {
    limited = true;
    // A stale arrival meeting a cost larger than the tolerance.
    ttl = arrival > now ? arrival - now : 0n;
    if (increment <= tolerance) {
      retryAfterSeconds = Number(fromNanos(-diff, 's'));
    }
  } else {
    limited = false;
    ttl = candidate - now;
  }

  const headroom = tolerance - ttl;
  const remaining =
    headroom > -emissionInterval ? headroom / emissionInterval : 0n;

  return {
    decision: {
      limited,
      limit,
      remaining: Number(remaining),
      retryAfterSeconds,
      ttlSeconds: Number(fromNanos(ttl, 's')),
    },
    persist: limited ? null : { arrival: candidate, ttl },
  };
}
