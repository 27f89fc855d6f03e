/**
 * Reported in place of a retry delay when the requested cost can never fit
 * in the bucket, or when the request was not limited
 */
export const RETRY_NOT_APPLICABLE = -1;

/**
 * Verdict for a single rate limit call
 */
export interface RateLimitResult {
  /**
   * True when the request was denied
   */
  limited: boolean;

  /**
   * Maximum number of units the bucket can hold (burst + 1)
   */
  limit: number;

  /**
   * Units still available right now, between 0 and limit
   */
  remaining: number;

  /**
   * Whole seconds to wait before the same request can pass,
   * or RETRY_NOT_APPLICABLE
   */
  retryAfterSeconds: number;

  /**
   * Whole seconds until the bucket is fully idle again
   */
  ttlSeconds: number;
}

/**
 * New bucket state the caller must persist
 */
export interface PersistInstruction {
  /**
   * Theoretical arrival time in nanoseconds
   */
  arrival: bigint;

  /**
   * Nanoseconds until the bucket is idle, used as the store expiry
   */
  ttl: bigint;
}

export interface GcraOutcome {
  decision: RateLimitResult;
  persist: PersistInstruction | null;
}

/**
 * The five-value reply: limited (0/1), limit, remaining, retry after, ttl
 */
export type RateLimitReply = [number, number, number, number, number];
