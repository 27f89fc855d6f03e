/**
 * Base class for every error raised by the rate limiter
 */
export class RateLimiterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Limiter parameters are out of range or would overflow 64-bit arithmetic
 */
export class InvalidConfigurationError extends RateLimiterError {}

/**
 * The stored value for a bucket is not a valid arrival timestamp
 */
export class CorruptedStateError extends RateLimiterError {
  constructor(
    public readonly key: string,
    public readonly storedValue: unknown,
  ) {
    super(`invalid stored rater for key '${key}'`);
  }
}

/**
 * The bucket key already holds data of another kind
 */
export class KeyTypeConflictError extends RateLimiterError {
  constructor(public readonly key: string) {
    super(
      `key '${key}' holds data that is not a rate limiter bucket`,
    );
  }
}

/**
 * Every compare-and-set attempt for a bucket lost to a concurrent writer
 */
export class StateContentionError extends RateLimiterError {
  constructor(
    public readonly key: string,
    public readonly attempts: number,
  ) {
    super(
      `gave up on key '${key}' after ${attempts} conflicting write attempts`,
    );
  }
}

/**
 * The caller aborted before the new bucket state was written
 */
export class LimitAbortedError extends RateLimiterError {
  constructor(public readonly key: string) {
    super(`rate limit call for key '${key}' was aborted`);
  }
}
