/**
 * Injection token for GcraLimiter configuration
 */
export const GCRA_LIMITER_CONFIG = 'GCRA_LIMITER_CONFIG';

/**
 * Injection token for GcraLimiter storage adapter
 */
export const GCRA_LIMITER_STORAGE_ADAPTER = 'GCRA_LIMITER_STORAGE_ADAPTER';

/**
 * Injection token for the time source used by decisions
 */
export const GCRA_LIMITER_TIME_SOURCE = 'GCRA_LIMITER_TIME_SOURCE';

/**
 * Metadata key for rate limited routes
 */
export const RATE_LIMIT_KEY = 'gcra_limiter:rate_limit';

/**
 * Environment variable selecting the clock when the config does not
 */
export const GCRA_CLOCK_ENV = 'GCRA_CLOCK';

export const DEFAULT_MAX_RETRIES = 5;
export const DEFAULT_SWEEP_INTERVAL_MS = 60_000;
