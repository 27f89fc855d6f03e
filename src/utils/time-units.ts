export type TimeUnit = 'ns' | 'us' | 'ms' | 's';

export const NANOS_PER_SECOND = 1_000_000_000n;

export const INT64_MAX = 9_223_372_036_854_775_807n;
export const INT64_MIN = -9_223_372_036_854_775_808n;

const NANOS_PER_UNIT: Record<TimeUnit, bigint> = {
  ns: 1n,
  us: 1_000n,
  ms: 1_000_000n,
  s: NANOS_PER_SECOND,
};

/**
 * Convert a non-negative nanosecond duration to whole units, truncating
 * toward zero. Reported seconds and store expiries both go through here.
 */
export function fromNanos(nanos: bigint, unit: TimeUnit): bigint {
  if (nanos < 0n) {
    throw new RangeError(`Cannot convert negative duration ${nanos}ns`);
  }
  return nanos / NANOS_PER_UNIT[unit];
}

/**
 * Scale a duration expressed in `unit` back to nanoseconds
 */
export function toNanos(value: bigint, unit: TimeUnit): bigint {
  return value * NANOS_PER_UNIT[unit];
}

/**
 * Expiry to hand a store for a nanosecond ttl. Truncates like fromNanos, but
 * a live ttl shorter than one unit still keeps the bucket for one unit; only
 * a ttl of zero asks the store to drop it.
 */
export function toStoreExpiry(ttl: bigint, unit: TimeUnit): bigint {
  if (ttl === 0n) {
    return 0n;
  }
  const expiry = fromNanos(ttl, unit);
  return expiry > 0n ? expiry : 1n;
}

export function isInt64(value: bigint): boolean {
  return value >= INT64_MIN && value <= INT64_MAX;
}
