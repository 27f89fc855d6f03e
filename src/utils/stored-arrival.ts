import { CorruptedStateError } from '../errors/rate-limiter.errors';
import { isInt64 } from './time-units';

// Canonical decimal only, so the stored text matches its re-serialized form
const INTEGER_PATTERN = /^(0|-?[1-9]\d*)$/;

/**
 * Parse an arrival timestamp persisted as a decimal string
 * @param key Bucket key, used for the error report
 * @param raw Value read from the store
 */
export function parseStoredArrival(key: string, raw: unknown): bigint {
  if (typeof raw !== 'string' || !INTEGER_PATTERN.test(raw)) {
    throw new CorruptedStateError(key, raw);
  }

  const arrival = BigInt(raw);
  if (!isInt64(arrival)) {
    throw new CorruptedStateError(key, raw);
  }

  return arrival;
}

export function serializeArrival(arrival: bigint): string {
  return arrival.toString(10);
}
