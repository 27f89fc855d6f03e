import { InvalidConfigurationError } from '../errors/rate-limiter.errors';
import { LimitRequest } from '../interfaces/config.interface';
import {
  RateLimitReply,
  RateLimitResult,
} from '../interfaces/rate-limiter.interface';

const INTEGER_PATTERN = /^[+-]?\d+$/;

function parseInteger(value: string, message: string): number {
  if (!INTEGER_PATTERN.test(value)) {
    throw new InvalidConfigurationError(message);
  }

  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) {
    throw new InvalidConfigurationError(message);
  }
  return parsed;
}

function parseCost(value: string): number {
  const cost = parseInteger(value, 'invalid amount');
  if (cost < 0) {
    throw new InvalidConfigurationError('invalid amount');
  }
  return cost;
}

/**
 * Parse a command-style argument list:
 * `<key> <burst> <count per period> <period> [<cost>]`.
 * Range checks happen later, in RateLimiterConfig.
 *
 * @example
 * ```typescript
 * parseLimitArguments(['user:42', '15', '30', '60', '1']);
 * ```
 */
export function parseLimitArguments(argv: readonly string[]): LimitRequest {
  if (argv.length < 4 || argv.length > 5) {
    throw new InvalidConfigurationError('wrong number of arguments');
  }

  const [key, burst, countPerPeriod, periodSeconds, cost] = argv;

  return {
    key,
    burst: parseInteger(burst, 'invalid burst'),
    countPerPeriod: parseInteger(countPerPeriod, 'invalid count_per_period'),
    periodSeconds: parseInteger(periodSeconds, 'invalid period_in_sec'),
    cost: cost === undefined ? 1 : parseCost(cost),
  };
}

/**
 * Encode a result as the five-value reply
 */
export function toReply(result: RateLimitResult): RateLimitReply {
  return [
    result.limited ? 1 : 0,
    result.limit,
    result.remaining,
    result.retryAfterSeconds,
    result.ttlSeconds,
  ];
}
