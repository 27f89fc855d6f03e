import { InvalidConfigurationError } from '../errors/rate-limiter.errors';
import { LimitParameters } from '../interfaces/config.interface';
import { INT64_MAX, isInt64 } from '../utils/time-units';

const NANOS_PER_SECOND = 1e9;
const TWO_POW_63 = 2 ** 63;

/**
 * Validated parameters of one rate limit call together with the quantities
 * the GCRA engine derives from them. All durations are nanoseconds.
 *
 * Construct through {@link RateLimiterConfig.create}; the engine assumes every
 * instance satisfies burst >= 0, countPerPeriod > 0, periodSeconds > 0,
 * cost >= 0 and that none of the derived values overflow a signed 64-bit
 * integer.
 */
export class RateLimiterConfig {
  /**
   * Nominal time between two single-unit admissions
   */
  readonly emissionInterval: bigint;

  /**
   * Largest backlog the bucket may build up, emissionInterval * (burst + 1)
   */
  readonly tolerance: bigint;

  /**
   * Time this request adds to the backlog, emissionInterval * cost
   */
  readonly increment: bigint;

  /**
   * burst + 1
   */
  readonly limit: number;

  private constructor(
    readonly burst: number,
    readonly countPerPeriod: number,
    readonly periodSeconds: number,
    readonly cost: number,
  ) {
    this.emissionInterval = deriveEmissionInterval(
      periodSeconds,
      countPerPeriod,
    );
    this.tolerance = this.emissionInterval * (BigInt(burst) + 1n);
    this.increment = this.emissionInterval * BigInt(cost);
    this.limit = burst + 1;

    if (!isInt64(this.tolerance)) {
      throw new InvalidConfigurationError(
        'burst is too large for the configured rate: tolerance overflows 64 bits',
      );
    }
    if (!isInt64(this.increment)) {
      throw new InvalidConfigurationError(
        'cost is too large for the configured rate: increment overflows 64 bits',
      );
    }
  }

  /**
   * Validate limit parameters and derive the GCRA quantities
   * @throws InvalidConfigurationError
   */
  static create(params: LimitParameters): RateLimiterConfig {
    const { burst, countPerPeriod, periodSeconds, cost = 1 } = params;

    if (!Number.isSafeInteger(burst) || burst < 0) {
      throw new InvalidConfigurationError('invalid burst');
    }
    if (!Number.isSafeInteger(countPerPeriod) || countPerPeriod <= 0) {
      throw new InvalidConfigurationError('invalid count_per_period');
    }
    if (!Number.isFinite(periodSeconds) || periodSeconds <= 0) {
      throw new InvalidConfigurationError('invalid period_in_sec');
    }
    if (!Number.isSafeInteger(cost) || cost < 0) {
      throw new InvalidConfigurationError('invalid cost');
    }

    return new RateLimiterConfig(burst, countPerPeriod, periodSeconds, cost);
  }

  /**
   * Reject a call whose new arrival time, `baseline + increment`, would not
   * fit in 64 bits
   * @param baseline max(now, stored arrival)
   */
  assertArrivalInRange(baseline: bigint): void {
    if (baseline > INT64_MAX - this.increment) {
      throw new InvalidConfigurationError(
        'cost is too large: the new arrival time overflows 64 bits',
      );
    }
  }
}

function deriveEmissionInterval(
  periodSeconds: number,
  countPerPeriod: number,
): bigint {
  const interval = Math.trunc(
    (periodSeconds * NANOS_PER_SECOND) / countPerPeriod,
  );

  if (!Number.isFinite(interval) || interval >= TWO_POW_63) {
    throw new InvalidConfigurationError(
      'period is too long: emission interval overflows 64 bits',
    );
  }
  if (interval <= 0) {
    throw new InvalidConfigurationError(
      'rate is too high: emission interval is below one nanosecond',
    );
  }

  return BigInt(interval);
}
