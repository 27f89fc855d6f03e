import { Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GcraLimiterConfig } from '../interfaces/config.interface';
import { TimeSource } from '../interfaces/time-source.interface';
import { GCRA_CLOCK_ENV, GCRA_LIMITER_CONFIG, GCRA_LIMITER_TIME_SOURCE } from './constants';
import { MonotonicClock, RealtimeClock } from './time-source';

/**
 * Pick the time source: an explicit instance, then `clock`, then the
 * GCRA_CLOCK environment variable, then the realtime clock
 */
export function createTimeSource(
  config: GcraLimiterConfig,
  configService?: ConfigService,
): TimeSource {
  if (config.timeSource) {
    return config.timeSource;
  }

  const clock =
    config.clock ?? configService?.get<string>(GCRA_CLOCK_ENV) ?? 'realtime';

  switch (clock) {
    case 'realtime':
      return new RealtimeClock();
    case 'monotonic':
      return new MonotonicClock();
    default:
      throw new Error(`Unsupported clock: ${clock}`);
  }
}

export function createTimeSourceProvider(): Provider {
  return {
    provide: GCRA_LIMITER_TIME_SOURCE,
    useFactory: (
      config: GcraLimiterConfig,
      configService?: ConfigService,
    ): TimeSource => createTimeSource(config, configService),
    inject: [GCRA_LIMITER_CONFIG, { token: ConfigService, optional: true }],
  };
}
