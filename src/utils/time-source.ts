import { TimeSource } from '../interfaces/time-source.interface';

const NANOS_PER_MILLI = 1_000_000n;

/**
 * Wall clock time in nanoseconds since the Unix epoch. Resolution is one
 * millisecond (`Date.now()` scaled), so calls within the same millisecond
 * share an instant. Use MonotonicClock where sub-millisecond rates matter
 * and buckets live in one process.
 */
export class RealtimeClock implements TimeSource {
  now(): bigint {
    return BigInt(Date.now()) * NANOS_PER_MILLI;
  }
}

/**
 * Process-local monotonic time from `process.hrtime`
 */
export class MonotonicClock implements TimeSource {
  now(): bigint {
    return process.hrtime.bigint();
  }
}

/**
 * Clock that only moves when told to. Meant for tests and simulations.
 *
 * @example
 * ```typescript
 * const clock = new ManualClock(0n);
 * clock.advance(100_000_000n); // 100ms
 * ```
 */
export class ManualClock implements TimeSource {
  constructor(private current: bigint = 0n) {}

  now(): bigint {
    return this.current;
  }

  set(instant: bigint): void {
    this.current = instant;
  }

  advance(nanos: bigint): void {
    this.current += nanos;
  }
}
