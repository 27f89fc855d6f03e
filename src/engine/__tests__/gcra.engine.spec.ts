import { decide } from '../gcra.engine';
import { RateLimiterConfig } from '../../models/rate-limiter-config.model';
import { RETRY_NOT_APPLICABLE } from '../../interfaces/rate-limiter.interface';

const MS = 1_000_000n;
const SECOND = 1_000_000_000n;
const T = 1_000n * SECOND;

describe('decide', () => {
  const tenPerSecond = RateLimiterConfig.create({
    burst: 2,
    countPerPeriod: 10,
    periodSeconds: 1,
  });

  it('should admit a burst and then limit', () => {
    // Arrange
    let stored: bigint | null = null;
    const remaining: number[] = [];

    // Act
    for (let i = 0; i < 3; i++) {
      const { decision, persist } = decide(stored, tenPerSecond, T);
      expect(decision.limited).toBe(false);
      remaining.push(decision.remaining);
      stored = persist?.arrival ?? null;
    }
    const fourth = decide(stored, tenPerSecond, T);

    // Assert
    expect(remaining).toEqual([2, 1, 0]);
    expect(stored).toBe(T + 300n * MS);
    expect(fourth.decision).toEqual({
      limited: true,
      limit: 3,
      remaining: 0,
      retryAfterSeconds: 0,
      ttlSeconds: 0,
    });
    expect(fourth.persist).toBeNull();
  });

  it('should report the new arrival and ttl for an admitted request', () => {
    const { decision, persist } = decide(null, tenPerSecond, T);

    expect(decision).toEqual({
      limited: false,
      limit: 3,
      remaining: 2,
      retryAfterSeconds: RETRY_NOT_APPLICABLE,
      ttlSeconds: 0,
    });
    expect(persist).toEqual({ arrival: T + 100n * MS, ttl: 100n * MS });
  });

  it('should restore capacity as time passes', () => {
    const { decision, persist } = decide(
      T + 300n * MS,
      tenPerSecond,
      T + 350n * MS,
    );

    expect(decision.limited).toBe(false);
    expect(decision.remaining).toBe(2);
    expect(persist).toEqual({
      arrival: T + 450n * MS,
      ttl: 100n * MS,
    });
  });

  it('should treat a stored arrival of 0 as a fresh bucket', () => {
    expect(decide(0n, tenPerSecond, T)).toEqual(
      decide(null, tenPerSecond, T),
    );
  });

  it('should report retry after and ttl in whole seconds', () => {
    // Arrange
    const slow = RateLimiterConfig.create({
      burst: 0,
      countPerPeriod: 1,
      periodSeconds: 10,
    });
    const first = decide(null, slow, T);

    // Act
    const second = decide(
      first.persist?.arrival ?? null,
      slow,
      T + 2_500n * MS,
    );

    // Assert
    expect(first.decision).toEqual({
      limited: false,
      limit: 1,
      remaining: 0,
      retryAfterSeconds: RETRY_NOT_APPLICABLE,
      ttlSeconds: 10,
    });
    expect(second.decision).toEqual({
      limited: true,
      limit: 1,
      remaining: 0,
      retryAfterSeconds: 7,
      ttlSeconds: 7,
    });
  });

  it('should never admit a cost larger than the limit', () => {
    const tooExpensive = RateLimiterConfig.create({
      burst: 2,
      countPerPeriod: 10,
      periodSeconds: 1,
      cost: 5,
    });

    const { decision, persist } = decide(null, tooExpensive, T);

    expect(decision).toEqual({
      limited: true,
      limit: 3,
      remaining: 3,
      retryAfterSeconds: RETRY_NOT_APPLICABLE,
      ttlSeconds: 0,
    });
    expect(persist).toBeNull();
  });

  describe('with cost 0', () => {
    const peek = RateLimiterConfig.create({
      burst: 2,
      countPerPeriod: 10,
      periodSeconds: 1,
      cost: 0,
    });

    it('should report full capacity for a fresh bucket', () => {
      const { decision, persist } = decide(null, peek, T);

      expect(decision.limited).toBe(false);
      expect(decision.remaining).toBe(3);
      expect(persist).toEqual({ arrival: T, ttl: 0n });
    });

    it('should leave a live bucket unchanged', () => {
      const stored = T + 300n * MS;

      const { decision, persist } = decide(stored, peek, T);

      expect(decision.limited).toBe(false);
      expect(decision.remaining).toBe(0);
      expect(persist?.arrival).toBe(stored);
    });
  });

  it('should keep ttl within the tolerance for admitted requests', () => {
    let stored: bigint | null = null;
    let now = T;

    for (let i = 0; i < 50; i++) {
      const { decision, persist } = decide(stored, tenPerSecond, now);
      if (persist) {
        expect(persist.ttl).toBeLessThanOrEqual(tenPerSecond.tolerance);
        stored = persist.arrival;
      }
      expect(decision.remaining).toBeGreaterThanOrEqual(0);
      expect(decision.remaining).toBeLessThanOrEqual(decision.limit);
      now += 37n * MS;
    }
  });

  it.each([
    [{ burst: 2, countPerPeriod: 10, periodSeconds: 1 }],
    [{ burst: 0, countPerPeriod: 1, periodSeconds: 10 }],
    [{ burst: 5, countPerPeriod: 3, periodSeconds: 7 }],
    [{ burst: 0, countPerPeriod: 10_000, periodSeconds: 1 }],
  ])('should admit calls spaced one emission interval apart (%p)', (params) => {
    // Arrange
    const config = RateLimiterConfig.create(params);
    const gaps = [0n, 1n, config.emissionInterval * 2n];
    let stored: bigint | null = null;
    let now = T;

    // Act & Assert
    for (let i = 0; i < 60; i++) {
      const { decision, persist } = decide(stored, config, now);
      expect(decision.limited).toBe(false);
      stored = persist?.arrival ?? null;
      now += config.emissionInterval + gaps[i % gaps.length];
    }
  });

  it('should give the same verdicts with zero-cost checks interleaved', () => {
    // Arrange
    const peek = RateLimiterConfig.create({
      burst: 2,
      countPerPeriod: 10,
      periodSeconds: 1,
      cost: 0,
    });
    const offsets = [0n, 0n, 10n, 20n, 20n, 150n, 160n, 400n, 410n, 420n];
    const plain: boolean[] = [];
    const peeked: boolean[] = [];
    let plainStored: bigint | null = null;
    let peekedStored: bigint | null = null;

    // Act
    for (const offset of offsets) {
      const now = T + offset * MS;

      const real = decide(plainStored, tenPerSecond, now);
      plain.push(real.decision.limited);
      plainStored = real.persist?.arrival ?? plainStored;

      const before = decide(peekedStored, peek, now);
      expect(before.decision.limited).toBe(false);
      peekedStored = before.persist?.arrival ?? peekedStored;

      const withPeeks = decide(peekedStored, tenPerSecond, now);
      peeked.push(withPeeks.decision.limited);
      peekedStored = withPeeks.persist?.arrival ?? peekedStored;

      const after = decide(peekedStored, peek, now);
      expect(after.decision.limited).toBe(false);
      peekedStored = after.persist?.arrival ?? peekedStored;
    }

    // Assert
    expect(peeked).toEqual(plain);
    expect(plain).toEqual([
      false,
      false,
      false,
      true,
      true,
      false,
      true,
      false,
      false,
      false,
    ]);
  });
});
