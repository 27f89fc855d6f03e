import {
  fromNanos,
  INT64_MAX,
  INT64_MIN,
  isInt64,
  TimeUnit,
  toNanos,
  toStoreExpiry,
} from '../time-units';

describe('time units', () => {
  describe('fromNanos', () => {
    it('should truncate toward zero', () => {
      expect(fromNanos(1_999_999_999n, 's')).toBe(1n);
      expect(fromNanos(1_500_000n, 'ms')).toBe(1n);
      expect(fromNanos(999n, 'us')).toBe(0n);
      expect(fromNanos(42n, 'ns')).toBe(42n);
    });

    it('should reject negative durations', () => {
      expect(() => fromNanos(-1n, 'ms')).toThrow(RangeError);
    });
  });

  it('should never round a duration up when converting back', () => {
    const units: TimeUnit[] = ['ns', 'us', 'ms', 's'];
    const durations = [0n, 1n, 999_999n, 1_000_000n, 2_345_678_901n];

    for (const unit of units) {
      for (const nanos of durations) {
        const roundTrip = toNanos(fromNanos(nanos, unit), unit);
        expect(roundTrip).toBeLessThanOrEqual(nanos);
        expect(nanos - roundTrip).toBeLessThan(toNanos(1n, unit));
      }
    }
  });

  describe('toStoreExpiry', () => {
    it('should truncate like fromNanos', () => {
      expect(toStoreExpiry(1_999_999n, 'ms')).toBe(1n);
      expect(toStoreExpiry(2_500_000_000n, 's')).toBe(2n);
      expect(toStoreExpiry(42n, 'ns')).toBe(42n);
    });

    it('should keep a live ttl shorter than one unit for one unit', () => {
      expect(toStoreExpiry(100_000n, 'ms')).toBe(1n);
      expect(toStoreExpiry(1n, 's')).toBe(1n);
    });

    it('should ask for removal only for a zero ttl', () => {
      expect(toStoreExpiry(0n, 'ms')).toBe(0n);
    });

    it('should report the same seconds as the store expiry', () => {
      const units: TimeUnit[] = ['ns', 'us', 'ms', 's'];
      const ttls = [1_000_000_000n, 1_500_000_000n, 59_999_999_999n];

      for (const unit of units) {
        for (const ttl of ttls) {
          const stored = toNanos(toStoreExpiry(ttl, unit), unit);
          expect(fromNanos(stored, 's')).toBe(fromNanos(ttl, 's'));
        }
      }
    });

    it('should report zero seconds for sub-second ttls in finer units', () => {
      const units: TimeUnit[] = ['ns', 'us', 'ms'];

      for (const unit of units) {
        for (const ttl of [1n, 100_000n, 999_999_999n]) {
          const stored = toNanos(toStoreExpiry(ttl, unit), unit);
          expect(fromNanos(stored, 's')).toBe(0n);
        }
      }
    });
  });

  it('should bound signed 64-bit values', () => {
    expect(isInt64(INT64_MAX)).toBe(true);
    expect(isInt64(INT64_MIN)).toBe(true);
    expect(isInt64(INT64_MAX + 1n)).toBe(false);
    expect(isInt64(INT64_MIN - 1n)).toBe(false);
  });
});
