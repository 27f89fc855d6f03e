import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { IStateStorageAdapter } from '../interfaces/storage-adapter.interface';
import { TimeSource } from '../interfaces/time-source.interface';
import { GCRA_LIMITER_TIME_SOURCE } from '../utils/constants';
import { RealtimeClock } from '../utils/time-source';
import { TimeUnit } from '../utils/time-units';

interface MemoryBucket {
  arrival: bigint;
  expiresAt: bigint;
}

/**
 * In-memory storage adapter for GcraLimiter.
 * Buckets live in this process only, which suits development, tests and
 * single-instance deployments.
 */
@Injectable()
export class MemoryStorageAdapter implements IStateStorageAdapter {
  readonly expiryUnit: TimeUnit = 'ns';
  private readonly logger = new Logger(MemoryStorageAdapter.name);
  private readonly buckets: Map<string, MemoryBucket> = new Map();

  constructor(
    @Optional()
    @Inject(GCRA_LIMITER_TIME_SOURCE)
    private readonly timeSource: TimeSource = new RealtimeClock(),
  ) {}

  /**
   * Initialize the storage adapter
   */
  async initialize(): Promise<void> {
    // Nothing to do for memory adapter
  }

  /**
   * Get the stored arrival time of a bucket
   * @param key The bucket key
   */
  async getArrival(key: string): Promise<bigint | null> {
    return this.readLive(key);
  }

  /**
   * Replace the arrival time of a bucket if it still holds `expected`
   */
  async compareAndSet(
    key: string,
    expected: bigint | null,
    arrival: bigint,
    expiry: bigint,
  ): Promise<boolean> {
    if (this.readLive(key) !== expected) {
      return false;
    }

    if (expiry <= 0n) {
      this.buckets.delete(key);
    } else {
      this.buckets.set(key, {
        arrival,
        expiresAt: this.timeSource.now() + expiry,
      });
    }
    return true;
  }

  /**
   * Delete a bucket
   * @param key The bucket key
   */
  async deleteBucket(key: string): Promise<boolean> {
    return this.buckets.delete(key);
  }

  /**
   * Drop every bucket whose expiry has passed
   */
  async sweepExpired(): Promise<number> {
    const now = this.timeSource.now();
    let removed = 0;

    for (const [key, bucket] of this.buckets) {
      if (bucket.expiresAt <= now) {
        this.buckets.delete(key);
        removed++;
      }
    }

    if (removed > 0) {
      this.logger.debug(`Swept ${removed} expired buckets`);
    }
    return removed;
  }

  private readLive(key: string): bigint | null {
    const bucket = this.buckets.get(key);
    if (!bucket) {
      return null;
    }

    if (bucket.expiresAt <= this.timeSource.now()) {
      this.buckets.delete(key);
      return null;
    }
    return bucket.arrival;
  }
}
