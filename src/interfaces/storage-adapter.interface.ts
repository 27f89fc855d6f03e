import { TimeUnit } from '../utils/time-units';

/**
 * Interface for storage adapters that persist bucket state.
 *
 * A bucket is a single theoretical arrival time (nanoseconds) stored under
 * its key with an expiry. Once the expiry passes the key must read as absent.
 */
export interface IStateStorageAdapter {
  /**
   * Unit the store expresses expiries in. The limiter converts the
   * nanosecond ttl to this unit before calling compareAndSet.
   */
  readonly expiryUnit: TimeUnit;

  /**
   * Initialize the storage adapter
   */
  initialize(): Promise<void>;

  /**
   * Get the stored arrival time of a bucket
   * @param key The bucket key
   * @returns The arrival time, or null if the bucket is absent or expired
   * @throws CorruptedStateError if the stored value is not a timestamp
   * @throws KeyTypeConflictError if the key holds unrelated data
   */
  getArrival(key: string): Promise<bigint | null>;

  /**
   * Atomically replace the arrival time of a bucket, but only if it still
   * holds `expected`
   * @param key The bucket key
   * @param expected Value the decision was based on, null for an absent bucket
   * @param arrival New arrival time
   * @param expiry Time to live in `expiryUnit`; zero removes the bucket
   * @returns false if another writer changed the bucket first
   */
  compareAndSet(
    key: string,
    expected: bigint | null,
    arrival: bigint,
    expiry: bigint,
  ): Promise<boolean>;

  /**
   * Delete a bucket
   * @param key The bucket key
   */
  deleteBucket(key: string): Promise<boolean>;

  /**
   * Evict expired buckets, for stores that do not expire keys on their own
   * @returns Number of buckets removed
   */
  sweepExpired?(): Promise<number>;
}
