/**
 * Example of how to create a custom storage adapter for GcraLimiter.
 * Any store that can compare-and-set a single value per key will do.
 */
import { Logger, Module } from '@nestjs/common';
import { GcraLimiterModule, IStateStorageAdapter, TimeUnit } from '../src';

interface Entry {
  arrival: bigint;
  expiresAt: number;
}

/**
 * Storage adapter keeping buckets in a plain Map with millisecond expiries.
 * Replace the Map with your database client.
 */
export class MapStorageAdapter implements IStateStorageAdapter {
  readonly expiryUnit: TimeUnit = 'ms';
  private readonly logger = new Logger(MapStorageAdapter.name);
  private readonly entries = new Map<string, Entry>();

  async initialize(): Promise<void> {
    this.logger.log('Initializing map storage adapter');
  }

  async getArrival(key: string): Promise<bigint | null> {
    const entry = this.entries.get(key);
    if (!entry || entry.expiresAt <= Date.now()) {
      return null;
    }
    return entry.arrival;
  }

  async compareAndSet(
    key: string,
    expected: bigint | null,
    arrival: bigint,
    expiry: bigint,
  ): Promise<boolean> {
    if ((await this.getArrival(key)) !== expected) {
      return false;
    }

    if (expiry <= 0n) {
      this.entries.delete(key);
    } else {
      this.entries.set(key, {
        arrival,
        expiresAt: Date.now() + Number(expiry),
      });
    }
    return true;
  }

  async deleteBucket(key: string): Promise<boolean> {
    return this.entries.delete(key);
  }
}

/**
 * Register the custom adapter with the module
 */
@Module({
  imports: [
    GcraLimiterModule.forRoot({
      storageAdapter: 'custom',
      customStorageAdapterInstance: new MapStorageAdapter(),
    }),
  ],
})
export class CustomStorageLimiterModule {}
