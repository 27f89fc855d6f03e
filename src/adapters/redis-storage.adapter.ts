import { Logger, OnModuleDestroy } from '@nestjs/common';
import { Redis } from 'ioredis';
import {
  KeyTypeConflictError,
  RateLimiterError,
} from '../errors/rate-limiter.errors';
import { IStateStorageAdapter } from '../interfaces/storage-adapter.interface';
import { parseStoredArrival, serializeArrival } from '../utils/stored-arrival';
import { TimeUnit } from '../utils/time-units';

/**
 * Compare the bucket with ARGV[1] ('' = absent) and, on a match, store
 * ARGV[2] with a PX expiry of ARGV[3], or delete the key when it is 0.
 * Runs atomically inside Redis.
 */
export const COMPARE_AND_SET_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if current == false then
  current = ''
end
if current ~= ARGV[1] then
  return 0
end
if tonumber(ARGV[3]) > 0 then
  redis.call('SET', KEYS[1], ARGV[2], 'PX', ARGV[3])
else
  redis.call('DEL', KEYS[1])
end
return 1
`;

/**
 * The part of an ioredis client the adapter talks to
 */
export type RedisBucketClient = Pick<
  Redis,
  'ping' | 'get' | 'eval' | 'del' | 'quit'
>;

export interface RedisStorageOptions {
  host?: string;
  port?: number;
  password?: string;
  url?: string;
  keyPrefix?: string;
  client?: RedisBucketClient;
}

/**
 * Redis storage adapter for GcraLimiter.
 * Each bucket is a string key holding the arrival time in decimal, expired
 * by Redis itself.
 */
export class RedisStorageAdapter
  implements IStateStorageAdapter, OnModuleDestroy
{
  readonly expiryUnit: TimeUnit = 'ms';
  private readonly logger = new Logger(RedisStorageAdapter.name);
  private readonly keyPrefix: string;
  private readonly client: RedisBucketClient;
  private readonly ownsClient: boolean;

  constructor(options: RedisStorageOptions) {
    this.keyPrefix = options.keyPrefix || 'gcra:';
    this.ownsClient = !options.client;

    if (options.client) {
      this.client = options.client;
    } else if (options.url) {
      this.client = new Redis(options.url);
    } else {
      this.client = new Redis({
        host: options.host || 'localhost',
        port: options.port || 6379,
        password: options.password,
      });
    }
  }

  /**
   * Generate a Redis key for a bucket
   */
  private getBucketKey(key: string): string {
    return `${this.keyPrefix}bucket:${key}`;
  }

  /**
   * Initialize the Redis storage adapter
   */
  async initialize(): Promise<void> {
    this.logger.log(
      `Initialized RedisStorageAdapter with prefix: ${this.keyPrefix}`,
    );

    // Test connection
    await this.client.ping();
  }

  async onModuleDestroy(): Promise<void> {
    if (this.ownsClient) {
      await this.client.quit();
    }
  }

  /**
   * Get the stored arrival time of a bucket
   * @param key The bucket key
   */
  async getArrival(key: string): Promise<bigint | null> {
    let raw: string | null;
    try {
      raw = await this.client.get(this.getBucketKey(key));
    } catch (error) {
      throw this.translateError(key, error, 'reading');
    }

    if (raw === null) {
      return null;
    }
    return parseStoredArrival(key, raw);
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
    try {
      const result = await this.client.eval(
        COMPARE_AND_SET_SCRIPT,
        1,
        this.getBucketKey(key),
        expected === null ? '' : serializeArrival(expected),
        serializeArrival(arrival),
        expiry.toString(10),
      );
      return result === 1;
    } catch (error) {
      throw this.translateError(key, error, 'writing');
    }
  }

  /**
   * Delete a bucket
   * @param key The bucket key
   */
  async deleteBucket(key: string): Promise<boolean> {
    try {
      const result = await this.client.del(this.getBucketKey(key));
      return result > 0;
    } catch (error) {
      throw this.translateError(key, error, 'deleting');
    }
  }

  private translateError(
    key: string,
    error: unknown,
    action: string,
  ): Error {
    if (error instanceof RateLimiterError) {
      return error;
    }
    if (error instanceof Error && error.message.includes('WRONGTYPE')) {
      return new KeyTypeConflictError(key);
    }

    const failure = error instanceof Error ? error : new Error(String(error));
    this.logger.error(
      `Error ${action} bucket ${key}: ${failure.message}`,
      failure.stack,
    );
    return failure;
  }
}
