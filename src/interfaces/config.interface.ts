import {
  InjectionToken,
  ModuleMetadata,
  OptionalFactoryDependency,
  Type,
} from '@nestjs/common';
import { StorageAdapterType } from '../adapters/types';
import { IStateStorageAdapter } from './storage-adapter.interface';
import { TimeSource } from './time-source.interface';

/**
 * Parameters of a GCRA limit
 */
export interface LimitParameters {
  /**
   * Units that may be admitted at once on top of the steady rate
   */
  burst: number;

  /**
   * Units admitted per period
   */
  countPerPeriod: number;

  /**
   * Length of the period in seconds (fractions allowed)
   */
  periodSeconds: number;

  /**
   * Units this request consumes. 0 inspects the bucket without consuming.
   * @default 1
   */
  cost?: number;
}

/**
 * A single rate limit call
 */
export interface LimitRequest extends LimitParameters {
  /**
   * Bucket key. Requests with the same key share a bucket.
   */
  key: string;

  /**
   * Aborting before the state write leaves the bucket untouched
   */
  signal?: AbortSignal;
}

/**
 * Named limit that can be consumed by name
 */
export interface RateLimitPolicy extends LimitParameters {
  name: string;
}

export type ClockType = 'realtime' | 'monotonic';

/**
 * Configuration for the GcraLimiter module
 */
export interface GcraLimiterConfig {
  /**
   * Name of the storage adapter to use ('memory', 'redis', 'mongo' or 'custom')
   */
  storageAdapter: StorageAdapterType;

  /**
   * Storage adapter specific options
   */
  storageOptions?: {
    /**
     * MongoDB connection string (for mongo adapter)
     */
    mongoUri?: string;

    /**
     * MongoDB collection for buckets (for mongo adapter, defaults to 'gcra_buckets')
     */
    collectionName?: string;

    /**
     * Redis connection options (for redis adapter)
     */
    redis?: {
      host?: string;
      port?: number;
      password?: string;
      url?: string;
      keyPrefix?: string;
    };
  };

  /**
   * An instance of IStateStorageAdapter to use when storageAdapter is 'custom'
   */
  customStorageAdapterInstance?: IStateStorageAdapter;

  /**
   * Clock used for decisions. Falls back to the GCRA_CLOCK environment
   * variable, then to 'realtime'.
   */
  clock?: ClockType;

  /**
   * Custom time source, takes precedence over `clock`
   */
  timeSource?: TimeSource;

  /**
   * Policies registered at startup
   */
  policies?: RateLimitPolicy[];

  /**
   * How many times a read-decide-write cycle is retried after losing a
   * compare-and-set race
   * @default 5
   */
  maxRetries?: number;

  /**
   * Interval in milliseconds at which expired buckets are swept from stores
   * that do not expire keys themselves
   * @default 60000
   */
  sweepIntervalMs?: number;

  /**
   * Register the HTTP controller
   * @default true
   */
  registerController?: boolean;
}

/**
 * Interface for async config factory
 */
export interface GcraLimiterConfigFactory {
  createGcraLimiterConfig(): Promise<GcraLimiterConfig> | GcraLimiterConfig;
}

/**
 * Options for async module configuration
 */
export interface GcraLimiterAsyncConfig
  extends Pick<ModuleMetadata, 'imports'> {
  /**
   * Existing provider implementing the config factory interface
   */
  useExisting?: Type<GcraLimiterConfigFactory>;

  /**
   * Class that implements config factory interface
   */
  useClass?: Type<GcraLimiterConfigFactory>;

  /**
   * Factory function for config
   */
  useFactory?(
    ...args: unknown[]
  ): Promise<GcraLimiterConfig> | GcraLimiterConfig;

  /**
   * Dependencies to inject into factory function
   */
  inject?: Array<InjectionToken | OptionalFactoryDependency>;

  /**
   * Register the HTTP controller. Needed up front because controllers are
   * fixed before the async config resolves.
   * @default true
   */
  registerController?: boolean;
}
