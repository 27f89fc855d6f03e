import { Provider } from '@nestjs/common';
import { getConnectionToken } from '@nestjs/mongoose';
import { Connection } from 'mongoose';
import {
  GCRA_LIMITER_CONFIG,
  GCRA_LIMITER_STORAGE_ADAPTER,
  GCRA_LIMITER_TIME_SOURCE,
} from './constants';
import { GcraLimiterConfig } from '../interfaces/config.interface';
import { IStateStorageAdapter } from '../interfaces/storage-adapter.interface';
import { TimeSource } from '../interfaces/time-source.interface';
import { MongoStorageAdapter } from '../adapters/mongo-storage.adapter';
import { RedisStorageAdapter } from '../adapters/redis-storage.adapter';
import { MemoryStorageAdapter } from '../adapters/memory-storage.adapter';
import {
  CUSTOM_STORAGE_ADAPTER,
  MEMORY_STORAGE_ADAPTER,
  MONGO_STORAGE_ADAPTER,
  REDIS_STORAGE_ADAPTER,
} from '../adapters/types';

/**
 * Build and initialize the storage adapter named by the configuration
 */
export async function createStorageAdapter(
  config: GcraLimiterConfig,
  timeSource: TimeSource,
  connection?: Connection,
): Promise<IStateStorageAdapter> {
  const { storageAdapter, storageOptions, customStorageAdapterInstance } =
    config;
  let adapter: IStateStorageAdapter;

  // Create the appropriate storage adapter based on configuration
  switch (storageAdapter) {
    case MONGO_STORAGE_ADAPTER:
      adapter = new MongoStorageAdapter(
        connection,
        storageOptions?.collectionName,
      );
      break;
    case REDIS_STORAGE_ADAPTER:
      adapter = new RedisStorageAdapter({
        host: storageOptions?.redis?.host,
        port: storageOptions?.redis?.port,
        password: storageOptions?.redis?.password,
        url: storageOptions?.redis?.url,
        keyPrefix: storageOptions?.redis?.keyPrefix,
      });
      break;
    case MEMORY_STORAGE_ADAPTER:
      adapter = new MemoryStorageAdapter(timeSource);
      break;
    case CUSTOM_STORAGE_ADAPTER:
      if (!customStorageAdapterInstance) {
        throw new Error(
          'Storage adapter type is "custom" but no customStorageAdapterInstance was provided in GcraLimiterConfig.',
        );
      }
      adapter = customStorageAdapterInstance;
      break;
    default:
      throw new Error(`Unsupported storage adapter: ${storageAdapter}`);
  }

  await adapter.initialize();
  return adapter;
}

/**
 * Creates the appropriate storage adapter provider based on the configuration
 *
 * @returns Provider for the storage adapter
 */
export function createStorageAdapterProvider(): Provider {
  return {
    provide: GCRA_LIMITER_STORAGE_ADAPTER,
    useFactory: (
      config: GcraLimiterConfig,
      timeSource: TimeSource,
      connection?: Connection,
    ): Promise<IStateStorageAdapter> =>
      createStorageAdapter(config, timeSource, connection),
    inject: [
      GCRA_LIMITER_CONFIG,
      GCRA_LIMITER_TIME_SOURCE,
      { token: getConnectionToken(), optional: true },
    ],
  };
}
