import { Logger } from '@nestjs/common';
import { Connection, Model, Schema } from 'mongoose';
import {
  KeyTypeConflictError,
  RateLimiterError,
} from '../errors/rate-limiter.errors';
import { IStateStorageAdapter } from '../interfaces/storage-adapter.interface';
import { parseStoredArrival, serializeArrival } from '../utils/stored-arrival';
import { TimeUnit } from '../utils/time-units';

export interface IBucketDocument {
  key: string;
  arrival: string;
  expireAt: Date;
}

/**
 * Shape of a bucket document as it may actually be found in the collection
 */
interface StoredBucketDocument {
  key: string;
  arrival?: unknown;
  expireAt?: unknown;
}

const DEFAULT_COLLECTION_NAME = 'gcra_buckets';
const BUCKET_MODEL_NAME = 'GcraBucket';
const DUPLICATE_KEY_ERROR_CODE = 11000;

/**
 * MongoDB schema for bucket documents
 */
export const BucketSchema = new Schema<IBucketDocument>(
  {
    key: { type: String, required: true, unique: true, index: true },
    arrival: { type: String, required: true },
    expireAt: { type: Date, required: true },
  },
  {
    timestamps: true,
    collection: DEFAULT_COLLECTION_NAME,
  },
);

// Lets MongoDB remove expired buckets in the background; reads still check
// expireAt because the TTL monitor only runs once a minute.
BucketSchema.index({ expireAt: 1 }, { expireAfterSeconds: 0 });

function isDuplicateKeyError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === DUPLICATE_KEY_ERROR_CODE
  );
}

/**
 * The part of a mongoose connection the adapter needs to register its model
 */
export type BucketConnection = Pick<Connection, 'models' | 'model'>;

/**
 * MongoDB storage adapter for GcraLimiter
 */
export class MongoStorageAdapter implements IStateStorageAdapter {
  readonly expiryUnit: TimeUnit = 'ms';
  private readonly logger = new Logger(MongoStorageAdapter.name);
  private readonly bucketModel: Model<IBucketDocument> | null = null;

  constructor(
    private readonly connection?: BucketConnection,
    private readonly customCollectionName?: string,
  ) {
    this.logger.debug(
      `MongoStorageAdapter constructor called with: connection=${!!this
        .connection}, collectionName=${this.customCollectionName}`,
    );

    if (!this.connection) {
      this.logger.warn('Cannot initialize bucketModel without connection');
      return;
    }

    if (this.connection.models[BUCKET_MODEL_NAME]) {
      this.logger.debug('Bucket model already exists on connection, reusing it');
      this.bucketModel = this.connection.models[BUCKET_MODEL_NAME];
    } else {
      this.bucketModel = this.connection.model<IBucketDocument>(
        BUCKET_MODEL_NAME,
        BucketSchema,
        this.customCollectionName || DEFAULT_COLLECTION_NAME,
      );
    }
  }

  /**
   * Build the collection indexes
   */
  async initialize(): Promise<void> {
    await this.getModel().init();
    this.logger.log('Initialized MongoStorageAdapter');
  }

  /**
   * Get the stored arrival time of a bucket
   * @param key The bucket key
   */
  async getArrival(key: string): Promise<bigint | null> {
    const model = this.getModel();

    let doc: StoredBucketDocument | null;
    try {
      doc = await model.findOne({ key }).lean<StoredBucketDocument>().exec();
    } catch (error) {
      throw this.logFailure(key, error, 'reading');
    }

    if (!doc) {
      return null;
    }
    if (doc.arrival === undefined || !(doc.expireAt instanceof Date)) {
      throw new KeyTypeConflictError(key);
    }
    if (doc.expireAt.getTime() <= Date.now()) {
      return null;
    }
    return parseStoredArrival(key, doc.arrival);
  }

  /**
   * Replace the arrival time of a bucket if it still holds `expected`.
   * Expired documents count as absent.
   */
  async compareAndSet(
    key: string,
    expected: bigint | null,
    arrival: bigint,
    expiry: bigint,
  ): Promise<boolean> {
    const model = this.getModel();
    const now = new Date();
    const update = {
      $set: {
        arrival: serializeArrival(arrival),
        expireAt: new Date(now.getTime() + Number(expiry)),
      },
    };

    try {
      if (expected === null) {
        await model
          .updateOne({ key, expireAt: { $lte: now } }, update, {
            upsert: true,
          })
          .exec();
        return true;
      }

      const result = await model
        .updateOne(
          {
            key,
            arrival: serializeArrival(expected),
            expireAt: { $gt: now },
          },
          update,
        )
        .exec();
      return result.matchedCount > 0;
    } catch (error) {
      // A live bucket made the upsert insert a second document for the key.
      if (isDuplicateKeyError(error)) {
        return false;
      }
      throw this.logFailure(key, error, 'writing');
    }
  }

  /**
   * Delete a bucket
   * @param key The bucket key
   */
  async deleteBucket(key: string): Promise<boolean> {
    try {
      const result = await this.getModel().deleteOne({ key }).exec();
      return result.deletedCount > 0;
    } catch (error) {
      throw this.logFailure(key, error, 'deleting');
    }
  }

  private getModel(): Model<IBucketDocument> {
    if (!this.bucketModel) {
      throw new Error('Bucket model not initialized');
    }
    return this.bucketModel;
  }

  private logFailure(key: string, error: unknown, action: string): Error {
    if (error instanceof RateLimiterError) {
      return error;
    }

    const failure = error instanceof Error ? error : new Error(String(error));
    this.logger.error(failure, {
      message: `Error ${action} bucket ${key}: ${failure.message}`,
    });
    return failure;
  }
}
