import 'reflect-metadata';

// Module
export { GcraLimiterModule, validateConfig } from './gcra-limiter.module';

// Services
export { RateLimiterService } from './services/rate-limiter.service';

// Engine
export { decide } from './engine/gcra.engine';
export { RateLimiterConfig } from './models/rate-limiter-config.model';

// Interfaces
export {
  GcraLimiterConfig,
  GcraLimiterAsyncConfig,
  GcraLimiterConfigFactory,
  LimitParameters,
  LimitRequest,
  RateLimitPolicy,
  ClockType,
} from './interfaces/config.interface';
export {
  RateLimitResult,
  RateLimitReply,
  GcraOutcome,
  PersistInstruction,
  RETRY_NOT_APPLICABLE,
} from './interfaces/rate-limiter.interface';
export { IStateStorageAdapter } from './interfaces/storage-adapter.interface';
export { TimeSource } from './interfaces/time-source.interface';

// Errors
export {
  RateLimiterError,
  InvalidConfigurationError,
  CorruptedStateError,
  KeyTypeConflictError,
  StateContentionError,
  LimitAbortedError,
} from './errors/rate-limiter.errors';

// Decorators
export { RateLimit, RateLimitOptions } from './decorators/rate-limit.decorator';
export { RateLimitInterceptor } from './interceptors/rate-limit.interceptor';
export { RateLimitController } from './controllers/rate-limit.controller';

// Time
export { RealtimeClock, MonotonicClock, ManualClock } from './utils/time-source';
export {
  TimeUnit,
  fromNanos,
  toNanos,
  NANOS_PER_SECOND,
} from './utils/time-units';
export { parseLimitArguments, toReply } from './utils/limit-arguments';

// Storage Adapters (for extending)
export { MongoStorageAdapter } from './adapters/mongo-storage.adapter';
export { RedisStorageAdapter } from './adapters/redis-storage.adapter';
export { MemoryStorageAdapter } from './adapters/memory-storage.adapter';
export { StorageAdapterType } from './adapters/types';
