import {
  DynamicModule,
  Global,
  Module,
  ModuleMetadata,
  Provider,
  Type,
} from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { MongooseModule } from '@nestjs/mongoose';
import { ScheduleModule } from '@nestjs/schedule';
import { RateLimitController } from './controllers/rate-limit.controller';
import { RateLimitInterceptor } from './interceptors/rate-limit.interceptor';
import {
  GcraLimiterAsyncConfig,
  GcraLimiterConfig,
  GcraLimiterConfigFactory,
} from './interfaces/config.interface';
import { RateLimiterConfig } from './models/rate-limiter-config.model';
import { RateLimiterService } from './services/rate-limiter.service';
import {
  GCRA_LIMITER_CONFIG,
  GCRA_LIMITER_STORAGE_ADAPTER,
  GCRA_LIMITER_TIME_SOURCE,
} from './utils/constants';
import { createStorageAdapterProvider } from './utils/storage-adapter.factory';
import { createTimeSourceProvider } from './utils/time-source.factory';
import {
  CUSTOM_STORAGE_ADAPTER,
  MEMORY_STORAGE_ADAPTER,
  MONGO_STORAGE_ADAPTER,
  REDIS_STORAGE_ADAPTER,
} from './adapters/types';

const STORAGE_ADAPTERS: readonly string[] = [
  MONGO_STORAGE_ADAPTER,
  REDIS_STORAGE_ADAPTER,
  MEMORY_STORAGE_ADAPTER,
  CUSTOM_STORAGE_ADAPTER,
];

export function validateConfig(config: GcraLimiterConfig): void {
  // Validate storage adapter
  if (!config.storageAdapter) {
    throw new Error('GcraLimiter config must include a storageAdapter');
  }

  if (!STORAGE_ADAPTERS.includes(config.storageAdapter)) {
    throw new Error(`Unsupported storage adapter: ${config.storageAdapter}`);
  }

  if (
    config.storageAdapter === REDIS_STORAGE_ADAPTER &&
    !config.storageOptions?.redis?.url &&
    !config.storageOptions?.redis?.host
  ) {
    throw new Error(
      'Redis storage adapter requires either url or host in storageOptions.redis',
    );
  }

  if (
    config.storageAdapter === CUSTOM_STORAGE_ADAPTER &&
    !config.customStorageAdapterInstance
  ) {
    throw new Error(
      'Custom storage adapter requires customStorageAdapterInstance',
    );
  }

  if (
    config.clock !== undefined &&
    config.clock !== 'realtime' &&
    config.clock !== 'monotonic'
  ) {
    throw new Error(`Unsupported clock: ${config.clock}`);
  }

  if (
    config.maxRetries !== undefined &&
    (!Number.isInteger(config.maxRetries) || config.maxRetries < 0)
  ) {
    throw new Error('maxRetries must be a non-negative integer');
  }

  if (
    config.sweepIntervalMs !== undefined &&
    (!Number.isInteger(config.sweepIntervalMs) || config.sweepIntervalMs <= 0)
  ) {
    throw new Error('sweepIntervalMs must be a positive integer');
  }

  // Validate policies
  const names = new Set<string>();
  for (const policy of config.policies ?? []) {
    if (!policy.name) {
      throw new Error('Each rate limit policy must have a name');
    }
    if (names.has(policy.name)) {
      throw new Error(`Duplicate rate limit policy '${policy.name}'`);
    }
    names.add(policy.name);
    RateLimiterConfig.create(policy);
  }
}

function controllersFor(registerController?: boolean): Type<unknown>[] {
  return registerController === false ? [] : [RateLimitController];
}

const EXPORTS = [
  RateLimiterService,
  RateLimitInterceptor,
  GCRA_LIMITER_CONFIG,
  GCRA_LIMITER_STORAGE_ADAPTER,
  GCRA_LIMITER_TIME_SOURCE,
];

/**
 * Main module for GcraLimiter. Use forRoot or forRootAsync to configure and register.
 */
@Global()
@Module({})
export class GcraLimiterModule {
  /**
   * Register the GcraLimiter module with static configuration
   *
   * @param config Configuration for the GcraLimiter module
   * @returns Dynamic module
   *
   * @example
   * ```typescript
   * @Module({
   *   imports: [
   *     GcraLimiterModule.forRoot({
   *       storageAdapter: 'redis',
   *       storageOptions: {
   *         redis: { host: 'localhost', port: 6379 },
   *       },
   *       policies: [
   *         { name: 'login', burst: 4, countPerPeriod: 5, periodSeconds: 60 },
   *       ],
   *     }),
   *   ],
   * })
   * export class AppModule {}
   * ```
   */
  static forRoot(config: GcraLimiterConfig): DynamicModule {
    validateConfig(config);

    if (
      config.storageAdapter === MONGO_STORAGE_ADAPTER &&
      !config.storageOptions?.mongoUri
    ) {
      throw new Error('Mongo storage adapter requires storageOptions.mongoUri');
    }

    const configProvider: Provider = {
      provide: GCRA_LIMITER_CONFIG,
      useValue: config,
    };

    const imports: NonNullable<ModuleMetadata['imports']> = [
      ConfigModule,
      ScheduleModule.forRoot(),
    ];

    // Only add MongoDB if the storage adapter is 'mongo'
    if (
      config.storageAdapter === MONGO_STORAGE_ADAPTER &&
      config.storageOptions?.mongoUri
    ) {
      imports.push(MongooseModule.forRoot(config.storageOptions.mongoUri));
    }

    return {
      module: GcraLimiterModule,
      global: true,
      imports,
      controllers: controllersFor(config.registerController),
      providers: [
        configProvider,
        createTimeSourceProvider(),
        createStorageAdapterProvider(),
        RateLimiterService,
        RateLimitInterceptor,
      ],
      exports: EXPORTS,
    };
  }

  /**
   * Register the GcraLimiter module with async configuration. A mongo
   * storage adapter needs MongooseModule imported by the application.
   *
   * @returns Dynamic module
   *
   * @example
   * ```typescript
   * @Module({
   *   imports: [
   *     ConfigModule.forRoot(),
   *     GcraLimiterModule.forRootAsync({
   *       imports: [ConfigModule],
   *       inject: [ConfigService],
   *       useFactory: (configService: ConfigService) => ({
   *         storageAdapter: 'redis',
   *         storageOptions: {
   *           redis: { url: configService.get('REDIS_URL') },
   *         },
   *       }),
   *     }),
   *   ],
   * })
   * export class AppModule {}
   * ```
   */
  static forRootAsync(asyncConfig: GcraLimiterAsyncConfig): DynamicModule {
    const providers: Provider[] = [
      GcraLimiterModule.createAsyncConfigProvider(asyncConfig),
      createTimeSourceProvider(),
      createStorageAdapterProvider(),
      RateLimiterService,
      RateLimitInterceptor,
    ];

    if (asyncConfig.useClass) {
      providers.push(asyncConfig.useClass);
    }

    return {
      module: GcraLimiterModule,
      global: true,
      imports: [
        ConfigModule,
        ScheduleModule.forRoot(),
        ...(asyncConfig.imports ?? []),
      ],
      controllers: controllersFor(asyncConfig.registerController),
      providers,
      exports: EXPORTS,
    };
  }

  /**
   * Create async config provider
   * @internal
   */
  private static createAsyncConfigProvider(
    options: GcraLimiterAsyncConfig,
  ): Provider {
    const { useFactory } = options;
    if (useFactory) {
      return {
        provide: GCRA_LIMITER_CONFIG,
        useFactory: async (...args: unknown[]) => {
          const config = await useFactory(...args);
          validateConfig(config);
          return config;
        },
        inject: options.inject ?? [],
      };
    }

    const factoryClass = options.useClass ?? options.useExisting;
    if (factoryClass) {
      return {
        provide: GCRA_LIMITER_CONFIG,
        useFactory: async (configFactory: GcraLimiterConfigFactory) => {
          const config = await configFactory.createGcraLimiterConfig();
          validateConfig(config);
          return config;
        },
        inject: [factoryClass],
      };
    }

    throw new Error(
      'Invalid GcraLimiterAsyncConfig. Must provide useFactory, useClass, or useExisting.',
    );
  }
}
