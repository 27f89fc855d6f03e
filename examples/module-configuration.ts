/**
 * Example of how to configure and register the GcraLimiter module in a NestJS application
 */
import { Controller, Get, Module, Post } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { GcraLimiterModule, RateLimit, RateLimiterService } from '../src';

/**
 * Routes limited through the decorator
 */
@Controller('reports')
export class ReportsController {
  constructor(private readonly rateLimiterService: RateLimiterService) {}

  // 10 requests per second per client IP, with room for 2 more at once
  @Get()
  @RateLimit({ burst: 2, countPerPeriod: 10, periodSeconds: 1 })
  list() {
    return [];
  }

  // Exports are expensive, so they take 5 units of the 'export' policy
  @Post('export')
  @RateLimit({ policy: 'export', cost: 5, keyPrefix: 'reports:' })
  export() {
    return { queued: true };
  }

  @Get('quota')
  async quota() {
    return this.rateLimiterService.peek({
      key: 'reports:global',
      burst: 100,
      countPerPeriod: 1000,
      periodSeconds: 3600,
    });
  }
}

/**
 * Example module using static configuration
 */
@Module({
  imports: [
    GcraLimiterModule.forRoot({
      storageAdapter: 'redis',
      storageOptions: {
        redis: {
          host: 'localhost',
          port: 6379,
          keyPrefix: 'my-app:',
        },
      },
      policies: [
        { name: 'export', burst: 9, countPerPeriod: 20, periodSeconds: 60 },
      ],
      // Retry a lost compare-and-set race up to 10 times (default: 5)
      maxRetries: 10,
    }),
  ],
  controllers: [ReportsController],
})
export class StaticConfigLimiterModule {}

/**
 * Example module using async configuration
 */
@Module({
  imports: [
    ConfigModule.forRoot(),
    GcraLimiterModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (...args: unknown[]) => {
        const [configService] = args;
        if (!(configService instanceof ConfigService)) {
          throw new Error('ConfigService is not available');
        }
        return {
          storageAdapter: 'redis',
          storageOptions: {
            redis: {
              url: configService.get<string>('REDIS_URL'),
            },
          },
          clock: 'realtime',
        };
      },
      // The HTTP surface is not exposed by this application
      registerController: false,
    }),
  ],
  controllers: [ReportsController],
})
export class AsyncConfigLimiterModule {}

/**
 * Example module for development and tests, keeping buckets in memory
 */
@Module({
  imports: [
    GcraLimiterModule.forRoot({
      storageAdapter: 'memory',
      sweepIntervalMs: 30_000,
    }),
  ],
  controllers: [ReportsController],
})
export class InMemoryLimiterModule {}
