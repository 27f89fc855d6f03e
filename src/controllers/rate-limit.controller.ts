import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpException,
  HttpStatus,
  Logger,
  Param,
  Post,
  Query,
} from '@nestjs/common';
import {
  CorruptedStateError,
  InvalidConfigurationError,
  KeyTypeConflictError,
  StateContentionError,
} from '../errors/rate-limiter.errors';
import { RateLimitResult } from '../interfaces/rate-limiter.interface';
import { RateLimiterService } from '../services/rate-limiter.service';

/**
 * Limit parameters as they arrive over HTTP, either as JSON numbers or as
 * query-string text
 */
export interface LimitRequestBody {
  burst?: unknown;
  countPerPeriod?: unknown;
  periodSeconds?: unknown;
  cost?: unknown;
}

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?\d+(\.\d+)?$/;

function readNumber(value: unknown, pattern: RegExp, message: string): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && pattern.test(value)) {
    return Number(value);
  }
  throw new InvalidConfigurationError(message);
}

/**
 * HTTP surface of the rate limiter. Validation of ranges is left to the
 * service; this layer only turns transport values into numbers and errors
 * into status codes.
 */
@Controller('rate-limit')
export class RateLimitController {
  private readonly logger = new Logger(RateLimitController.name);

  constructor(private readonly rateLimiterService: RateLimiterService) {}

  /**
   * Consume `cost` units from the bucket
   */
  @Post(':key')
  @HttpCode(HttpStatus.OK)
  async limit(
    @Param('key') key: string,
    @Body() body: LimitRequestBody,
  ): Promise<RateLimitResult> {
    return this.handle(key, () =>
      this.rateLimiterService.limit({
        key,
        ...this.readParameters(body),
        cost:
          body.cost === undefined
            ? 1
            : readNumber(body.cost, INTEGER_PATTERN, 'invalid cost'),
      }),
    );
  }

  /**
   * Report the bucket without consuming from it
   */
  @Get(':key')
  async peek(
    @Param('key') key: string,
    @Query() query: LimitRequestBody,
  ): Promise<RateLimitResult> {
    return this.handle(key, () =>
      this.rateLimiterService.peek({ key, ...this.readParameters(query) }),
    );
  }

  @Delete(':key')
  async reset(@Param('key') key: string): Promise<{ deleted: boolean }> {
    return this.handle(key, async () => ({
      deleted: await this.rateLimiterService.reset(key),
    }));
  }

  private readParameters(body: LimitRequestBody) {
    return {
      burst: readNumber(body.burst, INTEGER_PATTERN, 'invalid burst'),
      countPerPeriod: readNumber(
        body.countPerPeriod,
        INTEGER_PATTERN,
        'invalid count_per_period',
      ),
      periodSeconds: readNumber(
        body.periodSeconds,
        DECIMAL_PATTERN,
        'invalid period_in_sec',
      ),
    };
  }

  private async handle<T>(key: string, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      throw this.toHttpException(key, error);
    }
  }

  private toHttpException(key: string, error: unknown): HttpException {
    if (error instanceof HttpException) {
      return error;
    }
    if (error instanceof InvalidConfigurationError) {
      return new HttpException(error.message, HttpStatus.BAD_REQUEST);
    }
    if (
      error instanceof KeyTypeConflictError ||
      error instanceof CorruptedStateError
    ) {
      return new HttpException(error.message, HttpStatus.CONFLICT);
    }
    if (error instanceof StateContentionError) {
      return new HttpException(error.message, HttpStatus.SERVICE_UNAVAILABLE);
    }

    const failure = error instanceof Error ? error : new Error(String(error));
    this.logger.error(
      `Error handling rate limit for ${key}: ${failure.message}`,
      failure.stack,
    );
    return new HttpException(
      'Internal rate limiter error',
      HttpStatus.INTERNAL_SERVER_ERROR,
    );
  }
}
