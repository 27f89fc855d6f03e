import {
  CallHandler,
  ExecutionContext,
  HttpException,
  HttpStatus,
  Injectable,
  Logger,
  NestInterceptor,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { RateLimitOptions } from '../decorators/rate-limit.decorator';
import {
  RateLimitResult,
  RETRY_NOT_APPLICABLE,
} from '../interfaces/rate-limiter.interface';
import { RateLimiterService } from '../services/rate-limiter.service';
import { RATE_LIMIT_KEY } from '../utils/constants';

/**
 * Interceptor that rate limits routes decorated with @RateLimit()
 */
@Injectable()
export class RateLimitInterceptor implements NestInterceptor {
  private readonly logger = new Logger(RateLimitInterceptor.name);

  constructor(private readonly rateLimiterService: RateLimiterService) {}

  async intercept(
    context: ExecutionContext,
    next: CallHandler,
  ): Promise<Observable<unknown>> {
    // Method metadata wins over controller metadata
    const options: RateLimitOptions | undefined =
      Reflect.getMetadata(RATE_LIMIT_KEY, context.getHandler()) ??
      Reflect.getMetadata(RATE_LIMIT_KEY, context.getClass());

    if (!options) {
      return next.handle();
    }

    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();

    const key = `${options.keyPrefix ?? ''}${this.resolveKey(options, request)}`;
    const result = await this.check(options, key);

    response.setHeader('X-RateLimit-Limit', String(result.limit));
    response.setHeader('X-RateLimit-Remaining', String(result.remaining));
    response.setHeader('X-RateLimit-Reset', String(result.ttlSeconds));

    if (result.limited) {
      if (result.retryAfterSeconds !== RETRY_NOT_APPLICABLE) {
        response.setHeader('Retry-After', String(result.retryAfterSeconds));
      }
      this.logger.debug(`Rejected request for key ${key}`);
      throw new HttpException(
        {
          statusCode: HttpStatus.TOO_MANY_REQUESTS,
          message: 'Too Many Requests',
          ...result,
        },
        HttpStatus.TOO_MANY_REQUESTS,
      );
    }

    return next.handle();
  }

  private check(
    options: RateLimitOptions,
    key: string,
  ): Promise<RateLimitResult> {
    if (options.policy !== undefined) {
      return this.rateLimiterService.consume(options.policy, key, options.cost);
    }

    return this.rateLimiterService.limit({
      key,
      burst: options.burst,
      countPerPeriod: options.countPerPeriod,
      periodSeconds: options.periodSeconds,
      cost: options.cost,
    });
  }

  private resolveKey(options: RateLimitOptions, request: Request): string {
    if (options.keyResolver) {
      return options.keyResolver(request);
    }
    return request.ip ?? request.socket?.remoteAddress ?? 'unknown';
  }
}
