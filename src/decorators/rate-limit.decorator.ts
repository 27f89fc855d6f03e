import { applyDecorators, SetMetadata, UseInterceptors } from '@nestjs/common';
import { Request } from 'express';
import { RateLimitInterceptor } from '../interceptors/rate-limit.interceptor';
import { LimitParameters } from '../interfaces/config.interface';
import { RATE_LIMIT_KEY } from '../utils/constants';

interface RateLimitKeyOptions {
  /**
   * Prepended to the resolved key, e.g. 'login:'
   */
  keyPrefix?: string;

  /**
   * Derives the bucket key from the request. Defaults to the client IP.
   */
  keyResolver?: (request: Request) => string;
}

export type RateLimitOptions = RateLimitKeyOptions &
  (
    | {
        /**
         * Name of a registered policy
         */
        policy: string;

        /**
         * Overrides the policy's cost
         */
        cost?: number;
      }
    | (LimitParameters & { policy?: undefined })
  );

/**
 * Rate limits a route, or every route of a controller. Limited requests get
 * a 429 response; every response carries X-RateLimit-* headers.
 *
 * @param options Inline limit parameters or a registered policy name
 *
 * @example
 * ```typescript
 * @Controller('auth')
 * export class AuthController {
 *   @Post('login')
 *   @RateLimit({ burst: 4, countPerPeriod: 5, periodSeconds: 60, keyPrefix: 'login:' })
 *   login(@Body() credentials: LoginDto) {
 *     // ...
 *   }
 * }
 * ```
 */
export function RateLimit(options: RateLimitOptions) {
  return applyDecorators(
    SetMetadata(RATE_LIMIT_KEY, options),
    UseInterceptors(RateLimitInterceptor),
  );
}
