import { INTERCEPTORS_METADATA } from '@nestjs/common/constants';
import { RateLimit } from '../rate-limit.decorator';
import { RateLimitInterceptor } from '../../interceptors/rate-limit.interceptor';
import { RATE_LIMIT_KEY } from '../../utils/constants';

describe('RateLimit Decorator', () => {
  it('should store the options and attach the interceptor', () => {
    // Arrange
    const options = { burst: 4, countPerPeriod: 5, periodSeconds: 60 };

    // Act
    class TestController {
      @RateLimit(options)
      login() {
        return 'ok';
      }
    }

    // Assert
    const handler = TestController.prototype.login;
    expect(Reflect.getMetadata(RATE_LIMIT_KEY, handler)).toEqual(options);
    expect(Reflect.getMetadata(INTERCEPTORS_METADATA, handler)).toEqual([
      RateLimitInterceptor,
    ]);
  });

  it('should decorate a whole controller', () => {
    @RateLimit({ policy: 'api' })
    class TestController {}

    expect(Reflect.getMetadata(RATE_LIMIT_KEY, TestController)).toEqual({
      policy: 'api',
    });
    expect(Reflect.getMetadata(INTERCEPTORS_METADATA, TestController)).toEqual(
      [RateLimitInterceptor],
    );
  });
});
