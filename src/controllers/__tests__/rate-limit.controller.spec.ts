import { HttpException, HttpStatus } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { RateLimitController } from '../rate-limit.controller';
import { RateLimiterService } from '../../services/rate-limiter.service';
import {
  CorruptedStateError,
  KeyTypeConflictError,
  StateContentionError,
} from '../../errors/rate-limiter.errors';
import { RateLimitResult } from '../../interfaces/rate-limiter.interface';

async function captureError(action: Promise<unknown>): Promise<HttpException> {
  try {
    await action;
  } catch (error) {
    if (error instanceof HttpException) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected the call to fail');
}

describe('RateLimitController', () => {
  let controller: RateLimitController;
  let rateLimiterService: {
    limit: jest.Mock;
    peek: jest.Mock;
    reset: jest.Mock;
  };

  const admitted: RateLimitResult = {
    limited: false,
    limit: 3,
    remaining: 2,
    retryAfterSeconds: -1,
    ttlSeconds: 0,
  };

  beforeEach(async () => {
    rateLimiterService = {
      limit: jest.fn().mockResolvedValue(admitted),
      peek: jest.fn().mockResolvedValue(admitted),
      reset: jest.fn().mockResolvedValue(true),
    };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [RateLimitController],
      providers: [
        {
          provide: RateLimiterService,
          useValue: rateLimiterService,
        },
      ],
    }).compile();

    controller = module.get<RateLimitController>(RateLimitController);
  });

  describe('limit', () => {
    it('should accept numbers and numeric strings', async () => {
      // Act
      const result = await controller.limit('user:1', {
        burst: '2',
        countPerPeriod: 10,
        periodSeconds: '0.5',
      });

      // Assert
      expect(result).toEqual(admitted);
      expect(rateLimiterService.limit).toHaveBeenCalledWith({
        key: 'user:1',
        burst: 2,
        countPerPeriod: 10,
        periodSeconds: 0.5,
        cost: 1,
      });
    });

    it('should pass the cost through', async () => {
      await controller.limit('user:1', {
        burst: 2,
        countPerPeriod: 10,
        periodSeconds: 1,
        cost: '3',
      });

      expect(rateLimiterService.limit).toHaveBeenCalledWith(
        expect.objectContaining({ cost: 3 }),
      );
    });

    it('should answer 400 for a parameter that is not a number', async () => {
      const error = await captureError(
        controller.limit('user:1', {
          burst: 'lots',
          countPerPeriod: 10,
          periodSeconds: 1,
        }),
      );

      expect(error.getStatus()).toBe(HttpStatus.BAD_REQUEST);
      expect(error.message).toBe('invalid burst');
      expect(rateLimiterService.limit).not.toHaveBeenCalled();
    });

    it.each([
      [new KeyTypeConflictError('user:1'), HttpStatus.CONFLICT],
      [new CorruptedStateError('user:1', 'x'), HttpStatus.CONFLICT],
      [new StateContentionError('user:1', 6), HttpStatus.SERVICE_UNAVAILABLE],
      [new Error('connection lost'), HttpStatus.INTERNAL_SERVER_ERROR],
    ])('should map %p to its status', async (failure, status) => {
      rateLimiterService.limit.mockRejectedValue(failure);

      const error = await captureError(
        controller.limit('user:1', {
          burst: 2,
          countPerPeriod: 10,
          periodSeconds: 1,
        }),
      );

      expect(error.getStatus()).toBe(status);
    });

    it('should hide the cause of internal errors', async () => {
      rateLimiterService.limit.mockRejectedValue(new Error('connection lost'));

      const error = await captureError(
        controller.limit('user:1', {
          burst: 2,
          countPerPeriod: 10,
          periodSeconds: 1,
        }),
      );

      expect(error.message).toBe('Internal rate limiter error');
    });
  });

  it('should peek with query parameters', async () => {
    await controller.peek('user:1', {
      burst: '2',
      countPerPeriod: '10',
      periodSeconds: '1',
    });

    expect(rateLimiterService.peek).toHaveBeenCalledWith({
      key: 'user:1',
      burst: 2,
      countPerPeriod: 10,
      periodSeconds: 1,
    });
  });

  it('should reset a bucket', async () => {
    await expect(controller.reset('user:1')).resolves.toEqual({
      deleted: true,
    });
    expect(rateLimiterService.reset).toHaveBeenCalledWith('user:1');
  });
});
