import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { decide } from '../engine/gcra.engine';
import {
  InvalidConfigurationError,
  LimitAbortedError,
  StateContentionError,
} from '../errors/rate-limiter.errors';
import {
  GcraLimiterConfig,
  LimitRequest,
  RateLimitPolicy,
} from '../interfaces/config.interface';
import { RateLimitResult } from '../interfaces/rate-limiter.interface';
import { IStateStorageAdapter } from '../interfaces/storage-adapter.interface';
import { TimeSource } from '../interfaces/time-source.interface';
import { RateLimiterConfig } from '../models/rate-limiter-config.model';
import {
  DEFAULT_MAX_RETRIES,
  DEFAULT_SWEEP_INTERVAL_MS,
  GCRA_LIMITER_CONFIG,
  GCRA_LIMITER_STORAGE_ADAPTER,
  GCRA_LIMITER_TIME_SOURCE,
} from '../utils/constants';
import { KeyedMutex } from '../utils/keyed-mutex';
import { toStoreExpiry } from '../utils/time-units';

export const SWEEP_INTERVAL_NAME = 'gcra-limiter:sweep';

@Injectable()
export class RateLimiterService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RateLimiterService.name);
  private readonly policies: Map<string, RateLimitPolicy> = new Map();
  private readonly locks = new KeyedMutex();
  private readonly maxRetries: number;
  private readonly sweepIntervalMs: number;

  constructor(
    @Inject(GCRA_LIMITER_STORAGE_ADAPTER)
    private readonly storageAdapter: IStateStorageAdapter,
    @Inject(GCRA_LIMITER_TIME_SOURCE)
    private readonly timeSource: TimeSource,
    @Inject(GCRA_LIMITER_CONFIG)
    config: GcraLimiterConfig,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {
    this.maxRetries = config.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.sweepIntervalMs = config.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;

    for (const policy of config.policies ?? []) {
      this.registerPolicy(policy);
    }
  }

  /**
   * Schedule the expired-bucket sweep for adapters that need one
   */
  onModuleInit(): void {
    if (!this.storageAdapter.sweepExpired) {
      return;
    }

    const interval = setInterval(() => {
      this.sweepExpired().catch((err: Error) =>
        this.logger.error(`Failed to sweep expired buckets: ${err.message}`),
      );
    }, this.sweepIntervalMs);
    this.schedulerRegistry.addInterval(SWEEP_INTERVAL_NAME, interval);
  }

  onModuleDestroy(): void {
    if (this.schedulerRegistry.doesExist('interval', SWEEP_INTERVAL_NAME)) {
      this.schedulerRegistry.deleteInterval(SWEEP_INTERVAL_NAME);
    }
  }

  /**
   * Decide whether a request passes its limit and record it if it does.
   * Calls for the same key are applied one after another; calls for
   * different keys run independently.
   *
   * @param request Bucket key and limit parameters
   * @returns The verdict
   * @throws InvalidConfigurationError if the parameters are invalid
   * @throws StateContentionError if other writers kept changing the bucket
   */
  async limit(request: LimitRequest): Promise<RateLimitResult> {
    const config = RateLimiterConfig.create(request);

    return this.locks.runExclusive(request.key, () =>
      this.decideAndStore(request.key, config, request.signal),
    );
  }

  /**
   * Report the state of a bucket without consuming from it
   */
  async peek(request: Omit<LimitRequest, 'cost'>): Promise<RateLimitResult> {
    return this.limit({ ...request, cost: 0 });
  }

  /**
   * Consume from a bucket using a registered policy. Buckets are namespaced
   * by policy name, so the same key under two policies is two buckets.
   *
   * @param policyName Name of the registered policy
   * @param key Bucket key within the policy
   * @param cost Overrides the policy's cost
   */
  async consume(
    policyName: string,
    key: string,
    cost?: number,
    signal?: AbortSignal,
  ): Promise<RateLimitResult> {
    const policy = this.policies.get(policyName);
    if (!policy) {
      this.logger.warn(`No rate limit policy found for name '${policyName}'`);
      throw new InvalidConfigurationError(
        `unknown rate limit policy '${policyName}'`,
      );
    }

    return this.limit({
      key: `${policy.name}:${key}`,
      burst: policy.burst,
      countPerPeriod: policy.countPerPeriod,
      periodSeconds: policy.periodSeconds,
      cost: cost ?? policy.cost,
      signal,
    });
  }

  /**
   * Forget everything about a bucket
   * @param key The bucket key
   * @returns True if a bucket was deleted
   */
  async reset(key: string): Promise<boolean> {
    const deleted = await this.locks.runExclusive(key, () =>
      this.storageAdapter.deleteBucket(key),
    );
    this.logger.debug(`Reset bucket ${key}: ${deleted ? 'deleted' : 'absent'}`);
    return deleted;
  }

  /**
   * Evict expired buckets when the storage adapter supports it
   * @returns Number of buckets removed
   */
  async sweepExpired(): Promise<number> {
    if (!this.storageAdapter.sweepExpired) {
      return 0;
    }
    return this.storageAdapter.sweepExpired();
  }

  /**
   * Register a named policy
   *
   * @param policy Policy to register
   * @returns True if registered, false if a policy with this name already exists
   * @throws InvalidConfigurationError if the policy parameters are invalid
   */
  registerPolicy(policy: RateLimitPolicy): boolean {
    if (this.policies.has(policy.name)) {
      this.logger.debug(
        `Rate limit policy with name '${policy.name}' already exists`,
      );
      return false;
    }

    RateLimiterConfig.create(policy);
    this.policies.set(policy.name, { ...policy });
    this.logger.log(`Registered rate limit policy '${policy.name}'`);
    return true;
  }

  /**
   * Unregister a named policy. Its buckets are left to expire.
   *
   * @param name Name of the policy to remove
   * @returns True if unregistered, false if the policy was not found
   */
  unregisterPolicy(name: string): boolean {
    if (!this.policies.delete(name)) {
      return false;
    }

    this.logger.log(`Unregistered rate limit policy '${name}'`);
    return true;
  }

  getPolicy(name: string): RateLimitPolicy | undefined {
    return this.policies.get(name);
  }

  private async decideAndStore(
    key: string,
    config: RateLimiterConfig,
    signal?: AbortSignal,
  ): Promise<RateLimitResult> {
    const attempts = this.maxRetries + 1;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      const stored = await this.storageAdapter.getArrival(key);
      const now = this.timeSource.now();

      const arrival = stored !== null && stored !== 0n ? stored : now;
      config.assertArrivalInRange(arrival > now ? arrival : now);

      const { decision, persist } = decide(stored, config, now);

      if (!persist) {
        this.logger.debug(
          `Rate limit exceeded for key ${key}, retry after ${decision.retryAfterSeconds}s`,
        );
        return decision;
      }

      if (signal?.aborted) {
        throw new LimitAbortedError(key);
      }

      const written = await this.storageAdapter.compareAndSet(
        key,
        stored,
        persist.arrival,
        toStoreExpiry(persist.ttl, this.storageAdapter.expiryUnit),
      );

      if (written) {
        this.logger.debug(
          `Admitted cost ${config.cost} for key ${key}, ${decision.remaining} remaining`,
        );
        return decision;
      }

      this.logger.warn(
        `Bucket ${key} changed during decision (attempt ${attempt}/${attempts})`,
      );
    }

    throw new StateContentionError(key, attempts);
  }
}
