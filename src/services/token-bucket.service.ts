import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  LimiterOptions,
  TokenBucketConfig,
} from '../interfaces/config.interface';
import { BucketKey } from '../interfaces/bucket.interface';
import { Limiter } from '../limiter/limiter';
import { TOKEN_BUCKET_CONFIG } from '../utils/constants';
import { createStorageAdapter } from '../utils/storage-adapter.factory';
import {
  LimiterAlreadyRegisteredError,
  LimiterNotFoundError,
} from '../errors/token-bucket.errors';

/**
 * Registry of named limiters.
 *
 * Limiters from the module configuration are registered on construction;
 * more can be added at runtime, e.g. one per tenant.
 */
@Injectable()
export class TokenBucketService {
  private readonly logger = new Logger(TokenBucketService.name);
  private readonly limiters: Map<string, Limiter> = new Map();

  constructor(
    @Inject(TOKEN_BUCKET_CONFIG)
    private readonly config: TokenBucketConfig,
  ) {
    for (const options of config.limiters) {
      this.register(options);
    }
  }

  /**
   * Register a limiter with its own storage
   *
   * @returns The new limiter
   * @throws LimiterAlreadyRegisteredError if the name is taken
   */
  register(options: LimiterOptions): Limiter {
    const { name, rate, capacity } = options;
    if (this.limiters.has(name)) {
      throw new LimiterAlreadyRegisteredError(name);
    }

    const limiter = new Limiter(
      rate,
      capacity,
      createStorageAdapter(this.config, options),
    );
    this.limiters.set(name, limiter);
    this.logger.log(
      `Registered token bucket limiter '${name}' ` +
        `(rate ${rate}/s, capacity ${capacity})`,
    );
    return limiter;
  }

  /**
   * Unregister a limiter, dropping its buckets along with it
   *
   * @returns True if unregistered, false if no limiter had that name
   */
  unregister(name: string): boolean {
    if (!this.limiters.delete(name)) {
      return false;
    }

    this.logger.log(`Unregistered token bucket limiter '${name}'`);
    return true;
  }

  has(name: string): boolean {
    return this.limiters.has(name);
  }

  get(name: string): Limiter {
    const limiter = this.limiters.get(name);
    if (!limiter) {
      throw new LimiterNotFoundError(name);
    }
    return limiter;
  }

  /**
   * Try to consume tokens from a bucket of the named limiter
   *
   * @returns true if the request conforms, false if it is rate limited
   */
  consume(name: string, key: BucketKey, numTokens = 1): boolean {
    return this.get(name).consume(key, numTokens);
  }

  /**
   * Last-known token count of a bucket, without replenishing it
   */
  getTokenCount(name: string, key: BucketKey): number {
    return this.get(name).storage.getTokenCount(key);
  }
}
