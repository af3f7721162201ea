import {
  ITokenBucketStorage,
  isTokenBucketStorage,
} from '../interfaces/storage.interface';
import { BucketKey } from '../interfaces/bucket.interface';
import {
  InvalidTypeError,
  InvalidValueError,
} from '../errors/token-bucket.errors';

/**
 * Limits demand for a finite resource via keyed token buckets.
 *
 * Every bucket managed by a limiter shares the same rate, capacity and
 * storage. Each bucket is referenced by a key, so consumers of a resource
 * can be limited independently (one key per user, per IP, ...) or together
 * (one key for everyone).
 *
 * Capacity bounds bursts. With a request rate M above the replenish rate r,
 * a full bucket of capacity b sustains a burst for b / (M - r) seconds; when
 * r >= M requests conform indefinitely.
 *
 * @example
 * ```typescript
 * const limiter = new Limiter(10, 20, new MemoryStorageAdapter());
 *
 * if (!limiter.consume(`user:${userId}`)) {
 *   throw new Error('Too many requests');
 * }
 * ```
 */
export class Limiter {
  /**
   * @param rate Tokens added to each bucket per second
   * @param capacity Maximum tokens a bucket can hold
   * @param storage Storage engine holding the bucket state
   */
  constructor(
    private readonly _rate: number,
    private readonly _capacity: number,
    private readonly _storage: ITokenBucketStorage,
  ) {
    if (typeof _rate !== 'number') {
      throw new InvalidTypeError('rate must be a number');
    }

    if (!Number.isFinite(_rate) || _rate <= 0) {
      throw new InvalidValueError('rate must be a finite number > 0');
    }

    if (typeof _capacity !== 'number' || !Number.isInteger(_capacity)) {
      throw new InvalidTypeError('capacity must be an integer');
    }

    if (_capacity < 1) {
      throw new InvalidValueError('capacity must be >= 1');
    }

    if (!isTokenBucketStorage(_storage)) {
      throw new InvalidTypeError(
        'storage must implement getTokenCount, replenish and consume',
      );
    }
  }

  get rate(): number {
    return this._rate;
  }

  get capacity(): number {
    return this._capacity;
  }

  get storage(): ITokenBucketStorage {
    return this._storage;
  }

  /**
   * Attempt to take one or more tokens from a bucket.
   *
   * A bucket seen for the first time is created at full capacity before the
   * tokens are taken. The whole of `numTokens` must be available for the
   * request to conform; otherwise nothing is removed.
   *
   * @param key Bucket to consume from
   * @param numTokens Tokens to take. Requests that use more of the resource
   * than others may ask for more than one.
   * @returns true if the tokens were removed (conforming), false otherwise
   */
  consume(key: BucketKey, numTokens = 1): boolean {
    if (key === null || key === undefined) {
      throw new InvalidTypeError('key may not be null or undefined');
    }

    if (typeof key !== 'string' && !(key instanceof Uint8Array)) {
      throw new InvalidTypeError('key must be a string or a Uint8Array');
    }

    if (key.length === 0) {
      throw new InvalidValueError('key must not be empty');
    }

    if (numTokens === null || typeof numTokens !== 'number') {
      throw new InvalidTypeError('numTokens must be a number');
    }

    if (!(numTokens >= 1)) {
      throw new InvalidValueError('numTokens must be >= 1');
    }

    this._storage.replenish(key, this._rate, this._capacity);
    return this._storage.consume(key, numTokens);
  }
}
