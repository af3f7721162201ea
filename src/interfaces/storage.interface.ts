import { BucketKey } from './bucket.interface';

/**
 * Interface for storage engines that hold token bucket state.
 *
 * Any implementation honouring the capped replenishment and all-or-nothing
 * consume semantics below can back a Limiter.
 */
export interface ITokenBucketStorage {
  /**
   * Query the current token count for the given bucket.
   * The bucket is not replenished first, so the count is whatever it was
   * after the last replenish or consume. Returns 0 for unknown keys.
   *
   * @param key Bucket to query
   */
  getTokenCount(key: BucketKey): number;

  /**
   * Add the tokens accrued since the bucket was last replenished.
   * Creates the bucket at full capacity the first time a key is seen.
   *
   * @param key Bucket to replenish
   * @param rate Tokens added per second
   * @param capacity Maximum tokens the bucket can hold
   */
  replenish(key: BucketKey, rate: number, capacity: number): void;

  /**
   * Attempt to take tokens from a bucket. Either all of `numTokens` are
   * removed and true is returned, or nothing changes and false is returned.
   *
   * @param key Bucket to consume from; callers replenish it first
   * @param numTokens Tokens to remove
   */
  consume(key: BucketKey, numTokens: number): boolean;
}

/**
 * Checks that a value implements the storage contract
 */
export function isTokenBucketStorage(
  value: unknown,
): value is ITokenBucketStorage {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  return (
    'getTokenCount' in value &&
    typeof value.getTokenCount === 'function' &&
    'replenish' in value &&
    typeof value.replenish === 'function' &&
    'consume' in value &&
    typeof value.consume === 'function'
  );
}
