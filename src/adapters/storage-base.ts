import { Logger } from '@nestjs/common';
import { ITokenBucketStorage } from '../interfaces/storage.interface';
import { BucketKey, BucketProvider } from '../interfaces/bucket.interface';
import { Clock, monotonicClock } from '../utils/clock';
import { describeBucketKey, toBucketId } from '../utils/bucket-key';

/**
 * Token bucket algorithm shared by table-backed storage engines.
 *
 * Subclasses only decide which table holds the buckets. Reads and writes go
 * through the table without any lock: each bucket state is replaced as a
 * whole, and a replenish computed from an older clock reading never
 * overwrites a newer one. Within a single Node.js isolate every call runs to
 * completion, so a check-and-debit in consume() can not interleave with
 * another caller and the bucket never goes negative. Tables shared beyond one
 * isolate may see a bounded, self-correcting drift instead.
 */
export abstract class StorageBase implements ITokenBucketStorage {
  private readonly logger = new Logger(StorageBase.name);

  protected constructor(
    protected readonly buckets: BucketProvider,
    protected readonly clock: Clock = monotonicClock,
  ) {}

  /**
   * Number of buckets held. Buckets are never evicted, so this grows with
   * every distinct key for the lifetime of the storage.
   */
  get size(): number {
    return this.buckets.size;
  }

  getTokenCount(key: BucketKey): number {
    const bucket = this.buckets.get(toBucketId(key));
    return bucket ? bucket.tokens : 0;
  }

  replenish(key: BucketKey, rate: number, capacity: number): void {
    const id = toBucketId(key);
    const bucket = this.buckets.get(id);

    if (!bucket) {
      this.buckets.set(id, {
        tokens: capacity,
        lastReplenishedAt: this.clock.now(),
      });
      return;
    }

    const now = this.clock.now();

    // A later reading already updated the bucket; don't regress it.
    if (now < bucket.lastReplenishedAt) {
      this.logger.debug(
        `Skipped replenish of bucket ${describeBucketKey(key)}: ` +
          `clock reading ${now} is older than ${bucket.lastReplenishedAt}`,
      );
      return;
    }

    this.buckets.set(id, {
      // Fractional tokens are kept between calls
      tokens: Math.min(
        capacity,
        bucket.tokens + rate * (now - bucket.lastReplenishedAt),
      ),
      lastReplenishedAt: now,
    });
  }

  consume(key: BucketKey, numTokens: number): boolean {
    const id = toBucketId(key);
    const bucket = this.buckets.get(id);

    // Unknown keys were never replenished and hold no tokens
    if (!bucket || bucket.tokens < numTokens) {
      return false;
    }

    this.buckets.set(id, {
      tokens: bucket.tokens - numTokens,
      lastReplenishedAt: bucket.lastReplenishedAt,
    });
    return true;
  }
}
