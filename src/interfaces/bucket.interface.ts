/**
 * Identifies a token bucket. String keys and byte keys never alias each
 * other, and byte keys compare by content.
 */
export type BucketKey = string | Uint8Array;

/**
 * Persisted state of a single token bucket
 */
export interface IBucketState {
  /**
   * Tokens currently in the bucket. May be fractional, and may dip slightly
   * below zero in storage engines that tolerate racing consumers.
   */
  tokens: number;

  /**
   * Clock reading (seconds) taken at the last successful replenishment
   */
  lastReplenishedAt: number;
}

/**
 * Map-like table of bucket states keyed by normalized bucket id.
 * `Map<string, IBucketState>` satisfies it; storage engines may plug in any
 * other table with the same shape.
 */
export interface BucketProvider {
  get(id: string): IBucketState | undefined;
  set(id: string, state: IBucketState): unknown;
  readonly size: number;
}
