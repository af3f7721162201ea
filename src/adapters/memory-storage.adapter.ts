import { Inject, Injectable, Optional } from '@nestjs/common';
import { StorageBase } from './storage-base';
import { IBucketState } from '../interfaces/bucket.interface';
import { Clock, monotonicClock } from '../utils/clock';
import { TOKEN_BUCKET_CLOCK } from '../utils/constants';

/**
 * In-memory storage adapter for token buckets.
 *
 * Buckets live in a process-local Map for the lifetime of the adapter and
 * are never evicted: memory grows with the number of distinct keys. Suitable
 * for a single process; state is not shared between processes or workers.
 */
@Injectable()
export class MemoryStorageAdapter extends StorageBase {
  constructor(
    @Optional()
    @Inject(TOKEN_BUCKET_CLOCK)
    clock: Clock = monotonicClock,
  ) {
    super(new Map<string, IBucketState>(), clock);
  }
}
