import {
  LimiterOptions,
  TokenBucketConfig,
} from '../interfaces/config.interface';
import { ITokenBucketStorage } from '../interfaces/storage.interface';
import { MemoryStorageAdapter } from '../adapters/memory-storage.adapter';
import {
  CUSTOM_STORAGE_ADAPTER,
  MEMORY_STORAGE_ADAPTER,
} from '../adapters/types';

/**
 * Creates the storage for one limiter based on the configuration.
 * Each limiter gets its own storage, so buckets of different limiters never
 * share a key space.
 */
export function createStorageAdapter(
  config: TokenBucketConfig,
  options: LimiterOptions,
): ITokenBucketStorage {
  const storageAdapter = config.storageAdapter ?? MEMORY_STORAGE_ADAPTER;

  switch (storageAdapter) {
    case MEMORY_STORAGE_ADAPTER:
      return new MemoryStorageAdapter(config.clock);
    case CUSTOM_STORAGE_ADAPTER:
      if (!config.customStorageFactory) {
        throw new Error(
          'Storage adapter type is "custom" but no customStorageFactory was provided in TokenBucketConfig.',
        );
      }
      return config.customStorageFactory(options);
    default:
      throw new Error(`Unsupported storage adapter: ${String(storageAdapter)}`);
  }
}
