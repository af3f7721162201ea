import {
  InjectionToken,
  ModuleMetadata,
  OptionalFactoryDependency,
  Type,
} from '@nestjs/common';
import { StorageAdapterType } from '../adapters/types';
import { ITokenBucketStorage } from './storage.interface';
import { Clock } from '../utils/clock';

/**
 * Options for a single named limiter
 */
export interface LimiterOptions {
  /**
   * Unique name of the limiter, used to look it up and inject it
   */
  name: string;

  /**
   * Tokens added to each bucket per second (may be fractional)
   */
  rate: number;

  /**
   * Maximum number of tokens a bucket can hold. Bounds the burst size.
   */
  capacity: number;
}

/**
 * Configuration for the token bucket module
 */
export interface TokenBucketConfig {
  /**
   * Limiters to register on startup
   */
  limiters: LimiterOptions[];

  /**
   * Name of the storage adapter to use ('memory' or 'custom')
   * @default 'memory'
   */
  storageAdapter?: StorageAdapterType;

  /**
   * Creates the storage for each limiter when storageAdapter is 'custom'.
   * Called once per registered limiter.
   */
  customStorageFactory?: (options: LimiterOptions) => ITokenBucketStorage;

  /**
   * Time source for in-memory storage, in seconds
   * @default monotonic clock
   */
  clock?: Clock;
}

/**
 * Interface for async config factory
 */
export interface TokenBucketConfigFactory {
  createTokenBucketConfig(): Promise<TokenBucketConfig> | TokenBucketConfig;
}

/**
 * Options for async module configuration
 */
export interface TokenBucketAsyncConfig
  extends Pick<ModuleMetadata, 'imports'> {
  /**
   * Existing provider implementing the config factory interface
   */
  useExisting?: Type<TokenBucketConfigFactory>;

  /**
   * Class that implements config factory interface
   */
  useClass?: Type<TokenBucketConfigFactory>;

  /**
   * Factory function for config
   */
  useFactory?: (
    ...args: any[]
  ) => Promise<TokenBucketConfig> | TokenBucketConfig;

  /**
   * Dependencies to inject into factory function
   */
  inject?: Array<InjectionToken | OptionalFactoryDependency>;

  /**
   * Names of the limiters the resolved config will contain, so each can be
   * injected with @InjectLimiter()
   */
  limiterNames?: string[];
}
