import 'reflect-metadata';

// Module
export { TokenBucketModule } from './token-bucket.module';

// Core
export { Limiter } from './limiter/limiter';
export { TokenBucketService } from './services/token-bucket.service';

// Interfaces
export {
  TokenBucketConfig,
  TokenBucketAsyncConfig,
  TokenBucketConfigFactory,
  LimiterOptions,
} from './interfaces/config.interface';
export {
  ITokenBucketStorage,
  isTokenBucketStorage,
} from './interfaces/storage.interface';
export {
  BucketKey,
  BucketProvider,
  IBucketState,
} from './interfaces/bucket.interface';

// Storage (for extending)
export { StorageBase } from './adapters/storage-base';
export { MemoryStorageAdapter } from './adapters/memory-storage.adapter';
export {
  StorageAdapterType,
  MEMORY_STORAGE_ADAPTER,
  CUSTOM_STORAGE_ADAPTER,
} from './adapters/types';

// Decorators
export {
  InjectLimiter,
  getLimiterToken,
} from './decorators/inject-limiter.decorator';

// Errors
export {
  TokenBucketError,
  InvalidTypeError,
  InvalidValueError,
  LimiterNotFoundError,
  LimiterAlreadyRegisteredError,
} from './errors/token-bucket.errors';

// Utilities
export { Clock, monotonicClock } from './utils/clock';
export { TOKEN_BUCKET_CLOCK, TOKEN_BUCKET_CONFIG } from './utils/constants';
export {
  createConfigFromEnv,
  DEFAULT_LIMITER_NAME,
} from './utils/config.factory';
export { VERSION } from './version';
