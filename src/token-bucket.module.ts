import { DynamicModule, Global, Module, Provider } from '@nestjs/common';
import {
  TokenBucketAsyncConfig,
  TokenBucketConfig,
  TokenBucketConfigFactory,
} from './interfaces/config.interface';
import { TOKEN_BUCKET_CONFIG } from './utils/constants';
import { TokenBucketService } from './services/token-bucket.service';
import { getLimiterToken } from './decorators/inject-limiter.decorator';
import {
  CUSTOM_STORAGE_ADAPTER,
  MEMORY_STORAGE_ADAPTER,
} from './adapters/types';

function validateConfig(
  config: TokenBucketConfig,
  expectedNames: string[] = [],
): void {
  if (!config.limiters || !Array.isArray(config.limiters)) {
    throw new Error('TokenBucket config must include a limiters array');
  }

  const names = new Set<string>();
  for (const limiter of config.limiters) {
    if (!limiter.name) {
      throw new Error('Each limiter must have a name');
    }
    if (names.has(limiter.name)) {
      throw new Error(`Duplicate limiter name '${limiter.name}'`);
    }
    names.add(limiter.name);
  }

  for (const name of expectedNames) {
    if (!names.has(name)) {
      throw new Error(
        `Limiter '${name}' is listed in limiterNames but not configured`,
      );
    }
  }

  const storageAdapter = config.storageAdapter ?? MEMORY_STORAGE_ADAPTER;
  if (
    storageAdapter !== MEMORY_STORAGE_ADAPTER &&
    storageAdapter !== CUSTOM_STORAGE_ADAPTER
  ) {
    throw new Error(`Unsupported storage adapter: ${String(storageAdapter)}`);
  }

  if (
    storageAdapter === CUSTOM_STORAGE_ADAPTER &&
    typeof config.customStorageFactory !== 'function'
  ) {
    throw new Error(
      'Custom storage adapter requires customStorageFactory in TokenBucket config',
    );
  }
}

function createLimiterProviders(names: string[]): Provider[] {
  return names.map((name) => ({
    provide: getLimiterToken(name),
    useFactory: (service: TokenBucketService) => service.get(name),
    inject: [TokenBucketService],
  }));
}

/**
 * Main module for token bucket rate limiting. Use forRoot or forRootAsync to
 * configure and register.
 */
@Global()
@Module({})
export class TokenBucketModule {
  /**
   * Register the module with static configuration
   *
   * @example
   * ```typescript
   * @Module({
   *   imports: [
   *     TokenBucketModule.forRoot({
   *       limiters: [
   *         { name: 'api', rate: 50, capacity: 100 },
   *         { name: 'login', rate: 0.2, capacity: 5 },
   *       ],
   *     }),
   *   ],
   * })
   * export class AppModule {}
   * ```
   */
  static forRoot(config: TokenBucketConfig): DynamicModule {
    validateConfig(config);

    const names = config.limiters.map(({ name }) => name);

    return {
      module: TokenBucketModule,
      global: true,
      providers: [
        { provide: TOKEN_BUCKET_CONFIG, useValue: config },
        TokenBucketService,
        ...createLimiterProviders(names),
      ],
      exports: [TokenBucketService, ...names.map(getLimiterToken)],
    };
  }

  /**
   * Register the module with async configuration
   *
   * @example
   * ```typescript
   * @Module({
   *   imports: [
   *     ConfigModule.forRoot(),
   *     TokenBucketModule.forRootAsync({
   *       imports: [ConfigModule],
   *       inject: [ConfigService],
   *       useFactory: (configService: ConfigService) => ({
   *         limiters: [
   *           {
   *             name: 'api',
   *             rate: Number(configService.get('API_RATE')),
   *             capacity: Number(configService.get('API_BURST')),
   *           },
   *         ],
   *       }),
   *       limiterNames: ['api'],
   *     }),
   *   ],
   * })
   * export class AppModule {}
   * ```
   */
  static forRootAsync(asyncConfig: TokenBucketAsyncConfig): DynamicModule {
    const names = asyncConfig.limiterNames ?? [];

    return {
      module: TokenBucketModule,
      global: true,
      imports: asyncConfig.imports ?? [],
      providers: [
        TokenBucketModule.createAsyncConfigProvider(asyncConfig),
        ...(asyncConfig.useClass
          ? [{ provide: asyncConfig.useClass, useClass: asyncConfig.useClass }]
          : []),
        TokenBucketService,
        ...createLimiterProviders(names),
      ],
      exports: [TokenBucketService, ...names.map(getLimiterToken)],
    };
  }

  /**
   * Create async config provider
   * @internal
   */
  private static createAsyncConfigProvider(
    options: TokenBucketAsyncConfig,
  ): Provider {
    const { useFactory } = options;
    const expectedNames = options.limiterNames ?? [];
    if (useFactory) {
      return {
        provide: TOKEN_BUCKET_CONFIG,
        useFactory: async (...args: unknown[]) => {
          const config = await useFactory(...args);
          validateConfig(config, expectedNames);
          return config;
        },
        inject: options.inject ?? [],
      };
    }

    const factoryClass = options.useClass ?? options.useExisting;
    if (factoryClass) {
      return {
        provide: TOKEN_BUCKET_CONFIG,
        useFactory: async (configFactory: TokenBucketConfigFactory) => {
          const config = await configFactory.createTokenBucketConfig();
          validateConfig(config, expectedNames);
          return config;
        },
        inject: [factoryClass],
      };
    }

    throw new Error(
      'Invalid TokenBucketAsyncConfig. Must provide useFactory, useClass, or useExisting.',
    );
  }
}
