import { ConfigService } from '@nestjs/config';
import { TokenBucketConfig } from '../interfaces/config.interface';

export const DEFAULT_LIMITER_NAME = 'default';

function readNumber(configService: ConfigService, key: string): number {
  const raw = configService.get<string | number>(key);
  if (raw === undefined || raw === null || raw === '') {
    throw new Error(`${key} must be set to configure the token bucket limiter`);
  }
  return Number(raw);
}

/**
 * Builds a single-limiter in-memory configuration from the environment:
 * `TOKEN_BUCKET_RATE`, `TOKEN_BUCKET_CAPACITY` and optionally
 * `TOKEN_BUCKET_NAME` (defaults to 'default').
 *
 * @example
 * ```typescript
 * TokenBucketModule.forRootAsync({
 *   imports: [ConfigModule],
 *   inject: [ConfigService],
 *   useFactory: createConfigFromEnv,
 *   limiterNames: ['default'],
 * })
 * ```
 */
export function createConfigFromEnv(
  configService: ConfigService,
): TokenBucketConfig {
  return {
    limiters: [
      {
        name:
          configService.get<string>('TOKEN_BUCKET_NAME') ||
          DEFAULT_LIMITER_NAME,
        rate: readNumber(configService, 'TOKEN_BUCKET_RATE'),
        capacity: readNumber(configService, 'TOKEN_BUCKET_CAPACITY'),
      },
    ],
    storageAdapter: 'memory',
  };
}
