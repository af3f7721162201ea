import { Inject } from '@nestjs/common';
import { TOKEN_BUCKET_LIMITER_PREFIX } from '../utils/constants';

/**
 * Injection token of a named limiter
 */
export function getLimiterToken(name: string): string {
  return `${TOKEN_BUCKET_LIMITER_PREFIX}${name}`;
}

/**
 * Injects the limiter registered under the given name.
 *
 * @example
 * ```typescript
 * @Injectable()
 * export class LoginService {
 *   constructor(@InjectLimiter('login') private readonly limiter: Limiter) {}
 *
 *   attempt(username: string) {
 *     if (!this.limiter.consume(username)) {
 *       throw new Error('Too many login attempts');
 *     }
 *   }
 * }
 * ```
 */
export function InjectLimiter(name: string) {
  return Inject(getLimiterToken(name));
}
