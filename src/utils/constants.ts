/**
 * Injection token for the token bucket module configuration
 */
export const TOKEN_BUCKET_CONFIG = 'TOKEN_BUCKET_CONFIG';

/**
 * Injection token for the clock used by in-memory storage
 */
export const TOKEN_BUCKET_CLOCK = 'TOKEN_BUCKET_CLOCK';

/**
 * Prefix of the injection tokens generated for named limiters
 */
export const TOKEN_BUCKET_LIMITER_PREFIX = 'TOKEN_BUCKET_LIMITER:';
