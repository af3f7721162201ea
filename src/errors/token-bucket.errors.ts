/**
 * Base class for every error raised by the token bucket library
 */
export class TokenBucketError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TokenBucketError';
  }
}

/**
 * An argument was of the wrong kind (e.g. a non-numeric rate, a missing key
 * or a storage object that does not implement the storage contract)
 */
export class InvalidTypeError extends TokenBucketError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidTypeError';
  }
}

/**
 * An argument was of the right kind but out of range (e.g. rate <= 0,
 * capacity < 1, an empty key or numTokens < 1)
 */
export class InvalidValueError extends TokenBucketError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidValueError';
  }
}

export class LimiterNotFoundError extends TokenBucketError {
  constructor(name: string) {
    super(`No token bucket limiter registered with name '${name}'`);
    this.name = 'LimiterNotFoundError';
  }
}

export class LimiterAlreadyRegisteredError extends TokenBucketError {
  constructor(name: string) {
    super(`A token bucket limiter named '${name}' is already registered`);
    this.name = 'LimiterAlreadyRegisteredError';
  }
}
