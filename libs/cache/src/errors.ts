/** Base error for all cache-related exceptions. */
export class CacheError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CacheError';
  }
}

/** The backing store is unreachable or rejected a command. */
export class StoreConnectivityError extends CacheError {
  constructor(
    message: string,
    readonly command: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'StoreConnectivityError';
  }
}

/** A value could not be encoded or decoded. */
export class SerializationError extends CacheError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SerializationError';
  }
}

/** The store does not support the requested command (e.g. SCAN). */
export class CapabilityMismatchError extends CacheError {
  constructor(
    message: string,
    readonly command: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CapabilityMismatchError';
  }
}

/** Thrown when provided options are invalid or contradictory. */
export class OptionValidationError extends CacheError {
  constructor(message: string) {
    super(message);
    this.name = 'OptionValidationError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
