/**
 * Error types for the profile store
 *
 * None of these reach callers of the mutation API; they travel between the
 * store adapters and the Profile, which turns them into degraded state.
 */

export type ProfileErrorCode =
  | 'OWNER_MISSING'
  | 'REMOTE_STORE_ERROR'
  | 'DECODE_ERROR'
  | 'ABORTED'
  | 'RETRY_EXHAUSTED';

/**
 * Base error class for all profile store errors
 */
export class ProfileStoreError extends Error {
  public readonly code: ProfileErrorCode;
  public readonly context?: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(message: string, code: ProfileErrorCode, context?: Record<string, unknown>, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

// ============================================================================
// Store I/O
// ============================================================================

/**
 * A store call failed (connection, I/O, injected failure)
 */
export class RemoteStoreError extends ProfileStoreError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, 'REMOTE_STORE_ERROR', context, cause);
  }
}

/**
 * Every retry attempt of a store call failed
 */
export class RetryExhaustedError extends ProfileStoreError {
  constructor(label: string, public readonly attempts: number, cause: unknown) {
    super(`${label} failed after ${attempts} attempts`, 'RETRY_EXHAUSTED', { label, attempts }, cause);
  }
}

/**
 * A stored document could not be parsed or has an unexpected shape
 */
export class ProfileDecodeError extends ProfileStoreError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, 'DECODE_ERROR', context, cause);
  }
}

/**
 * The owner detached while an operation was waiting
 */
export class AbortedError extends ProfileStoreError {
  constructor(message = 'Operation aborted: owner detached') {
    super(message, 'ABORTED');
  }
}

/**
 * Construction was attempted without a live owner
 */
export class OwnerMissingError extends ProfileStoreError {
  constructor(message = 'Profile requires a live owner') {
    super(message, 'OWNER_MISSING');
  }
}

export function isAbortedError(error: unknown): error is AbortedError {
  return error instanceof AbortedError;
}
