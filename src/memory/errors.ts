/**
 * Error types raised by the shared cache.
 *
 * Two families:
 * - caller input errors (InvalidKeyError): local to one call, nothing mutated,
 *   safe to retry with a valid key
 * - contract violations (DuplicateInstantiationError, CloneNotSupportedError,
 *   LockReentryError): a broken invariant, never caught and continued from
 *
 * The bridge errors (ProtocolError, CacheTimeoutError, CacheClosedError) are
 * raised on the worker side of a CacheBridge.
 */

export type CacheErrorCode =
  | 'INVALID_KEY'
  | 'DUPLICATE_INSTANTIATION'
  | 'CLONE_NOT_SUPPORTED'
  | 'LOCK_REENTRY'
  | 'PROTOCOL_ERROR'
  | 'TIMEOUT'
  | 'CLOSED';

export class CacheError extends Error {
  constructor(message: string, public readonly code: CacheErrorCode) {
    super(message);
    this.name = 'CacheError';
  }
}

export class InvalidKeyError extends CacheError {
  constructor(message: string, public readonly key: unknown) {
    super(message, 'INVALID_KEY');
    this.name = 'InvalidKeyError';
  }
}

export class DuplicateInstantiationError extends CacheError {
  constructor(public readonly target: string, detail: string) {
    super(`A second instance of ${target} cannot be created: ${detail}`, 'DUPLICATE_INSTANTIATION');
    this.name = 'DuplicateInstantiationError';
  }
}

export class CloneNotSupportedError extends CacheError {
  constructor(public readonly target: string) {
    super(`Cloning of ${target} is not allowed`, 'CLONE_NOT_SUPPORTED');
    this.name = 'CloneNotSupportedError';
  }
}

export class LockReentryError extends CacheError {
  constructor(public readonly heldBy: string, public readonly attempted: string) {
    super(`Cannot start "${attempted}" while "${heldBy}" holds the critical section`, 'LOCK_REENTRY');
    this.name = 'LockReentryError';
  }
}

export class ProtocolError extends CacheError {
  constructor(message: string) {
    super(message, 'PROTOCOL_ERROR');
    this.name = 'ProtocolError';
  }
}

export class CacheTimeoutError extends CacheError {
  constructor(public readonly operation: string, public readonly timeoutMs: number) {
    super(`Cache ${operation} request timed out after ${timeoutMs}ms`, 'TIMEOUT');
    this.name = 'CacheTimeoutError';
  }
}

export class CacheClosedError extends CacheError {
  constructor(message = 'Cache client is closed') {
    super(message, 'CLOSED');
    this.name = 'CacheClosedError';
  }
}
