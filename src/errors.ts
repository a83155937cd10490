/**
 * Error classes raised by the item store and its collaborators.
 * Every error carries a stable `code` the HTTP layer maps to a status.
 */

export type PasteVaultErrorCode =
  | 'INVALID_ID'
  | 'NOT_FOUND'
  | 'TOO_LARGE'
  | 'INTEGRITY'
  | 'ALLOCATION_EXHAUSTED'
  | 'BACKEND_UNAVAILABLE'
  | 'CONFIGURATION';

export class PasteVaultError extends Error {
  constructor(public readonly code: PasteVaultErrorCode, message: string) {
    super(message);
    this.name = 'PasteVaultError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidIdError extends PasteVaultError {
  constructor(message = 'Malformed text identifier') {
    super('INVALID_ID', message);
    this.name = 'InvalidIdError';
  }
}

/**
 * Absent, expired and tampered items all end up here so callers cannot tell them apart.
 */
export class NotFoundError extends PasteVaultError {
  constructor(message = 'Text not found') {
    super('NOT_FOUND', message);
    this.name = 'NotFoundError';
  }
}

export class TooLargeError extends PasteVaultError {
  constructor(public readonly length: number, public readonly maxLength: number) {
    super('TOO_LARGE', `Text is longer than ${maxLength} chars`);
    this.name = 'TooLargeError';
  }
}

/**
 * Authentication tag verification failed. Internal only: the store remaps it to NotFoundError.
 */
export class IntegrityError extends PasteVaultError {
  constructor(message = 'Ciphertext failed authentication') {
    super('INTEGRITY', message);
    this.name = 'IntegrityError';
  }
}

export class AllocationExhaustedError extends PasteVaultError {
  constructor(public readonly attempts: number) {
    super('ALLOCATION_EXHAUSTED', `Could not allocate a unique identifier after ${attempts} attempts`);
    this.name = 'AllocationExhaustedError';
  }
}

export class BackendUnavailableError extends PasteVaultError {
  constructor(public readonly backend: string, public readonly reason?: unknown) {
    super('BACKEND_UNAVAILABLE', `Storage backend unavailable: ${backend}`);
    this.name = 'BackendUnavailableError';
  }
}

export class ConfigurationError extends PasteVaultError {
  constructor(message: string) {
    super('CONFIGURATION', message);
    this.name = 'ConfigurationError';
  }
}
