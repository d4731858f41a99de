/**
 * Error types for test case operations
 *
 * Every error has a stable `code`; handlers map codes to HTTP statuses.
 */

import type { FieldError } from './types/index.js';

export abstract class TestCaseApiError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * Thrown when input fails schema validation. Never reaches the store.
 */
export class ValidationError extends TestCaseApiError {
  readonly code = 'VALIDATION_ERROR';

  constructor(readonly errors: FieldError[]) {
    super(`Validation failed: ${errors.map(formatFieldError).join('; ')}`);
  }
}

/**
 * Thrown when a write would violate the unique index on vuln_id
 */
export class DuplicateKeyError extends TestCaseApiError {
  readonly code = 'DUPLICATE_KEY';

  constructor(readonly vulnId: string, options?: ErrorOptions) {
    super(`Duplicate vuln_id: ${vulnId}`, options);
  }
}

/**
 * Thrown when a request body has the wrong overall shape
 */
export class BadRequestError extends TestCaseApiError {
  readonly code = 'BAD_REQUEST';
}

export type StorageOperation = 'read' | 'write' | 'update' | 'delete' | 'ping';

/**
 * Thrown when the store fails for any reason other than a uniqueness violation
 */
export class StorageError extends TestCaseApiError {
  readonly code = 'STORAGE_ERROR';

  constructor(readonly operation: StorageOperation, options?: ErrorOptions) {
    super(`Storage ${operation} failed`, options);
  }
}

/**
 * Thrown when configuration values cannot be parsed
 */
export class ConfigError extends TestCaseApiError {
  readonly code = 'CONFIG_ERROR';
}

function formatFieldError(error: FieldError): string {
  const prefix = error.index === undefined ? '' : `[${error.index}] `;
  return `${prefix}${error.field}: ${error.message}`;
}
