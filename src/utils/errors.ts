export { BaseError } from './baseError.js';
export { ValidationError } from './validationError.js';
import { BaseError } from './baseError.js';

export class ConfigurationError extends BaseError {}

export class AuthenticationError extends BaseError {}

export class NotFoundError extends BaseError {}

/**
 * Raised when a local store cannot read or write its backing file.
 */
export class IOFailureError extends BaseError {
  constructor(
    public readonly filePath: string,
    operation: 'read' | 'write',
    cause: unknown,
  ) {
    super(
      `Failed to ${operation} ${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
  }
}

export class InvalidRowError extends BaseError {
  constructor(
    public readonly rowIndex: number,
    expected: number,
    actual: number,
  ) {
    super(`Row ${rowIndex} has ${actual} cells, expected ${expected}`);
  }
}

export class RequestTimeoutError extends BaseError {
  constructor(public readonly timeoutMs: number) {
    super(`YNAB request timed out after ${timeoutMs}ms`);
  }
}

export class RequestCancelledError extends BaseError {
  constructor() {
    super('Request was cancelled before it completed');
  }
}

export class YNABRequestError extends BaseError {
  constructor(
    public status: number,
    public statusText: string,
    public ynabErrorId?: string,
  ) {
    super(
      `YNAB API request failed: ${status} ${statusText}${
        ynabErrorId ? ` (Error ID: ${ynabErrorId})` : ''
      }`,
    );
  }
}

export function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
