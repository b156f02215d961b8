/**
 * Custom Error Classes
 *
 * Standardized error handling across the statement service.
 */

export class StatementError extends Error {
  constructor(
    message: string,
    public code: string,
    public recoverable: boolean = true
  ) {
    super(message);
    this.name = 'StatementError';
    Object.setPrototypeOf(this, StatementError.prototype);
  }
}

export class ExtractionError extends StatementError {
  constructor(
    message: string,
    code: string = 'EXTRACTION_ERROR',
    recoverable: boolean = false
  ) {
    super(message, code, recoverable);
    this.name = 'ExtractionError';
    Object.setPrototypeOf(this, ExtractionError.prototype);
  }
}

export class RequestValidationError extends StatementError {
  constructor(message: string, public status: number = 400) {
    super(message, 'VALIDATION_ERROR', true);
    this.name = 'RequestValidationError';
    Object.setPrototypeOf(this, RequestValidationError.prototype);
  }
}

export class ConfigurationError extends StatementError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR', false);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Handles errors in a standardized way
 */
export function handleError(error: unknown): string {
  if (error instanceof StatementError) {
    return error.message;
  }

  if (error instanceof Error) {
    console.error('Unknown error:', error);
    return error.message || 'Something went wrong. Please try again.';
  }

  console.error('Unknown error:', error);
  return 'An unexpected error occurred.';
}
