/**
 * Unit Tests for Error Classes
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  ExtractionError,
  RequestValidationError,
  StatementError,
  handleError,
} from './errors';
import { PDFExtractionError } from './processing/pdf-extractor';

describe('error classes', () => {
  it('keeps the subclass chain for instanceof checks', () => {
    const error = new PDFExtractionError('broken', 'INVALID_PDF');

    expect(error).toBeInstanceOf(PDFExtractionError);
    expect(error).toBeInstanceOf(ExtractionError);
    expect(error).toBeInstanceOf(StatementError);
    expect(error.code).toBe('INVALID_PDF');
    expect(error.recoverable).toBe(false);
  });

  it('carries an HTTP status on validation errors', () => {
    const error = new RequestValidationError('bad input');

    expect(error).toBeInstanceOf(RequestValidationError);
    expect(error.status).toBe(400);
    expect(error.code).toBe('VALIDATION_ERROR');
  });

  it('marks configuration errors as not recoverable', () => {
    const error = new ConfigurationError('missing');

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error.recoverable).toBe(false);
  });
});

describe('handleError', () => {
  it('returns messages of known errors', () => {
    expect(handleError(new RequestValidationError('bad input'))).toBe('bad input');
  });

  it('returns messages of plain errors', () => {
    expect(handleError(new Error('boom'))).toBe('boom');
    expect(handleError(new Error(''))).toBe('Something went wrong. Please try again.');
  });

  it('handles non-error values', () => {
    expect(handleError('oops')).toBe('An unexpected error occurred.');
  });
});
