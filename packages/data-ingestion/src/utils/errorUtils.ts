// Error handling utilities for data-ingestion package

export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error occurred';
}

export function getErrorStack(error: unknown): string | undefined {
  if (isError(error)) {
    return error.stack;
  }
  return undefined;
}

// Error types
export class CleaningError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CleaningError';
  }
}

export class MissingColumnError extends CleaningError {
  constructor(public column: string, context: string, available: readonly string[]) {
    super(
      `Column "${column}" is required by ${context} but the dataset only has: ${available.join(', ') || '(no columns)'}`,
      'MISSING_COLUMN',
      { column, context, available: [...available] }
    );
    this.name = 'MissingColumnError';
  }
}

export class StructuralMismatchError extends CleaningError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'STRUCTURAL_MISMATCH', details);
    this.name = 'StructuralMismatchError';
  }
}

export class InvalidEventError extends CleaningError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_EVENT', details);
    this.name = 'InvalidEventError';
  }
}

export class ObjectNotFoundError extends CleaningError {
  constructor(public bucket: string, public key: string) {
    super(`File ${key} not found in bucket ${bucket}`, 'OBJECT_NOT_FOUND', { bucket, key });
    this.name = 'ObjectNotFoundError';
  }
}

export class ConfigurationError extends CleaningError {
  constructor(message: string, public keys: string[]) {
    super(message, 'CONFIGURATION_ERROR', { keys });
    this.name = 'ConfigurationError';
  }
}
