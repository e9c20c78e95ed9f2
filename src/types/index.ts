// Core entity types
export * from './Attempt.js';
export * from './Classification.js';
export * from './Execution.js';
export * from './errors.js';

// Error handling types and utilities
export interface ErrorWithMessage {
  message: string;
}

export interface ErrorWithCode extends ErrorWithMessage {
  code: string;
}

export function isErrorWithMessage(error: unknown): error is ErrorWithMessage {
  return (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string'
  );
}

export function isErrorWithCode(error: unknown): error is ErrorWithCode {
  return (
    isErrorWithMessage(error) &&
    'code' in error &&
    typeof error.code === 'string'
  );
}

export function toErrorWithMessage(maybeError: unknown): ErrorWithMessage {
  if (isErrorWithMessage(maybeError)) return maybeError;

  try {
    return new Error(JSON.stringify(maybeError));
  } catch {
    // circular structures cannot be stringified
    return new Error(String(maybeError));
  }
}

export function getErrorMessage(error: unknown): string {
  return toErrorWithMessage(error).message;
}
