// Base error class for all docslice errors
export class DocsliceError extends Error {
  constructor(message: string, public readonly code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DocsliceError';
  }
}

// Validation error for CLI option and environment schema failures
export class ValidationError extends DocsliceError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

// Chunking configuration error (overlap/chunk size violations)
export class ConfigError extends DocsliceError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

// Data directory missing or unusable; fatal for the whole run
export class EnvironmentError extends DocsliceError {
  constructor(message: string, public readonly path: string) {
    super(message, 'ENVIRONMENT_ERROR');
    this.name = 'EnvironmentError';
  }
}

// Per-file failure while reading or decoding a document
export class ProcessingError extends DocsliceError {
  constructor(message: string, public readonly file: string, cause?: unknown) {
    super(message, 'PROCESSING_ERROR', { cause });
    this.name = 'ProcessingError';
  }
}

// Utility function to handle unknown errors safely
export function handleUnknownError(e: unknown, context: string): Error {
  if (e instanceof Error) {
    return e;
  }
  return new Error(`${context}: ${String(e)}`);
}
