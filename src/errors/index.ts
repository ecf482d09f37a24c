// Base error class for all deckproof errors
export class DeckproofError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'DeckproofError';
  }
}

// Validation error for schema and contract violations
export class ValidationError extends DeckproofError {
  constructor(message: string, public readonly cause?: unknown) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

// Configuration error for config file and credential issues
export class ConfigError extends DeckproofError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

// Processing error for business logic failures
export class ProcessingError extends DeckproofError {
  constructor(message: string) {
    super(message, 'PROCESSING_ERROR');
    this.name = 'ProcessingError';
  }
}

// Raised by an evidence source when the upstream API throttles us
export class RateLimitError extends DeckproofError {
  constructor(
    message: string,
    public readonly status?: number
  ) {
    super(message, 'RATE_LIMITED');
    this.name = 'RateLimitError';
  }
}

// Utility function to handle unknown errors safely
export function handleUnknownError(e: unknown, context: string): Error {
  if (e instanceof Error) {
    return e;
  }
  return new Error(`${context}: ${String(e)}`);
}

export function isRateLimitError(error: unknown): error is RateLimitError {
  return error instanceof RateLimitError;
}
