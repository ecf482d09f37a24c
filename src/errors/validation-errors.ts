import { ValidationError } from './index';

export { ValidationError };

export class APIResponseError extends ValidationError {
  constructor(message: string, public readonly response: unknown, cause?: unknown) {
    super(`API Response Error: ${message}`, cause);
    this.name = 'APIResponseError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, APIResponseError);
    }
  }
}

export class SchemaValidationError extends ValidationError {
  constructor(
    message: string,
    public readonly schema: string,
    public readonly data: unknown,
    cause?: unknown
  ) {
    super(`Schema Validation Error (${schema}): ${message}`, cause);
    this.name = 'SchemaValidationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SchemaValidationError);
    }
  }
}

/**
 * Model output that carries no parseable JSON object.
 * `raw` keeps a bounded preview of the offending text for diagnostics.
 */
export class RawResponseError extends ValidationError {
  public readonly raw: string;

  constructor(message: string, raw: string, cause?: unknown) {
    super(`Raw Response Error: ${message}`, cause);
    this.name = 'RawResponseError';
    this.raw = raw.slice(0, 200);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RawResponseError);
    }
  }
}
