import { z } from 'zod';

/**
 * Mock parameter schemas for type-safe SDK error doubles
 */

export const MOCK_API_ERROR_PARAMS_SCHEMA = z.object({
  message: z.string(),
  status: z.number().optional(),
});

export type MockAPIErrorParams = z.infer<typeof MOCK_API_ERROR_PARAMS_SCHEMA>;

/*
 * Error hierarchy shaped like the OpenAI and Anthropic SDKs: every specific
 * error extends APIError and carries an HTTP status.
 */
export function createMockSdkErrors() {
  class APIError extends Error {
    status: number;
    constructor(params: MockAPIErrorParams) {
      super(params.message);
      this.name = 'APIError';
      this.status = params.status ?? 500;
    }
  }

  class AuthenticationError extends APIError {
    constructor(message = 'Unauthorized') {
      super({ message, status: 401 });
      this.name = 'AuthenticationError';
    }
  }

  class RateLimitError extends APIError {
    constructor(message = 'Rate Limited') {
      super({ message, status: 429 });
      this.name = 'RateLimitError';
    }
  }

  class BadRequestError extends APIError {
    constructor(message = 'Bad request') {
      super({ message, status: 400 });
      this.name = 'BadRequestError';
    }
  }

  return { APIError, AuthenticationError, RateLimitError, BadRequestError };
}

// Shared instance so SDK mocks and tests see the same error classes
export const MOCK_SDK_ERRORS = createMockSdkErrors();
