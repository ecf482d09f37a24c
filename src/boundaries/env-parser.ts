import { z } from 'zod';
import { ENV_SCHEMA_WITH_DEFAULTS, type EnvConfig } from '../schemas/env-schemas';
import { ValidationError, handleUnknownError } from '../errors/index';

const PROVIDER_KEYS = {
  openai: { label: 'OpenAI', prefix: 'OPENAI_', required: 'OPENAI_API_KEY' },
  anthropic: { label: 'Anthropic', prefix: 'ANTHROPIC_', required: 'ANTHROPIC_API_KEY' },
  gemini: { label: 'Gemini', prefix: 'GEMINI_', required: 'GEMINI_API_KEY' },
} as const;

function isKnownProvider(value: string): value is keyof typeof PROVIDER_KEYS {
  return Object.prototype.hasOwnProperty.call(PROVIDER_KEYS, value);
}

export function parseEnvironment(env: unknown = process.env): EnvConfig {
  try {
    return ENV_SCHEMA_WITH_DEFAULTS.parse(env);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      const errorMessage = formatProviderValidationError(e, env);
      throw new ValidationError(`Invalid environment variables: ${errorMessage}`, e);
    }
    const err = handleUnknownError(e, 'Environment validation');
    throw new ValidationError(`Environment validation failed: ${err.message}`, e);
  }
}

function readProvider(env: unknown): string {
  if (typeof env !== 'object' || env === null || !('LLM_PROVIDER' in env)) return 'gemini';
  const value: unknown = env.LLM_PROVIDER;
  return typeof value === 'string' ? value : String(value);
}

function formatProviderValidationError(zodError: z.ZodError, env: unknown): string {
  const issues = zodError.issues;
  const providerType = readProvider(env);

  const discriminatorIssue = issues.find((issue) =>
    issue.code === 'invalid_union_discriminator' ||
    (issue.path.length === 1 && issue.path[0] === 'LLM_PROVIDER')
  );

  if (discriminatorIssue) {
    return `LLM_PROVIDER must be one of 'openai', 'anthropic', or 'gemini'. Received: ${providerType}`;
  }

  const missingFields = issues
    .filter((issue) => issue.code === 'invalid_type' && issue.received === 'undefined')
    .map((issue) => issue.path.join('.'));

  if (missingFields.length > 0 && isKnownProvider(providerType)) {
    const provider = PROVIDER_KEYS[providerType];
    const providerFields = missingFields.filter((field) => field.startsWith(provider.prefix));
    if (providerFields.length > 0) {
      return `Missing required ${provider.label} environment variables: ${providerFields.join(', ')}. When using LLM_PROVIDER=${providerType}, ensure ${provider.required} is set.`;
    }
    if (missingFields.includes('BRAVE_API_KEY')) {
      return 'Missing required web search environment variable: BRAVE_API_KEY. Claim verification needs a Brave Search API key.';
    }
  }

  // Values that are present but invalid (number out of range, empty string)
  const validationIssues = issues.filter((issue) =>
    issue.code === 'invalid_string' ||
    issue.code === 'too_small' ||
    issue.code === 'too_big' ||
    issue.code === 'invalid_type'
  );

  if (validationIssues.length > 0) {
    const fieldErrors = validationIssues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    return `Invalid environment variable values: ${fieldErrors.join(', ')}`;
  }

  return zodError.message;
}
