import { z } from 'zod';
import {
  ANALYZE_OPTIONS_SCHEMA,
  VERIFY_OPTIONS_SCHEMA,
  type AnalyzeOptions,
  type VerifyOptions,
} from '../schemas/cli-schemas';
import { ValidationError, handleUnknownError } from '../errors/index';

function formatIssues(e: z.ZodError): string {
  return e.issues.map((issue) => `--${issue.path.join('.')}: ${issue.message}`).join(', ');
}

export function parseAnalyzeOptions(raw: unknown): AnalyzeOptions {
  try {
    return ANALYZE_OPTIONS_SCHEMA.parse(raw);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ValidationError(`Invalid CLI options: ${formatIssues(e)}`, e);
    }
    const err = handleUnknownError(e, 'CLI option parsing');
    throw new ValidationError(`CLI option parsing failed: ${err.message}`, e);
  }
}

export function parseVerifyOptions(raw: unknown): VerifyOptions {
  try {
    return VERIFY_OPTIONS_SCHEMA.parse(raw);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ValidationError(`Invalid verify options: ${formatIssues(e)}`, e);
    }
    const err = handleUnknownError(e, 'Verify option parsing');
    throw new ValidationError(`Verify option parsing failed: ${err.message}`, e);
  }
}
