import { z } from 'zod';
import type { LLMProvider } from '../providers/llm-provider';
import { ORACLE_OUTPUT_SCHEMA, toStructuredSchema } from '../schemas/structured-output';
import { SchemaValidationError } from '../errors/validation-errors';
import { VERIFICATION_INSTRUCTIONS, buildVerificationContent } from '../prompts/verification-prompt';
import {
  parseVerificationStatus,
  type NarrativeOracle,
  type OracleJudgement,
  type OraclePrompt,
} from './types';

export const ORACLE_DEFAULTS = {
  summary: 'Verification analysis completed.',
  confidence: 0.5,
} as const;

const ORACLE_REPLY_SCHEMA = z.object({
  status: z.unknown().optional(),
  summary: z.string().optional(),
  confidence: z.union([z.number(), z.string()]).optional(),
  red_flags: z.array(z.string()).optional(),
});

function parseConfidence(value: number | string | undefined, data: unknown): number {
  if (value === undefined) return ORACLE_DEFAULTS.confidence;
  const n = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isFinite(n) || (typeof value === 'string' && !value.trim())) {
    throw new SchemaValidationError(`confidence is not a number: ${String(value)}`, 'oracle_judgement', data);
  }
  return Math.min(1, Math.max(0, n));
}

/**
 * Defensive parse of a model judgement. Missing fields take defaults and an
 * unrecognized status becomes `unable_to_verify`; a reply that is not an
 * object or carries a non-numeric confidence is rejected.
 */
export function parseOracleJudgement(data: unknown): OracleJudgement {
  const result = ORACLE_REPLY_SCHEMA.safeParse(data);
  if (!result.success) {
    throw new SchemaValidationError(result.error.message, 'oracle_judgement', data, result.error);
  }
  const reply = result.data;
  const summary = reply.summary?.trim();
  return {
    status: parseVerificationStatus(reply.status),
    summary: summary || ORACLE_DEFAULTS.summary,
    confidence: parseConfidence(reply.confidence, data),
    redFlags: (reply.red_flags ?? []).map((f) => f.trim()).filter((f) => f.length > 0),
  };
}

export class LLMNarrativeOracle implements NarrativeOracle {
  private readonly schema = toStructuredSchema('submit_verification', ORACLE_OUTPUT_SCHEMA);

  constructor(private readonly provider: LLMProvider) {}

  async completeStructured(prompt: OraclePrompt): Promise<OracleJudgement> {
    const result = await this.provider.runPromptStructured(
      buildVerificationContent(prompt),
      VERIFICATION_INSTRUCTIONS,
      this.schema
    );
    return parseOracleJudgement(result.data);
  }
}
