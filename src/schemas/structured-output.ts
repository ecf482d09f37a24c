import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { StructuredSchema } from '../providers/llm-provider';
import { CLAIM_CATEGORIES, VERIFICATION_STATUSES } from '../verification/types';

/*
 * Shapes requested from the model. These drive the JSON schema sent with
 * each request; replies are parsed more leniently by the callers, since
 * models drift from the requested shape.
 */

export const ORACLE_OUTPUT_SCHEMA = z.object({
  status: z.enum(['verified', 'partially_verified', 'unverified', 'contradicted', 'unable_to_verify'])
    .describe(`One of: ${VERIFICATION_STATUSES.join(', ')}`),
  summary: z.string().describe('2-3 sentence explanation of the verification result'),
  confidence: z.number().min(0).max(1),
  red_flags: z.array(z.string()),
});

export const EXTRACTION_OUTPUT_SCHEMA = z.object({
  claims: z.array(z.object({
    text: z.string(),
    category: z.string().describe(`One of: ${CLAIM_CATEGORIES.join(', ')}`),
    confidence: z.number().min(0).max(1),
    page: z.number().int().positive().optional(),
    context: z.string().optional(),
  })),
});

export const QUESTIONS_OUTPUT_SCHEMA = z.object({
  questions: z.array(z.object({
    question: z.string(),
    category: z.string(),
    priority: z.enum(['high', 'medium', 'low']),
    rationale: z.string(),
    related_claim_ids: z.array(z.string()).optional(),
  })),
});

export const SUMMARY_OUTPUT_SCHEMA = z.object({
  summary: z.string(),
});

export function toStructuredSchema(name: string, schema: z.ZodTypeAny): StructuredSchema {
  const jsonSchema: Record<string, unknown> = { ...zodToJsonSchema(schema, { $refStrategy: 'none' }) };
  delete jsonSchema['$schema'];
  return { name, schema: jsonSchema };
}
