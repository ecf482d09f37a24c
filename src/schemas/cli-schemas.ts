import { z } from 'zod';

// Options shared by the analyze and verify commands
const COMMON_OPTIONS_SCHEMA = z.object({
  verbose: z.boolean().default(false),
  showPrompt: z.boolean().default(false),
  showPromptTrunc: z.boolean().default(false),
  debugJson: z.boolean().default(false),
  format: z.enum(['line', 'json']).default('line'),
  output: z.string().min(1).optional(),
  config: z.string().min(1).optional(),
  investorName: z.string().min(1).optional(),
  focusAreas: z.string().optional(),
  stage: z.string().min(1).optional(),
});

export const ANALYZE_OPTIONS_SCHEMA = COMMON_OPTIONS_SCHEMA.extend({
  company: z.string().min(1).optional(),
  maxClaims: z.coerce.number().int().positive().optional(),
  maxQuestions: z.coerce.number().int().min(0).optional(),
});

export const VERIFY_OPTIONS_SCHEMA = COMMON_OPTIONS_SCHEMA.extend({
  company: z.string().min(1),
});

// Inferred types
export type CommonOptions = z.infer<typeof COMMON_OPTIONS_SCHEMA>;
export type AnalyzeOptions = z.infer<typeof ANALYZE_OPTIONS_SCHEMA>;
export type VerifyOptions = z.infer<typeof VERIFY_OPTIONS_SCHEMA>;
