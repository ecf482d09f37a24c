import { z } from 'zod';

// OpenAI chat completion response schemas
export const OPENAI_CHOICE_SCHEMA = z.object({
  message: z.object({
    content: z.string().nullable(),
  }),
  finish_reason: z.string(),
});

export const OPENAI_USAGE_SCHEMA = z.object({
  prompt_tokens: z.number(),
  completion_tokens: z.number(),
  total_tokens: z.number(),
});

export const OPENAI_RESPONSE_SCHEMA = z.object({
  choices: z.array(OPENAI_CHOICE_SCHEMA).min(1),
  usage: OPENAI_USAGE_SCHEMA.optional(),
});

// Gemini exposes usage as an optional block on the response
export const GEMINI_USAGE_SCHEMA = z.object({
  promptTokenCount: z.number().default(0),
  candidatesTokenCount: z.number().default(0),
});

// Inferred types
export type OpenAIChoice = z.infer<typeof OPENAI_CHOICE_SCHEMA>;
export type OpenAIUsage = z.infer<typeof OPENAI_USAGE_SCHEMA>;
export type OpenAIResponse = z.infer<typeof OPENAI_RESPONSE_SCHEMA>;
export type GeminiUsage = z.infer<typeof GEMINI_USAGE_SCHEMA>;
