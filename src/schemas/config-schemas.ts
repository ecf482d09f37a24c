import { z } from 'zod';
import * as C from '../config/constants';

// Configuration file schema for .deckproof.ini validation
export const CONFIG_SCHEMA = z.object({
  budget: z.number().int().min(0).default(C.VERIFICATION_BUDGET),
  // Both may only tighten: evidence at or below 0.3 never counts, and a verdict keeps at most 5 items
  relevanceThreshold: z.number().min(C.RELEVANCE_THRESHOLD).max(1).default(C.RELEVANCE_THRESHOLD),
  maxEvidence: z.number().int().positive().max(C.MAX_EVIDENCE_PER_VERDICT).default(C.MAX_EVIDENCE_PER_VERDICT),
  queriesPerClaim: z.number().int().positive().default(C.QUERIES_PER_CLAIM),
  concurrency: z.number().int().positive().default(C.VERIFICATION_CONCURRENCY),
  maxClaims: z.number().int().positive().default(C.MAX_CLAIMS),
  maxQuestions: z.number().int().min(0).default(C.MAX_QUESTIONS),
  searchPauseMs: z.number().int().min(0).default(C.SEARCH_PAUSE_MS),
  searchRetries: z.number().int().min(0).default(C.SEARCH_RETRIES),
  searchBackoffMs: z.number().int().min(0).default(C.SEARCH_BACKOFF_BASE_MS),
  searchTimeoutMs: z.number().int().positive().default(C.SEARCH_TIMEOUT_MS),
  maxSearchResults: z.number().int().positive().max(20).default(C.MAX_SEARCH_RESULTS),
  investor: z
    .object({
      name: z.string().min(1).optional(),
      focusAreas: z.array(z.string().min(1)).optional(),
      stage: z.string().min(1).optional(),
    })
    .default({}),
  configPath: z.string().optional(),
});

// Inferred types
export type Config = z.infer<typeof CONFIG_SCHEMA>;
