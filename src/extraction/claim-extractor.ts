import { z } from 'zod';
import type { LLMProvider } from '../providers/llm-provider';
import { EXTRACTION_OUTPUT_SCHEMA, toStructuredSchema } from '../schemas/structured-output';
import { createClaim } from '../schemas/claim-schemas';
import { SchemaValidationError } from '../errors/validation-errors';
import { handleUnknownError } from '../errors/index';
import { EXTRACTION_TEXT_LIMIT, MAX_EXTRACTED_CLAIMS } from '../config/constants';
import { buildExtractionInstructions } from '../prompts/extraction-prompt';
import { formatPagesForExtraction } from '../boundaries/document-loader';
import { wordSet } from '../verification/relevance-scorer';
import { debug, warn } from '../output/logger';
import { ClaimCategory, parseClaimCategory, type Claim } from '../verification/types';

export const CATEGORY_PRIORITY: Readonly<Record<ClaimCategory, number>> = {
  [ClaimCategory.Revenue]: 1,
  [ClaimCategory.GrowthMetrics]: 2,
  [ClaimCategory.MarketSize]: 3,
  [ClaimCategory.CustomerClaims]: 4,
  [ClaimCategory.TeamBackground]: 5,
  [ClaimCategory.Partnerships]: 6,
  [ClaimCategory.FundingHistory]: 7,
  [ClaimCategory.CompetitiveLandscape]: 8,
  [ClaimCategory.Technology]: 9,
  [ClaimCategory.Other]: 10,
};

export const DUPLICATE_SIMILARITY = 0.8;
const DEFAULT_CONFIDENCE = 0.5;

const EXTRACTION_REPLY_SCHEMA = z.object({
  claims: z.array(z.object({
    text: z.string().optional(),
    category: z.unknown().optional(),
    confidence: z.union([z.number(), z.string()]).optional(),
    page: z.union([z.number(), z.string()]).optional(),
    context: z.string().optional(),
  })),
});

export interface ClaimExtractorOptions {
  maxClaims?: number;
  textLimit?: number;
}

function toConfidence(value: number | string | undefined): number {
  const n = typeof value === 'string' ? Number(value) : value;
  if (n === undefined || !Number.isFinite(n)) return DEFAULT_CONFIDENCE;
  return Math.min(1, Math.max(0, n));
}

function toPage(value: number | string | undefined): number {
  const n = typeof value === 'string' ? parseInt(value, 10) : value;
  return n !== undefined && Number.isInteger(n) && n > 0 ? n : 1;
}

export function jaccardSimilarity(a: string, b: string): number {
  const wordsA = wordSet(a);
  const wordsB = wordSet(b);
  if (wordsA.size === 0 && wordsB.size === 0) return 1;
  let shared = 0;
  for (const word of wordsA) {
    if (wordsB.has(word)) shared++;
  }
  return shared / (wordsA.size + wordsB.size - shared);
}

/** Keeps the first of any group of near-identical claim texts. */
export function deduplicateClaims<T extends { text: string }>(claims: readonly T[]): T[] {
  const kept: T[] = [];
  for (const claim of claims) {
    const duplicate = kept.some((k) => jaccardSimilarity(k.text, claim.text) > DUPLICATE_SIMILARITY);
    if (!duplicate) kept.push(claim);
  }
  return kept;
}

/**
 * Orders claims by category priority, then by descending confidence.
 * The sort is stable, so ties keep extraction order.
 */
export function prioritizeClaims(claims: readonly Claim[]): Claim[] {
  return [...claims].sort((a, b) =>
    CATEGORY_PRIORITY[a.category] - CATEGORY_PRIORITY[b.category] ||
    b.confidence - a.confidence
  );
}

export function formatClaimId(index: number): string {
  return `claim_${String(index + 1).padStart(4, '0')}`;
}

export class ClaimExtractor {
  private readonly maxClaims: number;
  private readonly textLimit: number;
  private readonly schema = toStructuredSchema('submit_claims', EXTRACTION_OUTPUT_SCHEMA);

  constructor(private readonly provider: LLMProvider, options: ClaimExtractorOptions = {}) {
    this.maxClaims = options.maxClaims ?? MAX_EXTRACTED_CLAIMS;
    this.textLimit = options.textLimit ?? EXTRACTION_TEXT_LIMIT;
  }

  /**
   * Extracts, deduplicates and numbers the claims in a document.
   * Returns an empty list when the model call or its reply fails.
   */
  async extractClaims(pages: readonly string[]): Promise<Claim[]> {
    if (pages.every((page) => !page.trim())) return [];
    const content = formatPagesForExtraction(pages).slice(0, this.textLimit);

    let data: unknown;
    try {
      const result = await this.provider.runPromptStructured(
        content,
        buildExtractionInstructions(this.maxClaims),
        this.schema
      );
      data = result.data;
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'Claim extraction');
      warn(`Claim extraction failed: ${err.message}`);
      return [];
    }

    const reply = EXTRACTION_REPLY_SCHEMA.safeParse(data);
    if (!reply.success) {
      const err = new SchemaValidationError(reply.error.message, 'claim_extraction', data, reply.error);
      warn(`Claim extraction failed: ${err.message}`);
      return [];
    }

    const candidates = reply.data.claims
      .map((raw) => ({
        text: raw.text?.trim() ?? '',
        category: parseClaimCategory(raw.category),
        confidence: toConfidence(raw.confidence),
        page: toPage(raw.page),
        context: raw.context?.trim() ?? '',
      }))
      .filter((c) => c.text.length > 0);

    const unique = deduplicateClaims(candidates).slice(0, this.maxClaims);
    debug(`Extracted ${candidates.length} claim(s), ${unique.length} after de-duplication`);

    return unique.map((c, i) => createClaim({
      id: formatClaimId(i),
      text: c.text,
      category: c.category,
      sourceLocation: `page ${c.page}`,
      context: c.context,
      confidence: c.confidence,
    }));
  }
}
