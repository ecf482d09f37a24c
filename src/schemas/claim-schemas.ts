import { z } from 'zod';
import { ValidationError } from '../errors/index';
import { CLAIM_CATEGORIES, type Claim, type ClaimCategory } from '../verification/types';

const CLAIM_CATEGORY_SCHEMA = z.custom<ClaimCategory>(
  (value) => typeof value === 'string' && CLAIM_CATEGORIES.some((c) => c === value),
  { message: `category must be one of: ${CLAIM_CATEGORIES.join(', ')}` }
);

// Contract for claims entering the verification pipeline
export const CLAIM_SCHEMA = z.object({
  id: z.string().min(1),
  text: z.string().trim().min(1),
  category: CLAIM_CATEGORY_SCHEMA,
  sourceLocation: z.string().default(''),
  context: z.string().default(''),
  confidence: z.number().min(0).max(1),
});

export const CLAIM_LIST_SCHEMA = z.array(z.unknown());

export type ClaimInput = z.input<typeof CLAIM_SCHEMA>;

/**
 * Builds an immutable claim, failing fast on contract violations such as a
 * negative confidence or an empty text.
 */
export function createClaim(input: unknown): Claim {
  const result = CLAIM_SCHEMA.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'claim'}: ${issue.message}`)
      .join(', ');
    throw new ValidationError(`Invalid claim: ${details}`, result.error);
  }
  return Object.freeze({ ...result.data });
}

/**
 * Validates a JSON array of claims (as written by `deckproof analyze`
 * or prepared by hand) for the verify command.
 */
export function parseClaimList(raw: unknown): Claim[] {
  const list = CLAIM_LIST_SCHEMA.safeParse(raw);
  if (!list.success) {
    throw new ValidationError('Claims file must contain a JSON array of claims', list.error);
  }
  return list.data.map((item, index) => {
    try {
      return createClaim(item);
    } catch (e: unknown) {
      const message = e instanceof Error ? e.message : String(e);
      throw new ValidationError(`Claim #${index + 1}: ${message}`, e);
    }
  });
}
