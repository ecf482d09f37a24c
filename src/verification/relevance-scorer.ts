import type { Claim } from './types';

export const CREDIBLE_DOMAINS = [
  'crunchbase.com',
  'techcrunch.com',
  'reuters.com',
  'bloomberg.com',
  'forbes.com',
] as const;

export const RELEVANCE_WEIGHTS = {
  wordOverlap: 0.6,
  numberMatch: 0.2,
  credibleSource: 0.2,
} as const;

export interface RelevanceInput {
  snippet: string;
  sourceDomain: string;
}

// Keeps a leading currency sign and a trailing percent so "$5M," and "300%." stay meaningful
function normalizeToken(raw: string): string {
  return raw
    .replace(/^[^\p{L}\p{N}$]+/u, '')
    .replace(/[^\p{L}\p{N}%]+$/u, '');
}

/**
 * Case-folded, whitespace-split word set with punctuation trimmed from
 * token ends.
 */
export function wordSet(text: string): Set<string> {
  const words = new Set<string>();
  for (const raw of text.toLowerCase().split(/\s+/)) {
    const token = normalizeToken(raw);
    if (token) words.add(token);
  }
  return words;
}

function numberSet(text: string): Set<string> {
  return new Set(text.match(/\d+/g) ?? []);
}

export function wordOverlap(claimText: string, snippet: string): number {
  const claimWords = wordSet(claimText);
  const snippetWords = wordSet(snippet);
  let shared = 0;
  for (const word of claimWords) {
    if (snippetWords.has(word)) shared++;
  }
  return shared / Math.max(claimWords.size, 1);
}

export function hasNumberMatch(claimText: string, snippet: string): boolean {
  const snippetNumbers = numberSet(snippet);
  for (const n of numberSet(claimText)) {
    if (snippetNumbers.has(n)) return true;
  }
  return false;
}

export function isCredibleSource(sourceDomain: string): boolean {
  const domain = sourceDomain.toLowerCase();
  return CREDIBLE_DOMAINS.some((credible) => domain.includes(credible));
}

/**
 * Scores how relevant a search snippet is to a claim, in [0, 1].
 *
 * 0.6 x word overlap (share of claim words present in the snippet)
 * + 0.2 if any digit run appears in both
 * + 0.2 if the snippet comes from a known business-press domain
 */
export function scoreRelevance(evidence: RelevanceInput, claim: Pick<Claim, 'text'>): number {
  const score =
    RELEVANCE_WEIGHTS.wordOverlap * wordOverlap(claim.text, evidence.snippet) +
    (hasNumberMatch(claim.text, evidence.snippet) ? RELEVANCE_WEIGHTS.numberMatch : 0) +
    (isCredibleSource(evidence.sourceDomain) ? RELEVANCE_WEIGHTS.credibleSource : 0);
  return Math.min(1, Math.max(0, score));
}
