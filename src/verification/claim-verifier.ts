import type { SearchProvider, SearchResult } from '../providers/search-provider';
import { handleUnknownError } from '../errors/index';
import { debug, warn } from '../output/logger';
import { MAX_EVIDENCE_PER_VERDICT, QUERIES_PER_CLAIM, RELEVANCE_THRESHOLD } from '../config/constants';
import { generateSearchQueries } from './query-generator';
import { scoreRelevance } from './relevance-scorer';
import { supportsClaim } from './support-classifier';
import {
  VerificationStatus,
  freezeVerdict,
  type Claim,
  type ClaimVerifier,
  type EvidenceItem,
  type NarrativeOracle,
  type Verdict,
} from './types';

export const NO_EVIDENCE_VERDICT = {
  confidence: 0.2,
  summary: 'No relevant evidence found through web search. This claim could not be independently verified.',
  redFlag: 'No external sources found to verify this claim',
} as const;

export const ORACLE_ERROR_VERDICT = {
  confidence: 0.3,
  summaryPrefix: 'Error during verification analysis: ',
  redFlag: 'Automated verification encountered an error',
} as const;

export interface VerifierOptions {
  relevanceThreshold?: number;
  maxEvidence?: number;
  queriesPerClaim?: number;
  now?: () => Date;
}

/** Verdict for a claim whose verification failed unexpectedly. */
export function errorVerdict(claim: Claim, message: string): Verdict {
  return freezeVerdict({
    claim,
    status: VerificationStatus.UnableToVerify,
    evidence: [],
    summary: `${ORACLE_ERROR_VERDICT.summaryPrefix}${message}`,
    verificationConfidence: ORACLE_ERROR_VERDICT.confidence,
    redFlags: [ORACLE_ERROR_VERDICT.redFlag],
  });
}

/**
 * Verifies one claim against web evidence.
 *
 * Search failures count as "no results" and oracle failures become an
 * `unable_to_verify` verdict, so `verify` always resolves.
 */
export class WebClaimVerifier implements ClaimVerifier {
  private readonly relevanceThreshold: number;
  private readonly maxEvidence: number;
  private readonly queriesPerClaim: number;
  private readonly now: () => Date;

  constructor(
    private readonly search: SearchProvider,
    private readonly oracle: NarrativeOracle,
    options: VerifierOptions = {}
  ) {
    this.relevanceThreshold = options.relevanceThreshold ?? RELEVANCE_THRESHOLD;
    this.maxEvidence = options.maxEvidence ?? MAX_EVIDENCE_PER_VERDICT;
    this.queriesPerClaim = options.queriesPerClaim ?? QUERIES_PER_CLAIM;
    this.now = options.now ?? (() => new Date());
  }

  async verify(claim: Claim, companyName: string): Promise<Verdict> {
    const queries = generateSearchQueries(claim, companyName).slice(0, this.queriesPerClaim);
    const evidence = await this.collectEvidence(claim, queries);

    if (evidence.length === 0) {
      return freezeVerdict({
        claim,
        status: VerificationStatus.UnableToVerify,
        evidence: [],
        summary: NO_EVIDENCE_VERDICT.summary,
        verificationConfidence: NO_EVIDENCE_VERDICT.confidence,
        redFlags: [NO_EVIDENCE_VERDICT.redFlag],
      });
    }

    const kept = evidence.slice(0, this.maxEvidence);
    try {
      const judgement = await this.oracle.completeStructured({ companyName, claim, evidence: kept });
      return freezeVerdict({
        claim,
        status: judgement.status,
        evidence: kept,
        summary: judgement.summary,
        verificationConfidence: Math.min(1, Math.max(0, judgement.confidence)),
        redFlags: judgement.redFlags,
      });
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'Verification analysis');
      warn(`Verification analysis failed for ${claim.id}: ${err.message}`);
      return freezeVerdict({ ...errorVerdict(claim, err.message), evidence: kept });
    }
  }

  private async collectEvidence(claim: Claim, queries: string[]): Promise<EvidenceItem[]> {
    const evidence: EvidenceItem[] = [];
    for (const query of queries) {
      const results = await this.searchSafely(query);
      const retrievedAt = this.now().toISOString();
      for (const result of results) {
        const relevance = scoreRelevance(result, claim);
        if (relevance <= this.relevanceThreshold) continue;
        evidence.push({
          url: result.url,
          sourceDomain: result.sourceDomain,
          snippet: result.snippet,
          relevance,
          supports: supportsClaim(result.snippet),
          retrievedAt,
        });
      }
    }
    debug(`${claim.id}: ${evidence.length} evidence item(s) above threshold from ${queries.length} quer${queries.length === 1 ? 'y' : 'ies'}`);
    // Array.prototype.sort is stable, so equal scores keep retrieval order
    return evidence.sort((a, b) => b.relevance - a.relevance);
  }

  private async searchSafely(query: string): Promise<SearchResult[]> {
    try {
      return await this.search.search(query);
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'Web search');
      warn(`Search failed for "${query.slice(0, 60)}": ${err.message}`);
      return [];
    }
  }
}
