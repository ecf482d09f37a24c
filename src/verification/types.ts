export const ClaimCategory = {
  MarketSize: 'market_size',
  Revenue: 'revenue',
  GrowthMetrics: 'growth_metrics',
  TeamBackground: 'team_background',
  CompetitiveLandscape: 'competitive_landscape',
  CustomerClaims: 'customer_claims',
  Technology: 'technology',
  Partnerships: 'partnerships',
  FundingHistory: 'funding_history',
  Other: 'other',
} as const;

export type ClaimCategory = (typeof ClaimCategory)[keyof typeof ClaimCategory];

export const CLAIM_CATEGORIES: readonly ClaimCategory[] = Object.values(ClaimCategory);

export const VerificationStatus = {
  Verified: 'verified',
  PartiallyVerified: 'partially_verified',
  Unverified: 'unverified',
  Contradicted: 'contradicted',
  UnableToVerify: 'unable_to_verify',
} as const;

export type VerificationStatus = (typeof VerificationStatus)[keyof typeof VerificationStatus];

export const VERIFICATION_STATUSES: readonly VerificationStatus[] = Object.values(VerificationStatus);

function isClaimCategory(value: string): value is ClaimCategory {
  return CLAIM_CATEGORIES.some((c) => c === value);
}

function isVerificationStatus(value: string): value is VerificationStatus {
  return VERIFICATION_STATUSES.some((s) => s === value);
}

/** Unknown or missing categories fall back to `other`. */
export function parseClaimCategory(value: unknown): ClaimCategory {
  if (typeof value !== 'string') return ClaimCategory.Other;
  const normalized = value.trim().toLowerCase();
  return isClaimCategory(normalized) ? normalized : ClaimCategory.Other;
}

/** Unknown or missing statuses fall back to `unable_to_verify`. */
export function parseVerificationStatus(value: unknown): VerificationStatus {
  if (typeof value !== 'string') return VerificationStatus.UnableToVerify;
  const normalized = value.trim().toLowerCase();
  return isVerificationStatus(normalized) ? normalized : VerificationStatus.UnableToVerify;
}

export interface Claim {
  readonly id: string;
  readonly text: string;
  readonly category: ClaimCategory;
  readonly sourceLocation: string;
  readonly context: string;
  /** How likely the text is a genuine verifiable assertion, in [0, 1]. */
  readonly confidence: number;
}

export interface EvidenceItem {
  readonly url: string;
  readonly sourceDomain: string;
  readonly snippet: string;
  readonly relevance: number;
  readonly supports: boolean;
  /** ISO-8601 timestamp */
  readonly retrievedAt: string;
}

export interface Verdict {
  readonly claim: Claim;
  readonly status: VerificationStatus;
  /** Sorted by relevance, most relevant first. */
  readonly evidence: readonly EvidenceItem[];
  readonly summary: string;
  readonly verificationConfidence: number;
  readonly redFlags: readonly string[];
}

export interface OracleJudgement {
  status: VerificationStatus;
  summary: string;
  confidence: number;
  redFlags: string[];
}

/*
 * Prompt material handed to the narrative oracle once evidence survived
 * relevance filtering.
 */
export interface OraclePrompt {
  companyName: string;
  claim: Claim;
  evidence: readonly EvidenceItem[];
}

export interface NarrativeOracle {
  completeStructured(prompt: OraclePrompt): Promise<OracleJudgement>;
}

export interface ClaimVerifier {
  verify(claim: Claim, companyName: string): Promise<Verdict>;
}

export function freezeVerdict(verdict: Verdict): Verdict {
  return Object.freeze({
    ...verdict,
    evidence: Object.freeze(verdict.evidence.map((e) => Object.freeze({ ...e }))),
    redFlags: Object.freeze([...verdict.redFlags]),
  });
}
