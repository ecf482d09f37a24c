import { VerificationStatus, type Verdict } from '../verification/types';

export const STATUS_BASE_SCORES: Readonly<Record<VerificationStatus, number>> = {
  [VerificationStatus.Verified]: 1.0,
  [VerificationStatus.PartiallyVerified]: 0.6,
  [VerificationStatus.Unverified]: 0.3,
  [VerificationStatus.Contradicted]: 0.0,
  // Scores above `unverified`: lack of evidence is not counted against the deck
  [VerificationStatus.UnableToVerify]: 0.4,
};

export const ScoreBand = {
  Strong: 'strong',
  Moderate: 'moderate',
  NeedsReview: 'needs_review',
} as const;

export type ScoreBand = (typeof ScoreBand)[keyof typeof ScoreBand];

/**
 * Confidence-weighted mean of per-claim scores.
 *
 * Each verdict contributes `baseScore(status) * verificationConfidence`,
 * weighted by the claim's extraction confidence. Returns 0 for an empty
 * list or a zero total weight.
 */
export function aggregateDeckScore(verdicts: readonly Verdict[]): number {
  let weightedSum = 0;
  let totalWeight = 0;
  for (const verdict of verdicts) {
    const weight = verdict.claim.confidence;
    weightedSum += weight * STATUS_BASE_SCORES[verdict.status] * verdict.verificationConfidence;
    totalWeight += weight;
  }
  if (totalWeight === 0) return 0;
  return Math.min(1, Math.max(0, weightedSum / totalWeight));
}

export function scoreBand(score: number): ScoreBand {
  if (score >= 0.7) return ScoreBand.Strong;
  if (score >= 0.4) return ScoreBand.Moderate;
  return ScoreBand.NeedsReview;
}

export function scoreBandLabel(band: ScoreBand): string {
  switch (band) {
    case ScoreBand.Strong:
      return 'Strong';
    case ScoreBand.Moderate:
      return 'Moderate';
    case ScoreBand.NeedsReview:
      return 'Needs Review';
  }
}
