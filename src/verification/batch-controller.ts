import { handleUnknownError } from '../errors/index';
import { VERIFICATION_BUDGET, VERIFICATION_CONCURRENCY } from '../config/constants';
import { log, warn } from '../output/logger';
import { errorVerdict } from './claim-verifier';
import { runWithConcurrency } from './run-with-concurrency';
import { VerificationStatus, freezeVerdict, type Claim, type ClaimVerifier, type Verdict } from './types';

export const SKIPPED_VERDICT = {
  confidence: 0.3,
  summary: 'Skipped to conserve API quota.',
} as const;

export interface BatchControllerOptions {
  /** Claims beyond this count are not searched. */
  budget?: number;
  concurrency?: number;
}

export function skippedVerdict(claim: Claim): Verdict {
  return freezeVerdict({
    claim,
    status: VerificationStatus.UnableToVerify,
    evidence: [],
    summary: SKIPPED_VERDICT.summary,
    verificationConfidence: SKIPPED_VERDICT.confidence,
    redFlags: [],
  });
}

/**
 * Applies a claim verifier across a prioritized claim list under a fixed
 * budget. The returned verdicts match the input one-to-one and in order.
 */
export class BatchVerificationController {
  private readonly budget: number;
  private readonly concurrency: number;

  constructor(private readonly verifier: ClaimVerifier, options: BatchControllerOptions = {}) {
    this.budget = Math.max(0, options.budget ?? VERIFICATION_BUDGET);
    this.concurrency = Math.max(1, options.concurrency ?? VERIFICATION_CONCURRENCY);
  }

  async verifyAll(claims: readonly Claim[], companyName: string): Promise<Verdict[]> {
    const verified = claims.slice(0, this.budget);
    const skipped = claims.slice(this.budget);
    let done = 0;

    const fullVerdicts = await runWithConcurrency(verified, this.concurrency, async (claim) => {
      const verdict = await this.verifyOne(claim, companyName);
      done++;
      log(`Verified ${done}/${verified.length}: ${claim.id} -> ${verdict.status}`);
      return verdict;
    });

    if (skipped.length > 0) {
      log(`Skipping web verification for ${skipped.length} lower-priority claim(s) (budget ${this.budget})`);
    }

    return [...fullVerdicts, ...skipped.map(skippedVerdict)];
  }

  private async verifyOne(claim: Claim, companyName: string): Promise<Verdict> {
    try {
      return await this.verifier.verify(claim, companyName);
    } catch (e: unknown) {
      const err = handleUnknownError(e, `Verifying ${claim.id}`);
      warn(`Verification of ${claim.id} failed: ${err.message}`);
      return errorVerdict(claim, err.message);
    }
  }
}
