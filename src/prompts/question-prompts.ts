import type { InvestorProfile } from '../questions/types';
import type { Verdict } from '../verification/types';

const QUESTION_FIELDS = `Each question has:
- "question": the question to ask the founders
- "category": a short topic label (e.g. "financials", "market", "team", "product")
- "priority": "high", "medium" or "low"
- "rationale": why the answer matters
- "related_claim_ids": ids of the claims the question follows up on (may be empty)`;

export function buildVerificationQuestionInstructions(profile: InvestorProfile): string {
  return `You are preparing ${profile.name}, a ${profile.investmentStage} investor, for a founder meeting.
Automated web verification could not confirm some of the claims in the pitch deck.
Write pointed questions that would close each verification gap.

Return a JSON object {"questions": [...]}.
${QUESTION_FIELDS}`;
}

export function buildVerificationQuestionContent(companyName: string, verdicts: readonly Verdict[]): string {
  const lines = verdicts.map((v) =>
    `- [${v.claim.id}] (${v.claim.category}, ${v.status}) ${v.claim.text}\n  Finding: ${v.summary}`
  );
  return `COMPANY: ${companyName}\n\nCLAIMS NEEDING FOLLOW-UP:\n${lines.join('\n')}`;
}

export function buildDueDiligenceInstructions(profile: InvestorProfile): string {
  const focus = profile.focusAreas.length > 0 ? profile.focusAreas.join(', ') : 'generalist';
  return `You are an experienced ${profile.investmentStage} investor focused on ${focus}.
Write due-diligence questions for this company that a careful investor at this stage would ask,
weighted toward the investor's focus areas.

Return a JSON object {"questions": [...]}.
${QUESTION_FIELDS}`;
}

export function buildDueDiligenceContent(companyName: string, verdicts: readonly Verdict[]): string {
  const claims = verdicts.map((v) => `- [${v.claim.id}] (${v.claim.category}) ${v.claim.text}`);
  return `COMPANY: ${companyName}\n\nKEY CLAIMS FROM THE DECK:\n${claims.join('\n') || '- none extracted'}`;
}
