import type { OraclePrompt } from '../verification/types';

export const VERIFICATION_INSTRUCTIONS = `You are a due-diligence analyst checking claims made in a startup pitch deck.
You receive one claim and the web evidence gathered for it.

Decide the verification status:
- verified: the evidence directly confirms the claim
- partially_verified: the evidence confirms part of the claim or a close approximation
- unverified: the evidence is related but neither confirms nor refutes the claim
- contradicted: the evidence conflicts with the claim
- unable_to_verify: the evidence is insufficient to judge

Return a JSON object with:
- "status": one of the statuses above
- "summary": 2-3 sentences explaining the result
- "confidence": a number between 0 and 1 expressing how sure you are
- "red_flags": short strings naming concerns an investor should follow up on (may be empty)`;

const MAX_PROMPT_EVIDENCE = 5;

export function buildVerificationContent({ companyName, claim, evidence }: OraclePrompt): string {
  const sources = evidence.slice(0, MAX_PROMPT_EVIDENCE).map((item, i) => [
    `Source ${i + 1}: ${item.sourceDomain}`,
    `URL: ${item.url}`,
    `Content: ${item.snippet}`,
  ].join('\n'));

  return [
    `COMPANY: ${companyName}`,
    `CLAIM: ${claim.text}`,
    `CATEGORY: ${claim.category}`,
    '',
    'EVIDENCE FOUND:',
    sources.join('\n\n'),
  ].join('\n');
}
