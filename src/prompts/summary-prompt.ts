import type { Verdict } from '../verification/types';

export const SUMMARY_INSTRUCTIONS = `Write a concise executive summary (3-4 sentences) of a pitch-deck verification for an investor.
Cover the overall credibility of the deck, the strongest verified points and the main open concerns.
Return a JSON object {"summary": "..."}.`;

export function buildSummaryContent(companyName: string, deckScore: number, verdicts: readonly Verdict[]): string {
  const rows = verdicts.map((v) => `- ${v.status}: ${v.claim.text}`);
  return [
    `COMPANY: ${companyName}`,
    `VERIFICATION SCORE: ${Math.round(deckScore * 100)}%`,
    '',
    'CLAIM OUTCOMES:',
    rows.join('\n') || '- no claims analyzed',
  ].join('\n');
}
