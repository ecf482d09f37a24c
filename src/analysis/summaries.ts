import { z } from 'zod';
import type { LLMProvider } from '../providers/llm-provider';
import { SUMMARY_OUTPUT_SCHEMA, toStructuredSchema } from '../schemas/structured-output';
import { SUMMARY_INSTRUCTIONS, buildSummaryContent } from '../prompts/summary-prompt';
import { handleUnknownError } from '../errors/index';
import { warn } from '../output/logger';
import { VerificationStatus, type Verdict } from '../verification/types';

export const MAX_RISK_FLAGS = 7;
export const NO_RISK_TEXT =
  'No significant red flags identified during automated verification. Standard due diligence still recommended.';

const SUMMARY_REPLY_SCHEMA = z.object({ summary: z.string().min(1) });
const SUMMARY_SCHEMA = toStructuredSchema('submit_summary', SUMMARY_OUTPUT_SCHEMA);

export function fallbackSummary(companyName: string, deckScore: number, verdicts: readonly Verdict[]): string {
  const verified = verdicts.filter((v) => v.status === VerificationStatus.Verified).length;
  const contradicted = verdicts.filter((v) => v.status === VerificationStatus.Contradicted).length;
  return `Analysis of ${companyName}'s pitch deck completed with a ${Math.round(deckScore * 100)}% verification score. ` +
    `${verified} claims verified, ${contradicted} contradicted.`;
}

export async function writeExecutiveSummary(
  provider: LLMProvider,
  companyName: string,
  deckScore: number,
  verdicts: readonly Verdict[]
): Promise<string> {
  try {
    const result = await provider.runPromptStructured(
      buildSummaryContent(companyName, deckScore, verdicts),
      SUMMARY_INSTRUCTIONS,
      SUMMARY_SCHEMA
    );
    const reply = SUMMARY_REPLY_SCHEMA.safeParse(result.data);
    if (reply.success) return reply.data.summary.trim();
    warn('Executive summary reply had no summary text; using fallback');
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Executive summary');
    warn(`Executive summary failed: ${err.message}`);
  }
  return fallbackSummary(companyName, deckScore, verdicts);
}

/**
 * Bullet list of distinct red flags across all verdicts, in verdict order.
 */
export function assessRisk(verdicts: readonly Verdict[]): string {
  const flags: string[] = [];
  for (const verdict of verdicts) {
    for (const flag of verdict.redFlags) {
      if (!flags.includes(flag)) flags.push(flag);
    }
  }
  if (flags.length === 0) return NO_RISK_TEXT;
  const bullets = flags.slice(0, MAX_RISK_FLAGS).map((flag) => `• ${flag}`);
  return `Potential concerns identified:\n${bullets.join('\n')}`;
}
