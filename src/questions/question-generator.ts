import { z } from 'zod';
import type { LLMProvider, StructuredSchema } from '../providers/llm-provider';
import { QUESTIONS_OUTPUT_SCHEMA, toStructuredSchema } from '../schemas/structured-output';
import { SchemaValidationError } from '../errors/validation-errors';
import { handleUnknownError } from '../errors/index';
import {
  buildDueDiligenceContent,
  buildDueDiligenceInstructions,
  buildVerificationQuestionContent,
  buildVerificationQuestionInstructions,
} from '../prompts/question-prompts';
import { warn } from '../output/logger';
import { VerificationStatus, type Verdict } from '../verification/types';
import { QuestionPriority, type InvestorProfile, type InvestorQuestion } from './types';

const MAX_GAP_VERDICTS = 10;

const PRIORITY_RANK: Readonly<Record<QuestionPriority, number>> = {
  [QuestionPriority.High]: 0,
  [QuestionPriority.Medium]: 1,
  [QuestionPriority.Low]: 2,
};

const FOCUS_BONUS = 0.5;
const CLAIM_LINK_BONUS = 0.3;

const QUESTION_REPLY_SCHEMA = z.object({
  questions: z.array(z.object({
    question: z.string().optional(),
    category: z.string().optional(),
    priority: z.string().optional(),
    rationale: z.string().optional(),
    related_claim_ids: z.array(z.string()).optional(),
  })),
});

function parsePriority(value: string | undefined): QuestionPriority {
  switch (value?.trim().toLowerCase()) {
    case QuestionPriority.High:
      return QuestionPriority.High;
    case QuestionPriority.Low:
      return QuestionPriority.Low;
    default:
      return QuestionPriority.Medium;
  }
}

function matchedFocusArea(question: string, profile: InvestorProfile): string | undefined {
  const lower = question.toLowerCase();
  return profile.focusAreas.find((area) => area.trim() && lower.includes(area.trim().toLowerCase()));
}

/**
 * Sort key for a question: priority rank, lowered when the question
 * touches one of the investor's focus areas or follows up on claims.
 */
export function questionRank(question: InvestorQuestion, profile: InvestorProfile): number {
  let rank = PRIORITY_RANK[question.priority];
  if (matchedFocusArea(question.question, profile)) rank -= FOCUS_BONUS;
  if (question.relatedClaimIds.length > 0) rank -= CLAIM_LINK_BONUS;
  return rank;
}

export function rankQuestions(
  questions: readonly InvestorQuestion[],
  profile: InvestorProfile,
  maxQuestions: number
): InvestorQuestion[] {
  return questions
    .map((question) => ({ question, rank: questionRank(question, profile) }))
    .sort((a, b) => a.rank - b.rank)
    .slice(0, maxQuestions)
    .map((entry) => entry.question);
}

export class QuestionGenerator {
  private readonly schema: StructuredSchema = toStructuredSchema('submit_questions', QUESTIONS_OUTPUT_SCHEMA);

  constructor(private readonly provider: LLMProvider) {}

  async generateQuestions(
    verdicts: readonly Verdict[],
    profile: InvestorProfile,
    companyName: string,
    maxQuestions: number
  ): Promise<InvestorQuestion[]> {
    if (maxQuestions <= 0) return [];

    const gaps = verdicts
      .filter((v) => v.status !== VerificationStatus.Verified)
      .slice(0, MAX_GAP_VERDICTS);

    const verificationQuestions = gaps.length > 0
      ? await this.request(
        'verification',
        buildVerificationQuestionContent(companyName, gaps),
        buildVerificationQuestionInstructions(profile),
        profile,
        'Verification gap'
      )
      : [];

    const dueDiligenceQuestions = await this.request(
      'due diligence',
      buildDueDiligenceContent(companyName, verdicts),
      buildDueDiligenceInstructions(profile),
      profile,
      `${profile.investmentStage} due diligence`
    );

    return rankQuestions([...verificationQuestions, ...dueDiligenceQuestions], profile, maxQuestions);
  }

  private async request(
    kind: string,
    content: string,
    instructions: string,
    profile: InvestorProfile,
    defaultContext: string
  ): Promise<InvestorQuestion[]> {
    let data: unknown;
    try {
      data = (await this.provider.runPromptStructured(content, instructions, this.schema)).data;
    } catch (e: unknown) {
      const err = handleUnknownError(e, `Generating ${kind} questions`);
      warn(`Generating ${kind} questions failed: ${err.message}`);
      return [];
    }

    const reply = QUESTION_REPLY_SCHEMA.safeParse(data);
    if (!reply.success) {
      const err = new SchemaValidationError(reply.error.message, 'questions', data, reply.error);
      warn(`Generating ${kind} questions failed: ${err.message}`);
      return [];
    }

    const questions: InvestorQuestion[] = [];
    for (const raw of reply.data.questions) {
      const text = raw.question?.trim();
      if (!text) continue;
      const focus = matchedFocusArea(text, profile);
      questions.push({
        question: text,
        category: raw.category?.trim() || 'general',
        priority: parsePriority(raw.priority),
        rationale: raw.rationale?.trim() ?? '',
        relatedClaimIds: raw.related_claim_ids ?? [],
        personalizationContext: focus ? `Focus area: ${focus.trim()}` : defaultContext,
      });
    }
    return questions;
  }
}
