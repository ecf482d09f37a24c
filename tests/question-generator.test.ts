import { beforeAll, afterAll, describe, it, expect } from 'vitest';
import { QuestionGenerator, questionRank, rankQuestions } from '../src/questions/question-generator';
import { QuestionPriority, type InvestorProfile, type InvestorQuestion } from '../src/questions/types';
import { VerificationStatus, freezeVerdict, type Verdict } from '../src/verification/types';
import { setSilentMode } from '../src/output/logger';
import { FakeLLMProvider, makeClaim, type RecordedCall } from './utils';

const PROFILE: InvestorProfile = {
  name: 'Test Fund',
  focusAreas: ['FinTech', 'machine learning'],
  investmentStage: 'Seed',
};

function verdict(id: string, status: VerificationStatus, summary: string): Verdict {
  return freezeVerdict({
    claim: makeClaim({ id }),
    status,
    evidence: [],
    summary,
    verificationConfidence: 0.5,
    redFlags: [],
  });
}

function question(overrides: Partial<InvestorQuestion>): InvestorQuestion {
  return {
    question: 'What is your churn?',
    category: 'general',
    priority: QuestionPriority.Medium,
    rationale: '',
    relatedClaimIds: [],
    personalizationContext: '',
    ...overrides,
  };
}

const isGapRequest = (call: RecordedCall): boolean => call.content.includes('CLAIMS NEEDING FOLLOW-UP');

describe('question ranking', () => {
  it('lowers the rank for focus areas and linked claims', () => {
    expect(questionRank(question({ priority: QuestionPriority.High }), PROFILE)).toBe(0);
    expect(questionRank(question({ question: 'How do you price FINTECH partners?' }), PROFILE)).toBe(0.5);
    expect(questionRank(question({ priority: QuestionPriority.Low, relatedClaimIds: ['claim_0001'] }), PROFILE)).toBeCloseTo(1.7);
  });

  it('keeps input order for equal ranks and caps the list', () => {
    const ranked = rankQuestions(
      [question({ question: 'A' }), question({ question: 'B', priority: QuestionPriority.High }), question({ question: 'C' })],
      PROFILE,
      2
    );
    expect(ranked.map((q) => q.question)).toEqual(['B', 'A']);
  });
});

describe('QuestionGenerator', () => {
  beforeAll(() => setSilentMode(true));
  afterAll(() => setSilentMode(false));

  const verdicts = [
    verdict('claim_0001', VerificationStatus.Verified, 'Confirmed.'),
    verdict('claim_0002', VerificationStatus.Unverified, 'No press coverage.'),
  ];

  it('merges gap and due-diligence questions in rank order', async () => {
    const provider = new FakeLLMProvider({
      submit_questions: (call) =>
        isGapRequest(call)
          ? {
              questions: [
                {
                  question: 'Can you share audited revenue?',
                  category: 'financials',
                  priority: 'high',
                  rationale: 'Revenue is unconfirmed',
                  related_claim_ids: ['claim_0002'],
                },
              ],
            }
          : {
              questions: [
                { question: 'How does your machine learning model handle drift?', priority: 'medium', rationale: 'Core tech' },
                { question: 'What is your burn rate?', priority: 'low' },
                { question: '   ' },
                { question: 'Who are your competitors?', priority: 'urgent' },
              ],
            },
    });

    const questions = await new QuestionGenerator(provider).generateQuestions(verdicts, PROFILE, 'Acme', 3);

    expect(questions).toEqual([
      {
        question: 'Can you share audited revenue?',
        category: 'financials',
        priority: 'high',
        rationale: 'Revenue is unconfirmed',
        relatedClaimIds: ['claim_0002'],
        personalizationContext: 'Verification gap',
      },
      {
        question: 'How does your machine learning model handle drift?',
        category: 'general',
        priority: 'medium',
        rationale: 'Core tech',
        relatedClaimIds: [],
        personalizationContext: 'Focus area: machine learning',
      },
      {
        question: 'Who are your competitors?',
        category: 'general',
        priority: 'medium',
        rationale: '',
        relatedClaimIds: [],
        personalizationContext: 'Seed due diligence',
      },
    ]);

    const [gapCall] = provider.calls;
    expect(gapCall?.content).toBe(
      'COMPANY: Acme\n\nCLAIMS NEEDING FOLLOW-UP:\n' +
        '- [claim_0002] (revenue, unverified) Revenue grew 300% in 2023\n  Finding: No press coverage.'
    );
  });

  it('skips the gap request when every claim is verified', async () => {
    const provider = new FakeLLMProvider({ submit_questions: () => ({ questions: [] }) });
    await new QuestionGenerator(provider).generateQuestions(verdicts.slice(0, 1), PROFILE, 'Acme', 5);

    expect(provider.calls).toHaveLength(1);
    expect(provider.calls[0]?.content).toBe(
      'COMPANY: Acme\n\nKEY CLAIMS FROM THE DECK:\n- [claim_0001] (revenue) Revenue grew 300% in 2023'
    );
  });

  it('returns nothing without calling the model when no questions are wanted', async () => {
    const provider = new FakeLLMProvider({ submit_questions: () => ({ questions: [] }) });
    await expect(new QuestionGenerator(provider).generateQuestions(verdicts, PROFILE, 'Acme', 0)).resolves.toEqual([]);
    expect(provider.calls).toHaveLength(0);
  });

  it('keeps due-diligence questions when the gap request fails', async () => {
    const provider = new FakeLLMProvider({
      submit_questions: (call) => {
        if (isGapRequest(call)) throw new Error('quota exceeded');
        return { questions: [{ question: 'What is your CAC?', priority: 'high' }] };
      },
    });
    const questions = await new QuestionGenerator(provider).generateQuestions(verdicts, PROFILE, 'Acme', 5);
    expect(questions.map((q) => q.question)).toEqual(['What is your CAC?']);
  });

  it('drops a malformed reply', async () => {
    const provider = new FakeLLMProvider({ submit_questions: () => ({ items: [] }) });
    await expect(new QuestionGenerator(provider).generateQuestions(verdicts, PROFILE, 'Acme', 5)).resolves.toEqual([]);
  });
});
