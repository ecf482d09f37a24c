export const QuestionPriority = {
  High: 'high',
  Medium: 'medium',
  Low: 'low',
} as const;

export type QuestionPriority = (typeof QuestionPriority)[keyof typeof QuestionPriority];

export interface InvestorProfile {
  name: string;
  focusAreas: string[];
  investmentStage: string;
}

export interface InvestorQuestion {
  question: string;
  category: string;
  priority: QuestionPriority;
  rationale: string;
  relatedClaimIds: string[];
  /** Which part of the investor profile the question speaks to, if any. */
  personalizationContext: string;
}
