import type { InvestorProfile, InvestorQuestion } from '../questions/types';
import type { ScoreBand } from '../scoring/deck-score';
import type { TokenUsageStats } from '../types/token-usage';
import type { Claim, Verdict } from '../verification/types';

export interface VerificationReport {
  companyName: string;
  analyzedAt: string;
  verdicts: Verdict[];
  deckScore: number;
  scoreBand: ScoreBand;
  riskAssessment: string;
  tokenUsage: TokenUsageStats;
}

export interface DeckAnalysis extends VerificationReport {
  documentName: string;
  investor: InvestorProfile;
  extractedClaims: Claim[];
  questions: InvestorQuestion[];
  executiveSummary: string;
}

export interface AnalyzeOptions {
  companyName?: string;
  maxClaims?: number;
  maxQuestions?: number;
}

export function isDeckAnalysis(report: VerificationReport): report is DeckAnalysis {
  return 'executiveSummary' in report;
}
