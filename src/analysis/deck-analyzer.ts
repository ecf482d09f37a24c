import type { LLMProvider } from '../providers/llm-provider';
import type { SearchProvider } from '../providers/search-provider';
import { UsageTrackingProvider } from '../providers/usage-tracking-provider';
import type { Config } from '../schemas/config-schemas';
import { loadDocument } from '../boundaries/document-loader';
import { ClaimExtractor, prioritizeClaims } from '../extraction/claim-extractor';
import { QuestionGenerator } from '../questions/question-generator';
import type { InvestorProfile } from '../questions/types';
import { aggregateDeckScore, scoreBand } from '../scoring';
import { BatchVerificationController } from '../verification/batch-controller';
import { WebClaimVerifier } from '../verification/claim-verifier';
import { LLMNarrativeOracle } from '../verification/narrative-oracle';
import type { Claim, NarrativeOracle } from '../verification/types';
import { log } from '../output/logger';
import { assessRisk, writeExecutiveSummary } from './summaries';
import type { AnalyzeOptions, DeckAnalysis, VerificationReport } from './types';

export interface DeckAnalyzerDeps {
  provider: LLMProvider;
  search: SearchProvider;
  config: Readonly<Config>;
  investor: InvestorProfile;
  /** Replaces the LLM-backed oracle. */
  oracle?: NarrativeOracle;
  now?: () => Date;
}

/**
 * Runs a deck through extraction, verification, scoring and question
 * generation.
 */
export class DeckAnalyzer {
  private readonly provider: UsageTrackingProvider;
  private readonly controller: BatchVerificationController;
  private readonly extractor: ClaimExtractor;
  private readonly questions: QuestionGenerator;
  private readonly config: Readonly<Config>;
  private readonly investor: InvestorProfile;
  private readonly now: () => Date;

  constructor(deps: DeckAnalyzerDeps) {
    this.provider = new UsageTrackingProvider(deps.provider);
    this.config = deps.config;
    this.investor = deps.investor;
    this.now = deps.now ?? (() => new Date());

    const oracle = deps.oracle ?? new LLMNarrativeOracle(this.provider);
    const verifier = new WebClaimVerifier(deps.search, oracle, {
      relevanceThreshold: this.config.relevanceThreshold,
      maxEvidence: this.config.maxEvidence,
      queriesPerClaim: this.config.queriesPerClaim,
      now: this.now,
    });
    this.controller = new BatchVerificationController(verifier, {
      budget: this.config.budget,
      concurrency: this.config.concurrency,
    });
    this.extractor = new ClaimExtractor(this.provider);
    this.questions = new QuestionGenerator(this.provider);
  }

  async analyze(documentPath: string, options: AnalyzeOptions = {}): Promise<DeckAnalysis> {
    const document = await loadDocument(documentPath);
    const companyName = options.companyName ?? document.companyName;
    const maxClaims = options.maxClaims ?? this.config.maxClaims;
    const maxQuestions = options.maxQuestions ?? this.config.maxQuestions;

    log(`Analyzing ${document.name} (${document.pages.length} page(s)) for ${companyName}`);

    const extracted = await this.extractor.extractClaims(document.pages);
    const claims = prioritizeClaims(extracted).slice(0, maxClaims);
    log(`Extracted ${extracted.length} claim(s); verifying top ${Math.min(claims.length, this.config.budget)}`);

    const report = await this.verifyClaims(claims, companyName);

    log('Generating investor questions');
    const questions = await this.questions.generateQuestions(report.verdicts, this.investor, companyName, maxQuestions);
    const executiveSummary = await writeExecutiveSummary(this.provider, companyName, report.deckScore, report.verdicts);

    return {
      ...report,
      documentName: document.name,
      investor: this.investor,
      extractedClaims: claims,
      questions,
      executiveSummary,
      tokenUsage: this.provider.getUsage(),
    };
  }

  /**
   * Verifies an already prioritized claim list and scores the result.
   */
  async verifyClaims(claims: readonly Claim[], companyName: string): Promise<VerificationReport> {
    const verdicts = await this.controller.verifyAll(claims, companyName);
    const deckScore = aggregateDeckScore(verdicts);
    return {
      companyName,
      analyzedAt: this.now().toISOString(),
      verdicts,
      deckScore,
      scoreBand: scoreBand(deckScore),
      riskAssessment: assessRisk(verdicts),
      tokenUsage: this.provider.getUsage(),
    };
  }
}
