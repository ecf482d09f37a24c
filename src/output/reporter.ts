import chalk from 'chalk';
import stripAnsi from 'strip-ansi';
import { isDeckAnalysis, type VerificationReport } from '../analysis/types';
import type { InvestorQuestion } from '../questions/types';
import { ScoreBand, scoreBandLabel } from '../scoring/deck-score';
import type { TokenUsageStats } from '../types/token-usage';
import { VerificationStatus, type Verdict } from '../verification/types';

const SCORE_BAR_CELLS = 20;
const STATUS_WIDTH = 18;
const CLAIM_PREVIEW = 70;
const SUMMARY_PREVIEW = 100;

export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

function statusLabel(status: VerificationStatus): string {
  switch (status) {
    case VerificationStatus.Verified:
      return chalk.green('verified');
    case VerificationStatus.PartiallyVerified:
      return chalk.greenBright('partially verified');
    case VerificationStatus.Unverified:
      return chalk.yellow('unverified');
    case VerificationStatus.Contradicted:
      return chalk.red('contradicted');
    case VerificationStatus.UnableToVerify:
      return chalk.dim('unable to verify');
  }
}

function bandColor(band: ScoreBand): (text: string) => string {
  switch (band) {
    case ScoreBand.Strong:
      return chalk.green;
    case ScoreBand.Moderate:
      return chalk.yellow;
    case ScoreBand.NeedsReview:
      return chalk.red;
  }
}

/** Plain-text score bar, e.g. `[#############-------] 65%` */
export function formatScoreBar(score: number): string {
  const filled = Math.round(Math.min(1, Math.max(0, score)) * SCORE_BAR_CELLS);
  return `[${'#'.repeat(filled)}${'-'.repeat(SCORE_BAR_CELLS - filled)}] ${Math.round(score * 100)}%`;
}

export function printHeader(companyName: string, documentName?: string) {
  const title = documentName ? `${companyName} (${documentName})` : companyName;
  console.log(chalk.bold.underline(`Pitch deck verification: ${title}`));
  console.log('');
}

export function printScore(score: number, band: ScoreBand) {
  const color = bandColor(band);
  console.log(`${chalk.bold('Deck score:')} ${color(formatScoreBar(score))}  ${color(scoreBandLabel(band))}`);
  console.log('');
}

export function printVerdictRow(verdict: Verdict) {
  const colored = statusLabel(verdict.status);
  const pad = Math.max(0, STATUS_WIDTH - stripAnsi(colored).length);
  console.log(`  ${chalk.dim(verdict.claim.id)}  ${colored}${' '.repeat(pad)}  ${truncate(verdict.claim.text, CLAIM_PREVIEW)}`);
  console.log(`  ${' '.repeat(verdict.claim.id.length)}  ${' '.repeat(STATUS_WIDTH)}  ${chalk.dim(truncate(verdict.summary, SUMMARY_PREVIEW))}`);
}

export function printQuestions(questions: readonly InvestorQuestion[]) {
  if (questions.length === 0) return;
  console.log(chalk.bold('\nQuestions for the founders:'));
  questions.forEach((q, i) => {
    const priority = q.priority === 'high' ? chalk.red(q.priority) : q.priority === 'medium' ? chalk.yellow(q.priority) : chalk.dim(q.priority);
    console.log(`  ${i + 1}. [${priority}] ${q.question}`);
    if (q.rationale) console.log(`     ${chalk.dim(q.rationale)}`);
  });
}

export function printTokenUsage(stats: TokenUsageStats) {
  if (stats.requests === 0) return;
  console.log(chalk.bold('\nToken Usage:'));
  console.log(`  - Requests: ${stats.requests}`);
  console.log(`  - Input tokens: ${stats.totalInputTokens.toLocaleString()}`);
  console.log(`  - Output tokens: ${stats.totalOutputTokens.toLocaleString()}`);
}

export function printReport(report: VerificationReport) {
  printHeader(report.companyName, isDeckAnalysis(report) ? report.documentName : undefined);
  printScore(report.deckScore, report.scoreBand);

  if (isDeckAnalysis(report)) {
    console.log(chalk.bold('Executive summary:'));
    console.log(`  ${report.executiveSummary}\n`);
  }

  console.log(chalk.bold('Risk assessment:'));
  for (const line of report.riskAssessment.split('\n')) {
    console.log(`  ${line}`);
  }

  console.log(chalk.bold(`\nClaims (${report.verdicts.length}):`));
  for (const verdict of report.verdicts) {
    printVerdictRow(verdict);
  }

  if (isDeckAnalysis(report)) {
    printQuestions(report.questions);
  }
  printTokenUsage(report.tokenUsage);
}
