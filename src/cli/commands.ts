import type { Command } from 'commander';
import { readFileSync } from 'fs';
import * as path from 'path';
import {
  BraveSearchProvider,
  DefaultRequestBuilder,
  RateLimitedSearchProvider,
  createProvider,
} from '../providers/index';
import { loadConfig } from '../boundaries/config-loader';
import { parseAnalyzeOptions, parseVerifyOptions } from '../boundaries/cli-parser';
import { parseEnvironment } from '../boundaries/env-parser';
import { parseClaimList } from '../schemas/claim-schemas';
import { resolveInvestorProfile } from '../questions/investor-profile';
import { DeckAnalyzer } from '../analysis/deck-analyzer';
import type { VerificationReport } from '../analysis/types';
import { JsonFormatter, writeJsonReport } from '../output/json-formatter';
import { printReport } from '../output/reporter';
import { error, log, setSilentMode, setVerbose } from '../output/logger';
import { ProcessingError, handleUnknownError } from '../errors/index';
import { OutputFormat, type RuntimeOptions } from './types';

function fail(e: unknown, context: string): never {
  const err = handleUnknownError(e, context);
  error(`Error: ${err.message}`);
  process.exit(1);
}

/*
 * Validated environment, config and wired analyzer for one run.
 * Any failure here is a configuration problem and ends the process.
 */
function buildAnalyzer(options: RuntimeOptions): DeckAnalyzer {
  setVerbose(options.verbose);
  setSilentMode(options.format === OutputFormat.Json);

  let env;
  try {
    env = parseEnvironment();
  } catch (e: unknown) {
    error('Please set these in your .env file or environment.');
    fail(e, 'Validating environment variables');
  }

  let config;
  try {
    config = loadConfig(process.cwd(), options.config);
  } catch (e: unknown) {
    fail(e, 'Loading configuration');
  }
  if (config.configPath) log(`Using config ${config.configPath}`);

  try {
    const provider = createProvider(
      env,
      {
        debug: options.verbose,
        showPrompt: options.showPrompt,
        showPromptTrunc: options.showPromptTrunc,
        debugJson: options.debugJson,
      },
      new DefaultRequestBuilder()
    );
    const search = new RateLimitedSearchProvider(
      new BraveSearchProvider({
        apiKey: env.BRAVE_API_KEY,
        maxResults: config.maxSearchResults,
        timeoutMs: config.searchTimeoutMs,
      }),
      {
        pauseMs: config.searchPauseMs,
        retries: config.searchRetries,
        backoffBaseMs: config.searchBackoffMs,
      }
    );
    return new DeckAnalyzer({
      provider,
      search,
      config,
      investor: resolveInvestorProfile(options, config, env),
    });
  } catch (e: unknown) {
    fail(e, 'Creating providers');
  }
}

function emit(report: VerificationReport, format: string, outputPath: string | undefined): void {
  if (outputPath) {
    const written = writeJsonReport(outputPath, report);
    log(`Report written to ${path.relative(process.cwd(), written) || written}`);
  }
  if (format === OutputFormat.Json) {
    console.log(new JsonFormatter().toJson(report));
  } else {
    printReport(report);
  }
}

/*
 * Registers `analyze`: full pipeline over a PDF deck or a text export of one.
 */
export function registerAnalyzeCommand(program: Command): void {
  program
    .command('analyze')
    .description('Extract, verify and score the claims in a pitch deck')
    .argument('<document>', 'pitch deck as .pdf, or a .txt/.md export with form-feed page breaks')
    .option('--company <name>', 'company name (default: guessed from the document)')
    .option('--max-claims <n>', 'claims to keep after prioritization')
    .option('--max-questions <n>', 'investor questions to generate')
    .option('--investor-name <name>', 'investor name for question tailoring')
    .option('--focus-areas <list>', 'comma-separated investor focus areas')
    .option('--stage <stage>', 'investment stage, e.g. "Series A"')
    .option('--output <file>', 'write the JSON report to this file')
    .option('--format <format>', 'console output: line (default) or json', 'line')
    .option('--config <path>', 'path to a .deckproof.ini config file')
    .option('-v, --verbose', 'Enable verbose logging')
    .option('--show-prompt', 'Print full prompt and injected content')
    .option('--show-prompt-trunc', 'Print truncated prompt/content previews (500 chars)')
    .option('--debug-json', 'Print full JSON response from the API')
    .action(async (document: string, rawOptions: unknown) => {
      let options;
      try {
        options = parseAnalyzeOptions(rawOptions);
      } catch (e: unknown) {
        fail(e, 'Parsing CLI options');
      }

      const analyzer = buildAnalyzer(options);

      let analysis;
      try {
        analysis = await analyzer.analyze(document, {
          ...(options.company !== undefined && { companyName: options.company }),
          ...(options.maxClaims !== undefined && { maxClaims: options.maxClaims }),
          ...(options.maxQuestions !== undefined && { maxQuestions: options.maxQuestions }),
        });
      } catch (e: unknown) {
        fail(e, 'Analyzing document');
      }

      emit(analysis, options.format, options.output);
      process.exit(0);
    });
}

/*
 * Registers `verify`: verification and scoring only, over a JSON claim list.
 */
export function registerVerifyCommand(program: Command): void {
  program
    .command('verify')
    .description('Verify and score a prepared list of claims')
    .argument('<claims>', 'JSON file holding an array of claims')
    .requiredOption('--company <name>', 'company the claims are about')
    .option('--investor-name <name>', 'investor name')
    .option('--focus-areas <list>', 'comma-separated investor focus areas')
    .option('--stage <stage>', 'investment stage')
    .option('--output <file>', 'write the JSON report to this file')
    .option('--format <format>', 'console output: line (default) or json', 'line')
    .option('--config <path>', 'path to a .deckproof.ini config file')
    .option('-v, --verbose', 'Enable verbose logging')
    .option('--show-prompt', 'Print full prompt and injected content')
    .option('--show-prompt-trunc', 'Print truncated prompt/content previews (500 chars)')
    .option('--debug-json', 'Print full JSON response from the API')
    .action(async (claimsPath: string, rawOptions: unknown) => {
      let options;
      try {
        options = parseVerifyOptions(rawOptions);
      } catch (e: unknown) {
        fail(e, 'Parsing CLI options');
      }

      let claims;
      try {
        const raw: unknown = JSON.parse(readFileSync(path.resolve(claimsPath), 'utf-8'));
        claims = parseClaimList(raw);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Reading claims');
        fail(new ProcessingError(`Cannot load claims from ${claimsPath}: ${err.message}`), 'Reading claims');
      }

      const analyzer = buildAnalyzer(options);

      let report;
      try {
        report = await analyzer.verifyClaims(claims, options.company);
      } catch (e: unknown) {
        fail(e, 'Verifying claims');
      }

      emit(report, options.format, options.output);
      process.exit(0);
    });
}
