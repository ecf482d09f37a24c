import type { LLMProvider, LLMResult, StructuredSchema } from '../src/providers/llm-provider';
import type { SearchProvider, SearchResult } from '../src/providers/search-provider';
import { createClaim } from '../src/schemas/claim-schemas';
import {
  VerificationStatus,
  type Claim,
  type ClaimCategory,
  type NarrativeOracle,
  type OracleJudgement,
  type OraclePrompt,
} from '../src/verification/types';

export function makeClaim(overrides: {
  id?: string;
  text?: string;
  category?: ClaimCategory;
  confidence?: number;
} = {}): Claim {
  return createClaim({
    id: overrides.id ?? 'claim_0001',
    text: overrides.text ?? 'Revenue grew 300% in 2023',
    category: overrides.category ?? 'revenue',
    sourceLocation: 'page 1',
    context: '',
    confidence: overrides.confidence ?? 0.9,
  });
}

export function makeResult(snippet: string, domain = 'example.com', path = '/article'): SearchResult {
  return {
    url: `https://${domain}${path}`,
    title: 'Result',
    snippet,
    sourceDomain: domain,
  };
}

/*
 * Search double: answers every query with the same results (or per-query
 * results from `byQuery`) and records the queries it saw.
 */
export class FakeSearchProvider implements SearchProvider {
  readonly queries: string[] = [];

  constructor(
    private readonly results: SearchResult[] = [],
    private readonly byQuery: Record<string, SearchResult[]> = {}
  ) {}

  async search(query: string): Promise<SearchResult[]> {
    this.queries.push(query);
    return this.byQuery[query] ?? this.results;
  }
}

export class FailingSearchProvider implements SearchProvider {
  calls = 0;

  constructor(private readonly error: Error = new Error('network down')) {}

  async search(_query: string): Promise<SearchResult[]> {
    this.calls++;
    throw this.error;
  }
}

export class FakeOracle implements NarrativeOracle {
  readonly prompts: OraclePrompt[] = [];

  constructor(
    private readonly judgement: OracleJudgement = {
      status: VerificationStatus.Verified,
      summary: 'Confirmed by press coverage.',
      confidence: 0.8,
      redFlags: [],
    }
  ) {}

  async completeStructured(prompt: OraclePrompt): Promise<OracleJudgement> {
    this.prompts.push(prompt);
    return this.judgement;
  }
}

export class FailingOracle implements NarrativeOracle {
  calls = 0;

  constructor(private readonly message = 'model unavailable') {}

  async completeStructured(_prompt: OraclePrompt): Promise<OracleJudgement> {
    this.calls++;
    throw new Error(this.message);
  }
}

export interface RecordedCall {
  content: string;
  promptText: string;
  schema: StructuredSchema;
}

/*
 * LLM double that answers by schema name. A handler may throw to simulate
 * a failed request.
 */
export class FakeLLMProvider implements LLMProvider {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly handlers: Record<string, (call: RecordedCall) => unknown>) {}

  async runPromptStructured(content: string, promptText: string, schema: StructuredSchema): Promise<LLMResult<unknown>> {
    const call = { content, promptText, schema };
    this.calls.push(call);
    const handler = this.handlers[schema.name];
    if (!handler) throw new Error(`no fake response for ${schema.name}`);
    return { data: handler(call), usage: { inputTokens: 10, outputTokens: 5 } };
  }

  callsFor(name: string): RecordedCall[] {
    return this.calls.filter((c) => c.schema.name === name);
  }
}

export const noSleep = async (_ms: number): Promise<void> => {};
