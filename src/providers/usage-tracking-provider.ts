import type { LLMProvider, LLMResult, StructuredSchema } from './llm-provider';
import { addUsage, emptyUsageStats, type TokenUsageStats } from '../types/token-usage';

/*
 * Wraps a provider and totals the token usage of every completed request.
 */
export class UsageTrackingProvider implements LLMProvider {
  private stats: TokenUsageStats = emptyUsageStats();

  constructor(private readonly inner: LLMProvider) {}

  async runPromptStructured(
    content: string,
    promptText: string,
    schema: StructuredSchema
  ): Promise<LLMResult<unknown>> {
    const result = await this.inner.runPromptStructured(content, promptText, schema);
    this.stats = addUsage(this.stats, result.usage);
    return result;
  }

  getUsage(): TokenUsageStats {
    return { ...this.stats };
  }
}
