import type { TokenUsage } from '../types/token-usage';

export interface LLMResult<T> {
  data: T;
  usage?: TokenUsage;
}

export interface StructuredSchema {
  name: string;
  schema: Record<string, unknown>;
}

export interface LLMProvider {
  runPromptStructured(content: string, promptText: string, schema: StructuredSchema): Promise<LLMResult<unknown>>;
}
