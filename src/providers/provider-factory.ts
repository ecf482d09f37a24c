import type { LLMProvider } from './llm-provider';
import { AnthropicProvider, type AnthropicConfig } from './anthropic-provider';
import { OpenAIProvider, type OpenAIConfig } from './openai-provider';
import { GeminiProvider, type GeminiConfig } from './gemini-provider';
import type { RequestBuilder } from './request-builder';
import type { ProviderDebugOptions } from './debug-output';
import type { EnvConfig } from '../schemas/env-schemas';

export type ProviderOptions = ProviderDebugOptions;

export enum ProviderType {
  Anthropic = 'anthropic',
  OpenAI = 'openai',
  Gemini = 'gemini',
}

function debugOptions(options: ProviderOptions): ProviderDebugOptions {
  return {
    ...(options.debug !== undefined && { debug: options.debug }),
    ...(options.showPrompt !== undefined && { showPrompt: options.showPrompt }),
    ...(options.showPromptTrunc !== undefined && { showPromptTrunc: options.showPromptTrunc }),
    ...(options.debugJson !== undefined && { debugJson: options.debugJson }),
  };
}

/**
 * Creates the LLM provider selected by LLM_PROVIDER.
 * @param builder - Optional request builder (for dependency injection)
 */
export function createProvider(
  envConfig: EnvConfig,
  options: ProviderOptions = {},
  builder?: RequestBuilder
): LLMProvider {
  switch (envConfig.LLM_PROVIDER) {
    case ProviderType.Anthropic: {
      const anthropicConfig: AnthropicConfig = {
        apiKey: envConfig.ANTHROPIC_API_KEY,
        model: envConfig.ANTHROPIC_MODEL,
        maxTokens: envConfig.ANTHROPIC_MAX_TOKENS,
        ...(envConfig.ANTHROPIC_TEMPERATURE !== undefined && { temperature: envConfig.ANTHROPIC_TEMPERATURE }),
        ...debugOptions(options),
      };
      return new AnthropicProvider(anthropicConfig, builder);
    }

    case ProviderType.OpenAI: {
      const openaiConfig: OpenAIConfig = {
        apiKey: envConfig.OPENAI_API_KEY,
        model: envConfig.OPENAI_MODEL,
        ...(envConfig.OPENAI_TEMPERATURE !== undefined && { temperature: envConfig.OPENAI_TEMPERATURE }),
        ...debugOptions(options),
      };
      return new OpenAIProvider(openaiConfig, builder);
    }

    case ProviderType.Gemini: {
      const geminiConfig: GeminiConfig = {
        apiKey: envConfig.GEMINI_API_KEY,
        model: envConfig.GEMINI_MODEL,
        ...(envConfig.GEMINI_TEMPERATURE !== undefined && { temperature: envConfig.GEMINI_TEMPERATURE }),
        ...debugOptions(options),
      };
      return new GeminiProvider(geminiConfig, builder);
    }
  }
}
