export type { LLMProvider, LLMResult, StructuredSchema } from './llm-provider';
export { AnthropicProvider, type AnthropicConfig } from './anthropic-provider';
export { OpenAIProvider, type OpenAIConfig } from './openai-provider';
export { GeminiProvider, type GeminiConfig } from './gemini-provider';
export { createProvider, ProviderType, type ProviderOptions } from './provider-factory';
export { DefaultRequestBuilder, JSON_ONLY_DIRECTIVE, type RequestBuilder } from './request-builder';
export { UsageTrackingProvider } from './usage-tracking-provider';
export type { SearchProvider, SearchResult } from './search-provider';
export { BraveSearchProvider, type BraveSearchConfig } from './brave-search-provider';
export { RateLimitedSearchProvider, type RateLimitedSearchConfig } from './rate-limited-search';
