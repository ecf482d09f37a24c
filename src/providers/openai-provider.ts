import OpenAI from 'openai';
import { z } from 'zod';
import type { LLMProvider, LLMResult, StructuredSchema } from './llm-provider';
import { DefaultRequestBuilder, type RequestBuilder } from './request-builder';
import { logRequest, logResponse, type ProviderDebugOptions } from './debug-output';
import { OPENAI_RESPONSE_SCHEMA, type OpenAIResponse } from '../schemas/api-schemas';
import { parseStructuredResponse } from '../boundaries/structured-response';
import { APIResponseError, ValidationError } from '../errors/validation-errors';
import { ConfigError, handleUnknownError } from '../errors/index';

export interface OpenAIConfig extends ProviderDebugOptions {
  apiKey: string;
  model?: string;
  temperature?: number;
}

export const OpenAIDefaultConfig = {
  model: 'gpt-4o',
  temperature: 0.2,
};

export class OpenAIProvider implements LLMProvider {
  private client: OpenAI;
  private config: OpenAIConfig;
  private model: string;
  private builder: RequestBuilder;

  constructor(config: OpenAIConfig, builder?: RequestBuilder) {
    if (!config.apiKey.trim()) {
      throw new ConfigError('OPENAI_API_KEY is required for the OpenAI provider');
    }
    this.client = new OpenAI({
      apiKey: config.apiKey,
      maxRetries: 2,
    });
    this.model = config.model ?? OpenAIDefaultConfig.model;
    this.config = {
      ...config,
      temperature: config.temperature ?? OpenAIDefaultConfig.temperature,
    };
    this.builder = builder ?? new DefaultRequestBuilder();
  }

  /**
   * Validates OpenAI API response using schema validation
   */
  private validateResponse(response: unknown): OpenAIResponse {
    try {
      return OPENAI_RESPONSE_SCHEMA.parse(response);
    } catch (e: unknown) {
      if (e instanceof z.ZodError) {
        throw new APIResponseError(
          `Invalid OpenAI API response structure: ${e.message}`,
          response,
          e
        );
      }
      const err = handleUnknownError(e, 'OpenAI response validation');
      throw new ValidationError(`OpenAI response validation failed: ${err.message}`, e);
    }
  }

  async runPromptStructured(
    content: string,
    promptText: string,
    schema: StructuredSchema
  ): Promise<LLMResult<unknown>> {
    const systemPrompt = this.builder.buildPromptBodyForStructured(promptText);

    const params: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: `Input:\n\n${content}` },
      ],
      response_format: {
        type: 'json_schema',
        json_schema: {
          name: schema.name,
          schema: schema.schema,
        },
      },
    };

    if (this.config.temperature !== undefined) {
      params.temperature = this.config.temperature;
    }

    logRequest(this.config, 'OpenAI', { model: this.model, temperature: this.config.temperature }, systemPrompt, content);

    let rawResponse: unknown;
    try {
      rawResponse = await this.client.chat.completions.create(params);
    } catch (e: unknown) {
      // More specific SDK errors first
      if (e instanceof OpenAI.RateLimitError) {
        throw new Error(`OpenAI rate limit exceeded: ${e.message}`);
      }
      if (e instanceof OpenAI.AuthenticationError) {
        throw new Error(`OpenAI authentication failed: ${e.message}`);
      }
      if (e instanceof OpenAI.APIError) {
        throw new Error(`OpenAI API error (${e.status}): ${e.message}`);
      }

      const err = handleUnknownError(e, 'OpenAI API call');
      throw new Error(`OpenAI API call failed: ${err.message}`);
    }

    const validatedResponse = this.validateResponse(rawResponse);
    const usage = validatedResponse.usage;
    const firstChoice = validatedResponse.choices[0];

    logResponse(this.config, {
      usage,
      finish_reason: firstChoice?.finish_reason,
    }, rawResponse);

    if (!firstChoice) {
      throw new Error('Empty response from OpenAI API (no choices).');
    }

    const responseText = firstChoice.message.content?.trim();
    if (!responseText) {
      throw new Error('Empty response from OpenAI API (no content).');
    }

    const result: LLMResult<unknown> = { data: parseStructuredResponse(responseText) };
    if (usage) {
      result.usage = {
        inputTokens: usage.prompt_tokens,
        outputTokens: usage.completion_tokens,
      };
    }
    return result;
  }
}
