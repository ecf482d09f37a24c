import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import type { LLMProvider, LLMResult, StructuredSchema } from './llm-provider';
import { DefaultRequestBuilder, type RequestBuilder } from './request-builder';
import { logRequest, logResponse, type ProviderDebugOptions } from './debug-output';
import {
  ANTHROPIC_RESPONSE_SCHEMA,
  type AnthropicResponse,
  type AnthropicToolUseBlock,
  isToolUseBlock,
  isTextBlock,
} from '../schemas/anthropic-responses';
import { APIResponseError, ValidationError } from '../errors/validation-errors';
import { ConfigError, handleUnknownError } from '../errors/index';

export interface AnthropicConfig extends ProviderDebugOptions {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

export const AnthropicDefaultConfig = {
  model: 'claude-3-5-sonnet-20241022',
  maxTokens: 4096,
  temperature: 0.2,
};

export class AnthropicProvider implements LLMProvider {
  private client: Anthropic;
  private config: AnthropicConfig;
  private model: string;
  private maxTokens: number;
  private builder: RequestBuilder;

  constructor(config: AnthropicConfig, builder?: RequestBuilder) {
    if (!config.apiKey.trim()) {
      throw new ConfigError('ANTHROPIC_API_KEY is required for the Anthropic provider');
    }
    this.client = new Anthropic({
      apiKey: config.apiKey,
      maxRetries: 2,
    });
    this.model = config.model ?? AnthropicDefaultConfig.model;
    this.maxTokens = config.maxTokens ?? AnthropicDefaultConfig.maxTokens;
    this.config = {
      ...config,
      temperature: config.temperature ?? AnthropicDefaultConfig.temperature,
    };
    this.builder = builder ?? new DefaultRequestBuilder();
  }

  /**
   * Validates Anthropic API response using schema validation
   */
  private validateResponse(response: unknown): AnthropicResponse {
    try {
      return ANTHROPIC_RESPONSE_SCHEMA.parse(response);
    } catch (e: unknown) {
      if (e instanceof z.ZodError) {
        throw new APIResponseError(
          `Invalid Anthropic API response structure: ${e.message}`,
          response,
          e
        );
      }
      const err = handleUnknownError(e, 'Anthropic response validation');
      throw new ValidationError(`Anthropic response validation failed: ${err.message}`, e);
    }
  }

  async runPromptStructured(
    content: string,
    promptText: string,
    schema: StructuredSchema
  ): Promise<LLMResult<unknown>> {
    const systemPrompt = this.builder.buildPromptBodyForStructured(promptText);

    const params: Anthropic.Messages.MessageCreateParamsNonStreaming = {
      model: this.model,
      system: systemPrompt,
      messages: [
        {
          role: 'user',
          content: `Input:\n\n${content}`,
        },
      ],
      max_tokens: this.maxTokens,
      tools: [this.convertToAnthropicToolSchema(schema)],
      tool_choice: { type: 'tool', name: schema.name },
      ...(this.config.temperature !== undefined && { temperature: this.config.temperature }),
    };

    logRequest(this.config, 'Anthropic', {
      model: this.model,
      maxTokens: this.maxTokens,
      temperature: this.config.temperature,
    }, systemPrompt, content);

    let rawResponse: unknown;
    try {
      rawResponse = await this.client.messages.create(params);
    } catch (e: unknown) {
      // Subclasses before the APIError base
      if (e instanceof Anthropic.RateLimitError) {
        throw new Error(`Anthropic rate limit exceeded: ${e.message}`);
      }
      if (e instanceof Anthropic.AuthenticationError) {
        throw new Error(`Anthropic authentication failed: ${e.message}`);
      }
      if (e instanceof Anthropic.BadRequestError) {
        throw new Error(`Anthropic bad request: ${e.message}`);
      }
      if (e instanceof Anthropic.APIError) {
        throw new Error(`Anthropic API error (${e.status}): ${e.message}`);
      }

      const err = handleUnknownError(e, 'Anthropic API call');
      throw new Error(`Anthropic API call failed: ${err.message}`);
    }

    const validatedResponse = this.validateResponse(rawResponse);

    logResponse(this.config, {
      usage: validatedResponse.usage,
      stop_reason: validatedResponse.stop_reason,
    }, rawResponse);

    return {
      data: this.extractToolInput(validatedResponse, schema.name),
      usage: {
        inputTokens: validatedResponse.usage.input_tokens,
        outputTokens: validatedResponse.usage.output_tokens,
      },
    };
  }

  private convertToAnthropicToolSchema(schema: StructuredSchema): Anthropic.Messages.Tool {
    return {
      name: schema.name,
      description: `Submit ${schema.name} results`,
      input_schema: {
        ...schema.schema,
        type: 'object',
      },
    };
  }

  private extractToolInput(response: AnthropicResponse, expectedToolName: string): Record<string, unknown> {
    const blocks = response.content;
    if (blocks.length === 0) {
      throw new Error('Empty response from Anthropic API (no content blocks).');
    }

    const toolBlock = blocks.find((block): block is AnthropicToolUseBlock =>
      isToolUseBlock(block) && block.name === expectedToolName
    );

    if (!toolBlock) {
      const toolUseBlocks = blocks.filter(isToolUseBlock);
      if (toolUseBlocks.length > 0) {
        const availableTools = toolUseBlocks.map((block) => block.name);
        throw new Error(`Expected tool call '${expectedToolName}' but received: ${availableTools.join(', ')}`);
      }

      const firstText = blocks.find(isTextBlock);
      if (firstText) {
        const textContent = firstText.text.slice(0, 200);
        throw new Error(`No tool call received for ${expectedToolName}. Response contains text instead: ${textContent}`);
      }

      throw new Error(`No tool call received for ${expectedToolName}. Response may not contain structured data.`);
    }

    if (Object.keys(toolBlock.input).length === 0) {
      throw new Error(`Tool call for ${expectedToolName} returned empty input.`);
    }

    return toolBlock.input;
  }
}
