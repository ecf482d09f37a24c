import { GoogleGenerativeAI, type GenerativeModel } from '@google/generative-ai';
import type { LLMProvider, LLMResult, StructuredSchema } from './llm-provider';
import { DefaultRequestBuilder, type RequestBuilder } from './request-builder';
import { logRequest, logResponse, type ProviderDebugOptions } from './debug-output';
import { parseStructuredResponse } from '../boundaries/structured-response';
import { GEMINI_USAGE_SCHEMA } from '../schemas/api-schemas';
import { ConfigError, handleUnknownError } from '../errors/index';

export interface GeminiConfig extends ProviderDebugOptions {
    apiKey: string;
    model?: string;
    temperature?: number;
}

export const GeminiDefaultConfig = {
    model: 'gemini-2.5-flash',
    temperature: 0.2,
};

export class GeminiProvider implements LLMProvider {
    private model: GenerativeModel;
    private modelName: string;
    private config: GeminiConfig;
    private builder: RequestBuilder;

    constructor(config: GeminiConfig, builder?: RequestBuilder) {
        if (!config.apiKey.trim()) {
            throw new ConfigError('GEMINI_API_KEY is required for the Gemini provider');
        }
        const client = new GoogleGenerativeAI(config.apiKey);
        this.modelName = config.model ?? GeminiDefaultConfig.model;
        this.config = {
            ...config,
            temperature: config.temperature ?? GeminiDefaultConfig.temperature,
        };
        this.model = client.getGenerativeModel({
            model: this.modelName,
            generationConfig: {
                ...(this.config.temperature !== undefined && { temperature: this.config.temperature }),
                responseMimeType: 'application/json',
            },
        });
        this.builder = builder ?? new DefaultRequestBuilder();
    }

    async runPromptStructured(
        content: string,
        promptText: string,
        schema: StructuredSchema
    ): Promise<LLMResult<unknown>> {
        const systemPrompt = this.builder.buildPromptBodyForStructured(promptText);

        const fullPrompt = [
            systemPrompt,
            'You must output valid JSON that adheres to the following schema:',
            JSON.stringify(schema.schema, null, 2),
            'Input:',
            content,
        ].join('\n\n');

        logRequest(this.config, 'Gemini', { model: this.modelName, temperature: this.config.temperature }, systemPrompt, content);

        let text: string;
        let usageMetadata: unknown;
        try {
            const result = await this.model.generateContent(fullPrompt);
            text = result.response.text();
            usageMetadata = result.response.usageMetadata;
        } catch (e: unknown) {
            const err = handleUnknownError(e, 'Gemini API call');
            throw new Error(`Gemini API call failed: ${err.message}`);
        }

        logResponse(this.config, { usage: usageMetadata }, text);

        const result: LLMResult<unknown> = { data: parseStructuredResponse(text) };
        const usage = GEMINI_USAGE_SCHEMA.safeParse(usageMetadata);
        if (usage.success) {
            result.usage = {
                inputTokens: usage.data.promptTokenCount,
                outputTokens: usage.data.candidatesTokenCount,
            };
        }
        return result;
    }
}
