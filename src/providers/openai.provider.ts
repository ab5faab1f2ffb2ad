import OpenAI from 'openai';
import type { ILogger } from '../config/logger';
import type { ProviderRequest, RawCompletion } from '../types/provider';
import { JSON_ONLY_INSTRUCTION, toProviderError } from './provider.interface';
import type { ModelHint, ProviderAdapter, ProviderModels } from './provider.interface';

// Interfaces for better testability
export interface IOpenAIClient {
    chat: {
        completions: {
            create: (params: {
                model: string;
                messages: Array<{ role: 'system' | 'user'; content: string }>;
                temperature: number;
                max_tokens: number;
                response_format?: { type: 'json_object' };
            }, options?: { signal?: AbortSignal }) => Promise<{
                model: string;
                choices: Array<{ message: { content: string | null } }>;
                usage?: { prompt_tokens: number; completion_tokens: number; total_tokens: number };
            }>;
        };
    };
}

/**
 * OpenAI chat completions adapter.
 */
export class OpenAIProvider implements ProviderAdapter {
    readonly name = 'openai';

    constructor(
        private client: IOpenAIClient,
        private models: ProviderModels,
        private logger: ILogger
    ) { }

    /**
     * Factory method for production use
     */
    static create(apiKey: string | undefined, models: ProviderModels, logger: ILogger): OpenAIProvider {
        return new OpenAIProvider(new OpenAI({ apiKey, maxRetries: 0 }), models, logger);
    }

    async complete(request: ProviderRequest, modelHint: ModelHint, signal?: AbortSignal): Promise<RawCompletion> {
        const model = request.model ?? this.models[modelHint];
        const system = [request.system, request.jsonOutput ? JSON_ONLY_INSTRUCTION : undefined]
            .filter((part): part is string => Boolean(part))
            .join('\n\n');

        const messages: Array<{ role: 'system' | 'user'; content: string }> = [];
        if (system) {
            messages.push({ role: 'system', content: system });
        }
        messages.push({ role: 'user', content: request.prompt });

        try {
            const response = await this.client.chat.completions.create({
                model,
                messages,
                temperature: request.temperature,
                max_tokens: request.maxOutputTokens,
                response_format: request.jsonOutput ? { type: 'json_object' } : undefined
            }, { signal });

            const content = response.choices[0]?.message?.content;
            if (!content) {
                throw new Error('No content returned from OpenAI');
            }

            this.logger.debug({
                model: response.model,
                tokensUsed: response.usage?.total_tokens ?? 0,
                contentLength: content.length
            }, 'OpenAI completion received');

            return {
                text: content,
                model: response.model,
                usage: {
                    inputTokens: response.usage?.prompt_tokens ?? 0,
                    outputTokens: response.usage?.completion_tokens ?? 0,
                    totalTokens: response.usage?.total_tokens ?? 0
                }
            };
        } catch (error) {
            throw toProviderError(error, this.name);
        }
    }
}
