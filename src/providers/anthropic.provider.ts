import Anthropic from '@anthropic-ai/sdk';
import type { ILogger } from '../config/logger';
import type { ProviderRequest, RawCompletion } from '../types/provider';
import { JSON_ONLY_INSTRUCTION, toProviderError } from './provider.interface';
import type { ModelHint, ProviderAdapter, ProviderModels } from './provider.interface';

export interface IAnthropicClient {
    messages: {
        create: (params: {
            model: string;
            max_tokens: number;
            temperature: number;
            system?: string;
            messages: Array<{ role: 'user'; content: string }>;
        }, options?: { signal?: AbortSignal }) => Promise<{
            model: string;
            content: Array<{ type: string; text?: string }>;
            usage: { input_tokens: number; output_tokens: number };
        }>;
    };
}

/**
 * Anthropic messages adapter. There is no JSON response mode, so structured
 * requests carry the JSON-only instruction in the system prompt.
 */
export class AnthropicProvider implements ProviderAdapter {
    readonly name = 'anthropic';

    constructor(
        private client: IAnthropicClient,
        private models: ProviderModels,
        private logger: ILogger
    ) { }

    static create(apiKey: string | undefined, models: ProviderModels, logger: ILogger): AnthropicProvider {
        return new AnthropicProvider(new Anthropic({ apiKey, maxRetries: 0 }), models, logger);
    }

    async complete(request: ProviderRequest, modelHint: ModelHint, signal?: AbortSignal): Promise<RawCompletion> {
        const model = request.model ?? this.models[modelHint];
        const system = [request.system, request.jsonOutput ? JSON_ONLY_INSTRUCTION : undefined]
            .filter((part): part is string => Boolean(part))
            .join('\n\n');

        try {
            const response = await this.client.messages.create({
                model,
                max_tokens: request.maxOutputTokens,
                temperature: request.temperature,
                system: system || undefined,
                messages: [{ role: 'user', content: request.prompt }]
            }, { signal });

            const text = response.content
                .filter(block => block.type === 'text')
                .map(block => block.text ?? '')
                .join('');
            if (!text) {
                throw new Error('No text content returned from Anthropic');
            }

            const usage = {
                inputTokens: response.usage.input_tokens,
                outputTokens: response.usage.output_tokens,
                totalTokens: response.usage.input_tokens + response.usage.output_tokens
            };

            this.logger.debug({
                model: response.model,
                tokensUsed: usage.totalTokens,
                contentLength: text.length
            }, 'Anthropic completion received');

            return { text, model: response.model, usage };
        } catch (error) {
            throw toProviderError(error, this.name);
        }
    }
}
