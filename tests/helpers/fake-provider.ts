import type { ProviderName } from '../../src/config/settings';
import type { ModelHint, ProviderAdapter } from '../../src/providers/provider.interface';
import type { GenerationConfig, ProviderRequest, RawCompletion } from '../../src/types/provider';

export type FakeReply = string | Error | ((request: ProviderRequest, signal?: AbortSignal) => Promise<string>);

/**
 * Scripted adapter. Replies are consumed in order; the last one repeats.
 */
export class FakeProvider implements ProviderAdapter {
    readonly requests: ProviderRequest[] = [];
    readonly hints: ModelHint[] = [];

    constructor(readonly name: ProviderName, private replies: FakeReply[]) { }

    get calls(): number {
        return this.requests.length;
    }

    async complete(request: ProviderRequest, modelHint: ModelHint, signal?: AbortSignal): Promise<RawCompletion> {
        this.requests.push(request);
        this.hints.push(modelHint);
        const reply = this.replies.length > 1 ? this.replies.shift() : this.replies[0];
        if (reply === undefined) {
            throw new Error(`${this.name}: no scripted reply`);
        }
        if (reply instanceof Error) {
            throw reply;
        }
        const text = typeof reply === 'function' ? await reply(request, signal) : reply;
        return {
            text,
            model: `${this.name}-test-model`,
            usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 }
        };
    }
}

export function testGenerationConfig(overrides: Partial<GenerationConfig> = {}): GenerationConfig {
    return {
        temperature: 0,
        maxOutputTokens: 500,
        providerPreferenceOrder: ['openai', 'anthropic'],
        timeoutMs: 1000,
        maxRetries: 2,
        ...overrides
    };
}
