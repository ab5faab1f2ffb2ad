import { describe, it, expect, vi } from 'vitest';
import { OpenAIProvider } from '../../../src/providers/openai.provider';
import type { IOpenAIClient } from '../../../src/providers/openai.provider';
import { AnthropicProvider } from '../../../src/providers/anthropic.provider';
import type { IAnthropicClient } from '../../../src/providers/anthropic.provider';
import { JSON_ONLY_INSTRUCTION, toProviderError } from '../../../src/providers/provider.interface';
import { ProviderError } from '../../../src/errors';
import type { ProviderRequest } from '../../../src/types/provider';
import { createMockLogger } from '../../helpers/mock-logger';

const models = { fast: 'fast-model', quality: 'quality-model' };

function request(overrides: Partial<ProviderRequest> = {}): ProviderRequest {
    return {
        prompt: 'Score this answer',
        temperature: 0,
        maxOutputTokens: 300,
        jsonOutput: true,
        ...overrides
    };
}

function namedError(name: string, message: string): Error {
    const error = new Error(message);
    error.name = name;
    return error;
}

describe('toProviderError', () => {
    it('should map caller aborts to Cancelled', () => {
        expect(toProviderError(namedError('APIUserAbortError', 'Request was aborted.'), 'openai').kind).toBe('Cancelled');
    });

    it('should map timeouts to Timeout', () => {
        expect(toProviderError(namedError('APIConnectionTimeoutError', 'Request timed out.'), 'openai').kind).toBe('Timeout');
        expect(toProviderError(new Error('socket timeout'), 'anthropic').kind).toBe('Timeout');
    });

    it('should map HTTP statuses', () => {
        expect(toProviderError(Object.assign(new Error('slow down'), { status: 429 }), 'openai').kind).toBe('RateLimited');
        expect(toProviderError(Object.assign(new Error('overloaded'), { status: 529 }), 'anthropic').kind).toBe('Unavailable');
        expect(toProviderError(Object.assign(new Error('bad request'), { status: 400 }), 'openai').kind).toBe('Rejected');
    });

    it('should prefix the provider name and keep the cause', () => {
        const cause = Object.assign(new Error('bad request'), { status: 400 });
        const error = toProviderError(cause, 'openai');

        expect(error.message).toBe('openai: bad request');
        expect(error.provider).toBe('openai');
        expect(error.cause).toBe(cause);
    });

    it('should pass provider errors through and wrap non-errors', () => {
        const original = new ProviderError('MalformedResponse', 'openai: not json', 'openai');
        expect(toProviderError(original, 'openai')).toBe(original);

        const wrapped = toProviderError('boom', 'anthropic');
        expect(wrapped.kind).toBe('Unavailable');
        expect(wrapped.message).toBe('anthropic: boom');
    });
});

describe('OpenAIProvider', () => {
    function client(response: Awaited<ReturnType<IOpenAIClient['chat']['completions']['create']>>) {
        const create = vi.fn().mockResolvedValue(response);
        const mock: IOpenAIClient = { chat: { completions: { create } } };
        return { mock, create };
    }

    it('should request JSON mode with the quality model and a JSON-only system prompt', async () => {
        const { mock, create } = client({
            model: 'quality-model-2024',
            choices: [{ message: { content: '{"raw_score":0.7}' } }],
            usage: { prompt_tokens: 120, completion_tokens: 30, total_tokens: 150 }
        });
        const provider = new OpenAIProvider(mock, models, createMockLogger());
        const signal = new AbortController().signal;

        const result = await provider.complete(request({ system: 'Be strict.' }), 'quality', signal);

        expect(create).toHaveBeenCalledWith({
            model: 'quality-model',
            messages: [
                { role: 'system', content: `Be strict.\n\n${JSON_ONLY_INSTRUCTION}` },
                { role: 'user', content: 'Score this answer' }
            ],
            temperature: 0,
            max_tokens: 300,
            response_format: { type: 'json_object' }
        }, { signal });
        expect(result).toEqual({
            text: '{"raw_score":0.7}',
            model: 'quality-model-2024',
            usage: { inputTokens: 120, outputTokens: 30, totalTokens: 150 }
        });
    });

    it('should send plain text requests without a system message', async () => {
        const { mock, create } = client({
            model: 'fast-model',
            choices: [{ message: { content: 'hello' } }]
        });
        const provider = new OpenAIProvider(mock, models, createMockLogger());

        const result = await provider.complete(request({ jsonOutput: false }), 'fast');

        expect(create).toHaveBeenCalledWith({
            model: 'fast-model',
            messages: [{ role: 'user', content: 'Score this answer' }],
            temperature: 0,
            max_tokens: 300,
            response_format: undefined
        }, { signal: undefined });
        expect(result.usage).toEqual({ inputTokens: 0, outputTokens: 0, totalTokens: 0 });
    });

    it('should report empty content as Unavailable', async () => {
        const { mock } = client({ model: 'fast-model', choices: [{ message: { content: null } }] });
        const provider = new OpenAIProvider(mock, models, createMockLogger());

        await expect(provider.complete(request(), 'fast')).rejects.toMatchObject({
            kind: 'Unavailable',
            message: 'openai: No content returned from OpenAI'
        });
    });

    it('should translate SDK failures', async () => {
        const create = vi.fn().mockRejectedValue(Object.assign(new Error('Rate limit reached'), { status: 429 }));
        const provider = new OpenAIProvider({ chat: { completions: { create } } }, models, createMockLogger());

        await expect(provider.complete(request(), 'fast')).rejects.toMatchObject({ kind: 'RateLimited', provider: 'openai' });
    });
});

describe('AnthropicProvider', () => {
    it('should join text blocks and total the usage', async () => {
        const create = vi.fn().mockResolvedValue({
            model: 'fast-model',
            content: [
                { type: 'text', text: '{"raw_score":' },
                { type: 'tool_use' },
                { type: 'text', text: '0.4}' }
            ],
            usage: { input_tokens: 80, output_tokens: 20 }
        });
        const client: IAnthropicClient = { messages: { create } };
        const provider = new AnthropicProvider(client, models, createMockLogger());

        const result = await provider.complete(request(), 'fast');

        expect(create).toHaveBeenCalledWith({
            model: 'fast-model',
            max_tokens: 300,
            temperature: 0,
            system: JSON_ONLY_INSTRUCTION,
            messages: [{ role: 'user', content: 'Score this answer' }]
        }, { signal: undefined });
        expect(result).toEqual({
            text: '{"raw_score":0.4}',
            model: 'fast-model',
            usage: { inputTokens: 80, outputTokens: 20, totalTokens: 100 }
        });
    });

    it('should omit the system prompt for plain requests', async () => {
        const create = vi.fn().mockResolvedValue({
            model: 'quality-model',
            content: [{ type: 'text', text: 'ok' }],
            usage: { input_tokens: 1, output_tokens: 1 }
        });
        const provider = new AnthropicProvider({ messages: { create } }, models, createMockLogger());

        await provider.complete(request({ jsonOutput: false }), 'quality');

        expect(create).toHaveBeenCalledWith(expect.objectContaining({ model: 'quality-model', system: undefined }), { signal: undefined });
    });

    it('should report a reply without text as Unavailable', async () => {
        const create = vi.fn().mockResolvedValue({ model: 'fast-model', content: [], usage: { input_tokens: 1, output_tokens: 0 } });
        const provider = new AnthropicProvider({ messages: { create } }, models, createMockLogger());

        await expect(provider.complete(request(), 'fast')).rejects.toMatchObject({
            kind: 'Unavailable',
            message: 'anthropic: No text content returned from Anthropic'
        });
    });
});
