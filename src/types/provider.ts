import type { ProviderName } from '../config/settings';

export interface GenerationConfig {
    temperature: number;
    maxOutputTokens: number;
    providerPreferenceOrder: ProviderName[];
    timeoutMs: number;
    maxRetries: number;
}

export interface TokenUsage {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
}

/**
 * Normalized completion. Callers never see provider-specific fields.
 */
export interface CompletionResult<T = unknown> {
    text: string;
    data: T;
    provider: ProviderName;
    model: string;
    usage: TokenUsage;
    latencyMs: number;
    attempts: number;
}

export interface ProviderRequest {
    prompt: string;
    system?: string;
    model?: string;
    temperature: number;
    maxOutputTokens: number;
    jsonOutput: boolean;
}

export interface RawCompletion {
    text: string;
    model: string;
    usage: TokenUsage;
}
