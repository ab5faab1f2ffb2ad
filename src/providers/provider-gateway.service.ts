import { logger, ILogger } from '../config/logger';
import { getSettings } from '../config/settings';
import type { AppSettings, ProviderName } from '../config/settings';
import { ProviderError } from '../errors';
import type { ProviderAttemptRecord } from '../errors';
import type { CompletionResult, GenerationConfig, ProviderRequest, RawCompletion } from '../types/provider';
import { abortReason, anySignal, raceAbort } from '../utils/async.util';
import { RetryUtil } from '../utils/retry.util';
import { Semaphore } from '../utils/semaphore';
import { AnthropicProvider } from './anthropic.provider';
import { CircuitBreaker } from './circuit-breaker';
import type { CircuitBreakerOptions } from './circuit-breaker';
import { OpenAIProvider } from './openai.provider';
import type { ModelHint, ProviderAdapter } from './provider.interface';
import type { OutputSchema } from '../types/schemas';

export interface CompleteOptions {
    signal?: AbortSignal;
    system?: string;
    promptName?: string;
}

export interface GatewayOptions {
    circuit: CircuitBreakerOptions;
    retryBaseDelayMs: number;
    retryMaxDelayMs: number;
    now?: () => number;
    random?: () => number;
}

export interface IProviderGateway {
    complete(prompt: string, modelHint: ModelHint, config: GenerationConfig, options?: CompleteOptions): Promise<CompletionResult<undefined>>;
    completeJson<T>(prompt: string, modelHint: ModelHint, config: GenerationConfig, schema: OutputSchema<T>, options?: CompleteOptions): Promise<CompletionResult<T>>;
}

const STRICT_JSON_SUFFIX = [
    'Your previous reply could not be parsed.',
    'Return ONLY one JSON object that matches the requested structure exactly.',
    'No markdown fences, no commentary, no trailing text.'
].join(' ');

interface ProviderOutcome<T> {
    raw: RawCompletion;
    data: T;
}

interface CallCounter {
    calls: number;
}

type Parser<T> = (text: string) => { ok: true; data: T } | { ok: false; issue: string };

export function extractJsonObject(text: string): unknown {
    const trimmed = text.trim();
    const first = trimmed.indexOf('{');
    const last = trimmed.lastIndexOf('}');
    if (first < 0 || last <= first) {
        throw new Error('Response does not contain a JSON object');
    }
    return JSON.parse(trimmed.slice(first, last + 1));
}

function schemaParser<T>(schema: OutputSchema<T>): Parser<T> {
    return (text: string) => {
        let candidate: unknown;
        try {
            candidate = extractJsonObject(text);
        } catch (error) {
            return { ok: false, issue: error instanceof Error ? error.message : 'invalid JSON' };
        }
        const parsed = schema.safeParse(candidate);
        if (!parsed.success) {
            return { ok: false, issue: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ') };
        }
        return { ok: true, data: parsed.data };
    };
}

/**
 * Provider Gateway
 *
 * Uniform completion contract over the configured providers. Owns per-attempt
 * timeouts, retry with backoff and jitter, provider fallback, circuit breaking,
 * structured-output repair and the global concurrency limit.
 */
export class ProviderGateway implements IProviderGateway {
    private readonly adapters = new Map<ProviderName, ProviderAdapter>();
    private readonly breakers = new Map<ProviderName, CircuitBreaker>();
    private readonly now: () => number;
    private readonly random: () => number;

    constructor(
        adapters: ProviderAdapter[],
        private semaphore: Semaphore,
        private options: GatewayOptions,
        private logger: ILogger
    ) {
        this.now = options.now ?? Date.now;
        this.random = options.random ?? Math.random;
        for (const adapter of adapters) {
            this.adapters.set(adapter.name, adapter);
            this.breakers.set(adapter.name, new CircuitBreaker(adapter.name, options.circuit, logger, this.now));
        }
    }

    /**
     * Factory method for production use
     */
    static create(settings: AppSettings = getSettings()): ProviderGateway {
        const adapters: ProviderAdapter[] = [];
        if (settings.OPENAI_API_KEY) {
            adapters.push(OpenAIProvider.create(settings.OPENAI_API_KEY, {
                fast: settings.OPENAI_MODEL,
                quality: settings.OPENAI_QUALITY_MODEL
            }, logger));
        }
        if (settings.ANTHROPIC_API_KEY) {
            adapters.push(AnthropicProvider.create(settings.ANTHROPIC_API_KEY, {
                fast: settings.ANTHROPIC_MODEL,
                quality: settings.ANTHROPIC_QUALITY_MODEL
            }, logger));
        }

        return new ProviderGateway(adapters, new Semaphore(settings.PROVIDER_CONCURRENCY), {
            circuit: {
                failureThreshold: settings.CIRCUIT_FAILURE_THRESHOLD,
                windowMs: settings.CIRCUIT_WINDOW_MS,
                cooldownMs: settings.CIRCUIT_COOLDOWN_MS
            },
            retryBaseDelayMs: settings.RETRY_BASE_DELAY_MS,
            retryMaxDelayMs: settings.RETRY_MAX_DELAY_MS
        }, logger);
    }

    circuitState(provider: ProviderName): CircuitBreaker['state'] | undefined {
        return this.breakers.get(provider)?.state;
    }

    async complete(
        prompt: string,
        modelHint: ModelHint,
        config: GenerationConfig,
        options: CompleteOptions = {}
    ): Promise<CompletionResult<undefined>> {
        return this.execute(prompt, modelHint, config, false, () => ({ ok: true, data: undefined }), options);
    }

    async completeJson<T>(
        prompt: string,
        modelHint: ModelHint,
        config: GenerationConfig,
        schema: OutputSchema<T>,
        options: CompleteOptions = {}
    ): Promise<CompletionResult<T>> {
        return this.execute(prompt, modelHint, config, true, schemaParser(schema), options);
    }

    private async execute<T>(
        prompt: string,
        modelHint: ModelHint,
        config: GenerationConfig,
        jsonOutput: boolean,
        parse: Parser<T>,
        options: CompleteOptions
    ): Promise<CompletionResult<T>> {
        const promptName = options.promptName ?? 'completion';
        const request: ProviderRequest = {
            prompt,
            system: options.system,
            temperature: config.temperature,
            maxOutputTokens: config.maxOutputTokens,
            jsonOutput
        };
        const attempts: ProviderAttemptRecord[] = [];
        const counter: CallCounter = { calls: 0 };
        const startedAt = this.now();

        for (const providerName of config.providerPreferenceOrder) {
            const adapter = this.adapters.get(providerName);
            const breaker = this.breakers.get(providerName);
            if (!adapter || !breaker) {
                attempts.push({ provider: providerName, kind: 'Unavailable', message: 'provider not configured' });
                continue;
            }

            const permit = breaker.acquire();
            if (permit === 'reject') {
                this.logger.info({ provider: providerName, promptName }, 'Skipping provider with open circuit');
                attempts.push({ provider: providerName, kind: 'Unavailable', message: 'circuit open' });
                continue;
            }

            try {
                const outcome = await RetryUtil.executeWithRetry(
                    () => this.attemptParsed(adapter, breaker, request, modelHint, config, parse, counter, options.signal),
                    {
                        maxAttempts: permit === 'probe' ? 1 : config.maxRetries + 1,
                        baseDelay: this.options.retryBaseDelayMs,
                        maxDelay: this.options.retryMaxDelayMs,
                        jitter: true,
                        random: this.random,
                        signal: options.signal,
                        operationName: `${providerName} ${promptName}`,
                        isRetryable: error => error instanceof ProviderError && error.retryable && breaker.state === 'closed'
                    }
                );

                this.logger.info({
                    provider: providerName,
                    model: outcome.raw.model,
                    promptName,
                    tokensUsed: outcome.raw.usage.totalTokens,
                    calls: counter.calls
                }, 'Provider completion succeeded');

                return {
                    text: outcome.raw.text,
                    data: outcome.data,
                    provider: providerName,
                    model: outcome.raw.model,
                    usage: outcome.raw.usage,
                    latencyMs: this.now() - startedAt,
                    attempts: counter.calls
                };
            } catch (error) {
                breaker.abandonProbe();
                const failure = this.normalizeFailure(error, providerName, options.signal);
                attempts.push({ provider: providerName, kind: failure.kind, message: failure.message });

                if (failure.kind === 'Cancelled' || failure.kind === 'MalformedResponse') {
                    throw new ProviderError(failure.kind, failure.message, providerName, attempts, { cause: error });
                }

                this.logger.warn({
                    provider: providerName,
                    promptName,
                    kind: failure.kind,
                    error: failure.message
                }, 'Provider exhausted, trying next provider');
            }
        }

        throw new ProviderError(
            'AllProvidersExhausted',
            `All providers exhausted for ${promptName}: ${attempts.map(a => `${a.provider}=${a.kind}`).join(', ')}`,
            undefined,
            attempts
        );
    }

    /**
     * One logical attempt: a call, and for unparseable structured output one
     * more call on the same provider with a stricter format instruction.
     */
    private async attemptParsed<T>(
        adapter: ProviderAdapter,
        breaker: CircuitBreaker,
        request: ProviderRequest,
        modelHint: ModelHint,
        config: GenerationConfig,
        parse: Parser<T>,
        counter: CallCounter,
        signal?: AbortSignal
    ): Promise<ProviderOutcome<T>> {
        const first = await this.callOnce(adapter, breaker, request, modelHint, config, counter, signal);
        const parsed = parse(first.text);
        if (parsed.ok) {
            return { raw: first, data: parsed.data };
        }

        this.logger.warn({ provider: adapter.name, issue: parsed.issue }, 'Malformed structured response, retrying with strict format');
        const strictRequest = { ...request, prompt: `${request.prompt}\n\n${STRICT_JSON_SUFFIX}` };
        const second = await this.callOnce(adapter, breaker, strictRequest, modelHint, config, counter, signal);
        const reparsed = parse(second.text);
        if (reparsed.ok) {
            return { raw: second, data: reparsed.data };
        }
        throw new ProviderError('MalformedResponse', `${adapter.name}: ${reparsed.issue}`, adapter.name);
    }

    private async callOnce(
        adapter: ProviderAdapter,
        breaker: CircuitBreaker,
        request: ProviderRequest,
        modelHint: ModelHint,
        config: GenerationConfig,
        counter: CallCounter,
        signal?: AbortSignal
    ): Promise<RawCompletion> {
        const release = await this.semaphore.acquire(signal);
        counter.calls++;
        const timeout = new AbortController();
        const timer = setTimeout(() => {
            timeout.abort(new ProviderError('Timeout', `${adapter.name}: no response within ${config.timeoutMs}ms`, adapter.name));
        }, config.timeoutMs);
        const attemptSignal = anySignal(signal, timeout.signal);

        try {
            const raw = await raceAbort(adapter.complete(request, modelHint, attemptSignal), attemptSignal);
            breaker.recordSuccess();
            return raw;
        } catch (error) {
            const failure = signal?.aborted
                ? new ProviderError('Cancelled', `${adapter.name}: cancelled by caller`, adapter.name, [], { cause: error })
                : timeout.signal.aborted
                    ? new ProviderError('Timeout', `${adapter.name}: no response within ${config.timeoutMs}ms`, adapter.name)
                    : this.normalizeFailure(error, adapter.name, signal);
            if (failure.retryable) {
                breaker.recordFailure();
            }
            throw failure;
        } finally {
            clearTimeout(timer);
            release();
        }
    }

    private normalizeFailure(error: unknown, provider: ProviderName, signal?: AbortSignal): ProviderError {
        if (error instanceof ProviderError) {
            return error;
        }
        if (signal?.aborted) {
            return new ProviderError('Cancelled', `${provider}: cancelled by caller`, provider, [], { cause: abortReason(signal) });
        }
        return new ProviderError('Unavailable', `${provider}: ${error instanceof Error ? error.message : String(error)}`, provider);
    }
}

// Singleton instance
let providerGateway: ProviderGateway | null = null;

export function getProviderGateway(): ProviderGateway {
    if (!providerGateway) {
        providerGateway = ProviderGateway.create();
    }
    return providerGateway;
}

/**
 * Generation config from settings, with per-call overrides.
 */
export function defaultGenerationConfig(
    overrides: Partial<GenerationConfig> = {},
    settings: AppSettings = getSettings()
): GenerationConfig {
    return {
        temperature: settings.LLM_TEMPERATURE,
        maxOutputTokens: settings.LLM_MAX_OUTPUT_TOKENS,
        providerPreferenceOrder: settings.PROVIDER_ORDER,
        timeoutMs: settings.LLM_TIMEOUT_MS,
        maxRetries: settings.LLM_MAX_RETRIES,
        ...overrides
    };
}
