import type { ProviderName } from '../config/settings';
import type { RawCompletion, ProviderRequest } from '../types/provider';
import { ProviderError } from '../errors';
import type { ProviderErrorKind } from '../errors';

export type ModelHint = 'fast' | 'quality';

/**
 * Capability every external completion provider exposes to the gateway.
 * Adapters translate their SDK's payloads and failures into RawCompletion
 * and ProviderError; nothing provider-specific leaks past them.
 */
export interface ProviderAdapter {
    readonly name: ProviderName;
    complete(request: ProviderRequest, modelHint: ModelHint, signal?: AbortSignal): Promise<RawCompletion>;
}

export interface ProviderModels {
    fast: string;
    quality: string;
}

function readProperty(error: object, key: string): unknown {
    return key in error ? Reflect.get(error, key) : undefined;
}

/**
 * Map an SDK or transport error to the gateway's error taxonomy. Both SDKs
 * expose an HTTP `status` and name their timeout/abort/connection classes
 * the same way.
 */
export function toProviderError(error: unknown, provider: ProviderName): ProviderError {
    if (error instanceof ProviderError) {
        return error;
    }
    if (!(error instanceof Error)) {
        return new ProviderError('Unavailable', `${provider}: ${String(error)}`, provider);
    }

    const status = readProperty(error, 'status');
    const code = readProperty(error, 'code');
    const message = `${provider}: ${error.message}`;
    const wrap = (kind: ProviderErrorKind) => new ProviderError(kind, message, provider, [], { cause: error });

    if (error.name === 'APIUserAbortError' || error.name === 'AbortError') {
        return wrap('Cancelled');
    }
    if (error.name === 'APIConnectionTimeoutError' || code === 'ETIMEDOUT' || /timed? ?out/i.test(error.message)) {
        return wrap('Timeout');
    }
    if (status === 429) {
        return wrap('RateLimited');
    }
    if (typeof status === 'number') {
        return status >= 500 ? wrap('Unavailable') : wrap('Rejected');
    }
    return wrap('Unavailable');
}

export const JSON_ONLY_INSTRUCTION = 'Respond with a single valid JSON object and nothing else.';
