import * as crypto from 'crypto';
import { z } from 'zod';
import { errorFields, logger, ILogger } from '../config/logger';
import { getSettings } from '../config/settings';
import { abortReason, raceAbort, sleep } from '../utils/async.util';
import { getSharedStore } from './shared-store';
import type { SharedStore } from './shared-store';
import type { OutputSchema } from '../types/schemas';

export interface CacheEntry<T> {
    fingerprint: string;
    payload: T;
    createdAt: number;
    ttlMs: number;
}

export interface ResponseCacheOptions {
    capacity: number;
    sweepIntervalMs: number;
    /** How long a process may hold the shared computation lease. */
    leaseMs: number;
    pollIntervalMs: number;
    now?: () => number;
}

const envelopeSchema = z.object({
    fingerprint: z.string(),
    payload: z.unknown(),
    createdAt: z.number(),
    ttlMs: z.number()
});

/** A computation shared by every local caller of one fingerprint. */
interface Flight {
    promise: Promise<unknown>;
    controller: AbortController;
    waiters: number;
    settled: boolean;
}

const ENTRY_PREFIX = 'cache:entry:';
const LEASE_PREFIX = 'cache:lease:';

/**
 * Response Cache
 *
 * Fingerprint-keyed payloads in two tiers: an in-process LRU in front of the
 * shared store. At most one computation per fingerprint is pending at a
 * time; concurrent callers join it. Entries are age-checked on every read
 * and evicted lazily, with a periodic sweep bounding memory.
 *
 * A shared computation runs under its own signal. Each caller waits under
 * its own signal, and the computation is aborted only once every caller
 * has stopped waiting.
 */
export class ResponseCache {
    private readonly local = new Map<string, CacheEntry<unknown>>();
    private readonly inflight = new Map<string, Flight>();
    private readonly now: () => number;
    private sweepTimer: NodeJS.Timeout | null = null;

    constructor(
        private store: SharedStore,
        private options: ResponseCacheOptions,
        private logger: ILogger
    ) {
        this.now = options.now ?? Date.now;
    }

    /**
     * Factory method for production use
     */
    static create(): ResponseCache {
        const settings = getSettings();
        return new ResponseCache(getSharedStore(), {
            capacity: settings.CACHE_CAPACITY,
            sweepIntervalMs: settings.CACHE_SWEEP_INTERVAL_MS,
            leaseMs: settings.LLM_TIMEOUT_MS * (settings.LLM_MAX_RETRIES + 1) * 2,
            pollIntervalMs: 250
        }, logger);
    }

    get size(): number {
        return this.local.size;
    }

    async getOrCompute<T>(
        fingerprint: string,
        ttlMs: number,
        compute: (signal: AbortSignal) => Promise<T>,
        schema: OutputSchema<T>,
        signal?: AbortSignal
    ): Promise<T> {
        if (signal?.aborted) {
            throw abortReason(signal);
        }
        const cached = this.readLocal(fingerprint, schema);
        if (cached.hit) {
            this.logger.debug({ fingerprint }, 'Cache hit (local)');
            return cached.payload;
        }

        let flight = this.inflight.get(fingerprint);
        if (flight) {
            this.logger.debug({ fingerprint }, 'Joining in-flight computation');
        } else {
            flight = this.launch(fingerprint, ttlMs, compute, schema);
        }

        flight.waiters++;
        try {
            return schema.parse(await raceAbort(flight.promise, signal));
        } finally {
            this.leave(fingerprint, flight);
        }
    }

    async invalidate(fingerprint: string): Promise<void> {
        this.local.delete(fingerprint);
        await this.store.delete(ENTRY_PREFIX + fingerprint);
    }

    /**
     * Drop expired local entries, then the least recently used ones beyond
     * capacity. Returns the number of local entries evicted. A shared store
     * that can purge itself is purged too.
     */
    sweep(): number {
        const now = this.now();
        let evicted = 0;
        for (const [fingerprint, entry] of this.local) {
            if (now - entry.createdAt >= entry.ttlMs) {
                this.local.delete(fingerprint);
                evicted++;
            }
        }
        evicted += this.enforceCapacity();
        const purged = this.store.purge?.() ?? 0;
        if (evicted > 0 || purged > 0) {
            this.logger.debug({ evicted, purged, size: this.local.size }, 'Cache sweep evicted entries');
        }
        return evicted;
    }

    start(): void {
        if (this.sweepTimer) {
            return;
        }
        this.sweepTimer = setInterval(() => this.sweep(), this.options.sweepIntervalMs);
        this.sweepTimer.unref();
    }

    stop(): void {
        if (this.sweepTimer) {
            clearInterval(this.sweepTimer);
            this.sweepTimer = null;
        }
    }

    private launch<T>(
        fingerprint: string,
        ttlMs: number,
        compute: (signal: AbortSignal) => Promise<T>,
        schema: OutputSchema<T>
    ): Flight {
        const controller = new AbortController();
        const flight: Flight = { promise: Promise.resolve(), controller, waiters: 0, settled: false };
        flight.promise = this.load(fingerprint, ttlMs, compute, schema, controller.signal).finally(() => {
            flight.settled = true;
            if (this.inflight.get(fingerprint) === flight) {
                this.inflight.delete(fingerprint);
            }
        });
        this.inflight.set(fingerprint, flight);
        return flight;
    }

    private leave(fingerprint: string, flight: Flight): void {
        flight.waiters--;
        if (flight.waiters > 0 || flight.settled) {
            return;
        }
        // Later callers start a fresh computation instead of joining an aborted one.
        if (this.inflight.get(fingerprint) === flight) {
            this.inflight.delete(fingerprint);
        }
        this.logger.debug({ fingerprint }, 'Every caller left, aborting shared computation');
        flight.controller.abort(new Error(`Computation for ${fingerprint} abandoned by every caller`));
    }

    private async load<T>(
        fingerprint: string,
        ttlMs: number,
        compute: (signal: AbortSignal) => Promise<T>,
        schema: OutputSchema<T>,
        signal: AbortSignal
    ): Promise<T> {
        const shared = await this.readShared(fingerprint, schema);
        if (shared) {
            this.logger.debug({ fingerprint }, 'Cache hit (shared)');
            this.writeLocal(shared);
            return shared.payload;
        }

        const leaseKey = LEASE_PREFIX + fingerprint;
        const leaseToken = crypto.randomUUID();
        let leased = await this.tryLease(leaseKey, leaseToken);
        if (!leased) {
            const published = await this.waitForPublished(fingerprint, leaseKey, schema, signal);
            if (published) {
                this.writeLocal(published);
                return published.payload;
            }
            leased = await this.tryLease(leaseKey, leaseToken);
        }

        this.logger.debug({ fingerprint }, 'Cache miss, computing');
        try {
            const payload = await compute(signal);
            const entry: CacheEntry<T> = { fingerprint, payload, createdAt: this.now(), ttlMs };
            this.writeLocal(entry);
            await this.writeShared(entry);
            return payload;
        } finally {
            if (leased) {
                await this.releaseLease(leaseKey, leaseToken);
            }
        }
    }

    private readLocal<T>(fingerprint: string, schema: OutputSchema<T>): { hit: true; payload: T } | { hit: false } {
        const entry = this.local.get(fingerprint);
        if (!entry) {
            return { hit: false };
        }
        if (this.now() - entry.createdAt >= entry.ttlMs) {
            this.local.delete(fingerprint);
            return { hit: false };
        }
        const parsed = schema.safeParse(entry.payload);
        if (!parsed.success) {
            this.local.delete(fingerprint);
            return { hit: false };
        }
        // Re-insert to mark as most recently used.
        this.local.delete(fingerprint);
        this.local.set(fingerprint, entry);
        return { hit: true, payload: parsed.data };
    }

    private writeLocal(entry: CacheEntry<unknown>): void {
        this.local.delete(entry.fingerprint);
        this.local.set(entry.fingerprint, entry);
        this.enforceCapacity();
    }

    private enforceCapacity(): number {
        let evicted = 0;
        while (this.local.size > this.options.capacity) {
            const oldest = this.local.keys().next();
            if (oldest.done) {
                break;
            }
            this.local.delete(oldest.value);
            evicted++;
        }
        return evicted;
    }

    private async readShared<T>(fingerprint: string, schema: OutputSchema<T>): Promise<CacheEntry<T> | null> {
        let raw: string | null;
        try {
            raw = await this.store.get(ENTRY_PREFIX + fingerprint);
        } catch (error) {
            this.logger.warn({ fingerprint, ...errorFields(error) }, 'Shared cache read failed, treating as miss');
            return null;
        }
        if (!raw) {
            return null;
        }

        let decoded: unknown;
        try {
            decoded = JSON.parse(raw);
        } catch {
            this.logger.warn({ fingerprint }, 'Shared cache entry is not valid JSON, treating as miss');
            return null;
        }
        const envelope = envelopeSchema.safeParse(decoded);
        if (!envelope.success || this.now() - envelope.data.createdAt >= envelope.data.ttlMs) {
            return null;
        }
        const payload = schema.safeParse(envelope.data.payload);
        if (!payload.success) {
            this.logger.warn({ fingerprint }, 'Shared cache payload failed validation, treating as miss');
            return null;
        }
        return { ...envelope.data, payload: payload.data };
    }

    private async writeShared(entry: CacheEntry<unknown>): Promise<void> {
        try {
            await this.store.set(ENTRY_PREFIX + entry.fingerprint, JSON.stringify(entry), entry.ttlMs);
        } catch (error) {
            this.logger.warn({ fingerprint: entry.fingerprint, ...errorFields(error) }, 'Shared cache write failed');
        }
    }

    private async tryLease(leaseKey: string, token: string): Promise<boolean> {
        try {
            return await this.store.setIfAbsent(leaseKey, token, this.options.leaseMs);
        } catch (error) {
            this.logger.warn({ leaseKey, ...errorFields(error) }, 'Shared lease unavailable, computing locally');
            return false;
        }
    }

    private async releaseLease(leaseKey: string, token: string): Promise<void> {
        try {
            if (await this.store.get(leaseKey) === token) {
                await this.store.delete(leaseKey);
            }
        } catch (error) {
            this.logger.warn({ leaseKey, ...errorFields(error) }, 'Failed to release shared lease');
        }
    }

    /**
     * Another process holds the lease: poll until it publishes the entry or
     * the lease disappears.
     */
    private async waitForPublished<T>(
        fingerprint: string,
        leaseKey: string,
        schema: OutputSchema<T>,
        signal: AbortSignal
    ): Promise<CacheEntry<T> | null> {
        this.logger.debug({ fingerprint }, 'Waiting for computation in another process');
        const deadline = this.now() + this.options.leaseMs;
        while (this.now() < deadline) {
            await sleep(this.options.pollIntervalMs, signal);
            const published = await this.readShared(fingerprint, schema);
            if (published) {
                return published;
            }
            let holder: string | null;
            try {
                holder = await this.store.get(leaseKey);
            } catch (error) {
                this.logger.warn({ leaseKey, ...errorFields(error) }, 'Shared lease lookup failed, computing locally');
                return null;
            }
            if (holder === null) {
                return this.readShared(fingerprint, schema);
            }
        }
        return null;
    }
}

// Singleton instance
let responseCache: ResponseCache | null = null;

export function getResponseCache(): ResponseCache {
    if (!responseCache) {
        responseCache = ResponseCache.create();
    }
    return responseCache;
}
