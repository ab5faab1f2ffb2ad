import { Redis } from 'ioredis';
import { getSettings } from '../config/settings';

/**
 * Key/value contract shared across processes. Values are opaque strings;
 * TTLs are in milliseconds.
 */
export interface SharedStore {
    get(key: string): Promise<string | null>;
    set(key: string, value: string, ttlMs?: number): Promise<void>;
    /** Set only when the key is absent. Resolves true when this call set it. */
    setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean>;
    expire(key: string, ttlMs: number): Promise<void>;
    delete(key: string): Promise<void>;
    /** Drop expired records now. Stores that expire records themselves leave this out. */
    purge?(): number;
    close(): Promise<void>;
}

/**
 * Redis-backed store used when REDIS_URL is configured.
 */
export class RedisSharedStore implements SharedStore {
    constructor(private redis: Redis, private prefix: string = 'iee:') { }

    static create(url: string): RedisSharedStore {
        return new RedisSharedStore(new Redis(url, {
            enableReadyCheck: false,
            maxRetriesPerRequest: 3
        }));
    }

    async get(key: string): Promise<string | null> {
        return this.redis.get(this.prefix + key);
    }

    async set(key: string, value: string, ttlMs?: number): Promise<void> {
        if (ttlMs !== undefined) {
            await this.redis.set(this.prefix + key, value, 'PX', ttlMs);
        } else {
            await this.redis.set(this.prefix + key, value);
        }
    }

    async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
        const result = await this.redis.set(this.prefix + key, value, 'PX', ttlMs, 'NX');
        return result === 'OK';
    }

    async expire(key: string, ttlMs: number): Promise<void> {
        await this.redis.pexpire(this.prefix + key, ttlMs);
    }

    async delete(key: string): Promise<void> {
        await this.redis.del(this.prefix + key);
    }

    async close(): Promise<void> {
        await this.redis.quit();
    }
}

interface MemoryRecord {
    value: string;
    expiresAt: number | null;
}

/**
 * Single-process store for deployments without Redis.
 *
 * Records written with a TTL count against `capacity`; the least recently
 * used of them is evicted first. Records without a TTL are never evicted.
 */
export class MemorySharedStore implements SharedStore {
    private readonly records = new Map<string, MemoryRecord>();
    private expiring = 0;

    constructor(
        private now: () => number = Date.now,
        private capacity: number = Number.POSITIVE_INFINITY
    ) { }

    async get(key: string): Promise<string | null> {
        const record = this.read(key);
        if (!record) {
            return null;
        }
        this.touch(key, record);
        return record.value;
    }

    async set(key: string, value: string, ttlMs?: number): Promise<void> {
        this.write(key, { value, expiresAt: ttlMs !== undefined ? this.now() + ttlMs : null });
    }

    async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
        if (this.read(key)) {
            return false;
        }
        this.write(key, { value, expiresAt: this.now() + ttlMs });
        return true;
    }

    async expire(key: string, ttlMs: number): Promise<void> {
        const record = this.read(key);
        if (record) {
            this.write(key, { value: record.value, expiresAt: this.now() + ttlMs });
        }
    }

    async delete(key: string): Promise<void> {
        this.remove(key);
    }

    purge(): number {
        const now = this.now();
        let purged = 0;
        for (const [key, record] of this.records) {
            if (record.expiresAt !== null && record.expiresAt <= now) {
                this.remove(key);
                purged++;
            }
        }
        return purged;
    }

    async close(): Promise<void> {
        this.records.clear();
        this.expiring = 0;
    }

    get size(): number {
        return this.records.size;
    }

    private read(key: string): MemoryRecord | undefined {
        const record = this.records.get(key);
        if (record && record.expiresAt !== null && record.expiresAt <= this.now()) {
            this.remove(key);
            return undefined;
        }
        return record;
    }

    private touch(key: string, record: MemoryRecord): void {
        this.records.delete(key);
        this.records.set(key, record);
    }

    private write(key: string, record: MemoryRecord): void {
        this.remove(key);
        this.records.set(key, record);
        if (record.expiresAt !== null) {
            this.expiring++;
            this.evictBeyondCapacity();
        }
    }

    private remove(key: string): void {
        const record = this.records.get(key);
        if (!record) {
            return;
        }
        this.records.delete(key);
        if (record.expiresAt !== null) {
            this.expiring--;
        }
    }

    private evictBeyondCapacity(): void {
        if (this.expiring <= this.capacity) {
            return;
        }
        // Map order is least recently used first.
        for (const [key, record] of this.records) {
            if (this.expiring <= this.capacity) {
                break;
            }
            if (record.expiresAt !== null) {
                this.remove(key);
            }
        }
    }
}

let sharedStore: SharedStore | null = null;

export function getSharedStore(): SharedStore {
    if (!sharedStore) {
        const url = getSettings().REDIS_URL;
        sharedStore = url
            ? RedisSharedStore.create(url)
            : new MemorySharedStore(Date.now, getSettings().SHARED_STORE_CAPACITY);
    }
    return sharedStore;
}
