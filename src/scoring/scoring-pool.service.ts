import * as crypto from 'crypto';
import { z } from 'zod';
import { errorFields, logger, ILogger } from '../config/logger';
import { getSettings } from '../config/settings';
import { getSharedStore } from '../cache/shared-store';
import type { SharedStore } from '../cache/shared-store';
import { ScoringError } from '../errors';
import type { PercentileResult } from '../types/evaluation';
import { sleep } from '../utils/async.util';
import { KeyedMutex } from '../utils/keyed-mutex';
import {
    deserializePool,
    emptyPool,
    insert,
    recalibrate as recalibratePool,
    referenceDistribution,
    runningVariance,
    serializePool
} from './cohort-pool';
import type { Baseline, PoolPolicy, PoolState } from './cohort-pool';

export const COMPOSITE_COMPETENCY_ID = 'composite';

export interface ScoringPoolOptions extends PoolPolicy {
    bins: number;
    minPoolSize: number;
    /** Lifetime of the cross-process write lease on one pool. */
    leaseMs?: number;
    pollIntervalMs?: number;
    /** How long a recorded answer is remembered, so a retry does not count it again. */
    recordMarkerTtlMs?: number;
    now?: () => number;
}

export interface RecordOptions {
    /** Record at most once per answer and pool. */
    answerId?: string;
}

export interface RecordOutcome {
    poolKey: string;
    poolSize: number;
    isOutlier: boolean;
    recalibrated: boolean;
    baselineVersion: number;
    /** The answer was already recorded in this pool; nothing was inserted. */
    duplicate: boolean;
}

export interface PercentileOptions {
    answerId?: string;
    /** Outcome of the matching `record` call, when there was one. */
    isOutlierExcluded?: boolean;
}

export interface PoolSummary {
    poolKey: string;
    size: number;
    acceptedSamples: number;
    outliersFlagged: number;
    mean: number;
    stddev: number;
    baseline: Baseline | null;
}

export interface IScoringPool {
    record(cohortKey: string, competencyId: string, rawScore: number, options?: RecordOptions): Promise<RecordOutcome>;
    percentile(cohortKey: string, competencyId: string, rawScore: number, options?: PercentileOptions): Promise<PercentileResult>;
    recalibrate(cohortKey: string, competencyId: string): Promise<Baseline>;
    summary(cohortKey: string, competencyId: string): Promise<PoolSummary>;
}

const SNAPSHOT_PREFIX = 'scoring:pool:';
const LEASE_PREFIX = 'scoring:lease:';
const RECORDED_PREFIX = 'scoring:recorded:';

const DEFAULT_LEASE_MS = 5000;
const DEFAULT_POLL_INTERVAL_MS = 25;
const DEFAULT_RECORD_MARKER_TTL_MS = 7 * 24 * 60 * 60 * 1000;

const recordedOutcomeSchema = z.object({
    poolKey: z.string(),
    poolSize: z.number(),
    isOutlier: z.boolean(),
    recalibrated: z.boolean(),
    baselineVersion: z.number()
});

export function poolKeyOf(cohortKey: string, competencyId: string): string {
    return `${cohortKey}::${competencyId}`;
}

/**
 * Scoring Pool
 *
 * Per-cohort, per-competency score distributions. Writes to one pool are
 * serialized within the process by a mutex and across processes by a lease
 * in the shared store; each write re-reads the stored snapshot before
 * changing it. Readers see the last snapshot this process committed or
 * restored and never wait on writers.
 */
export class ScoringPool implements IScoringPool {
    private readonly committed = new Map<string, PoolState>();
    private readonly restoring = new Map<string, Promise<PoolState>>();
    private readonly mutex = new KeyedMutex();
    private readonly now: () => number;

    constructor(
        private store: SharedStore,
        private options: ScoringPoolOptions,
        private logger: ILogger
    ) {
        this.now = options.now ?? Date.now;
    }

    static create(): ScoringPool {
        const settings = getSettings();
        return new ScoringPool(getSharedStore(), {
            bins: settings.SCORING_SKETCH_BINS,
            minPoolSize: settings.SCORING_MIN_POOL_SIZE,
            outlierK: settings.SCORING_OUTLIER_K,
            outlierMinSamples: settings.SCORING_OUTLIER_MIN_SAMPLES,
            recalibrateEvery: settings.SCORING_RECALIBRATE_EVERY,
            recalibrateIntervalMs: settings.SCORING_RECALIBRATE_INTERVAL_MS,
            decayHalfLife: settings.SCORING_DECAY_HALF_LIFE,
            windowSize: settings.SCORING_WINDOW_SIZE,
            leaseMs: settings.SCORING_LEASE_MS,
            recordMarkerTtlMs: settings.SCORING_RECORD_MARKER_TTL_MS
        }, logger);
    }

    async record(cohortKey: string, competencyId: string, rawScore: number, options: RecordOptions = {}): Promise<RecordOutcome> {
        const poolKey = poolKeyOf(cohortKey, competencyId);
        if (!Number.isFinite(rawScore) || rawScore < 0 || rawScore > 1) {
            throw new ScoringError(`Score ${rawScore} is outside [0, 1]`, poolKey, this.committed.get(poolKey)?.sketch.total ?? 0);
        }

        return this.exclusive(poolKey, async () => {
            const markerKey = options.answerId !== undefined ? `${RECORDED_PREFIX}${poolKey}:${options.answerId}` : null;
            if (markerKey) {
                const previous = await this.readMarker(markerKey);
                if (previous) {
                    this.logger.info({ poolKey, answerId: options.answerId }, 'Answer already recorded in pool, skipping insertion');
                    return { ...previous, duplicate: true };
                }
            }

            const current = await this.reload(poolKey);
            const result = insert(current, rawScore, this.options, this.now());
            await this.commit(result.state);

            if (result.isOutlier) {
                const reference = referenceDistribution(current);
                this.logger.info({
                    poolKey,
                    rawScore,
                    mean: reference.mean,
                    stddev: reference.stddev
                }, 'Score flagged as outlier and excluded from pool statistics');
            }
            if (result.recalibrated && result.state.baseline) {
                this.logger.info({
                    poolKey,
                    version: result.state.baseline.version,
                    mean: result.state.baseline.mean,
                    variance: result.state.baseline.variance,
                    windowSize: result.state.window.length
                }, 'Pool baseline recalibrated');
            }

            const outcome = {
                poolKey,
                poolSize: result.state.sketch.total,
                isOutlier: result.isOutlier,
                recalibrated: result.recalibrated,
                baselineVersion: result.state.baseline?.version ?? 0
            };
            if (markerKey) {
                await this.writeMarker(markerKey, outcome);
            }
            return { ...outcome, duplicate: false };
        });
    }

    async percentile(
        cohortKey: string,
        competencyId: string,
        rawScore: number,
        options: PercentileOptions = {}
    ): Promise<PercentileResult> {
        const poolKey = poolKeyOf(cohortKey, competencyId);
        const snapshot = await this.load(poolKey);
        const poolSize = snapshot.sketch.total;
        if (!Number.isFinite(rawScore)) {
            throw new ScoringError(`Score ${rawScore} is not a finite number`, poolKey, poolSize);
        }
        if (poolSize === 0) {
            throw new ScoringError(`Pool ${poolKey} is empty`, poolKey, 0);
        }

        const provisional = poolSize < this.options.minPoolSize;
        if (provisional) {
            this.logger.debug({ poolKey, poolSize, minPoolSize: this.options.minPoolSize }, 'Percentile from undersized pool marked provisional');
        }

        return {
            answerId: options.answerId ?? '',
            competencyId,
            percentile: snapshot.sketch.percentile(rawScore),
            poolSizeAtComputation: poolSize,
            isOutlierExcluded: options.isOutlierExcluded ?? false,
            provisional
        };
    }

    /**
     * Force a baseline recalibration outside the insertion schedule.
     */
    async recalibrate(cohortKey: string, competencyId: string): Promise<Baseline> {
        const poolKey = poolKeyOf(cohortKey, competencyId);
        return this.exclusive(poolKey, async () => {
            const current = await this.reload(poolKey);
            if (current.window.length === 0) {
                throw new ScoringError(`Pool ${poolKey} has no samples to recalibrate from`, poolKey, current.sketch.total);
            }
            const next = recalibratePool(current, this.options, this.now());
            await this.commit(next);
            if (!next.baseline) {
                throw new ScoringError(`Pool ${poolKey} recalibration produced no baseline`, poolKey, next.sketch.total);
            }
            this.logger.info({
                poolKey,
                version: next.baseline.version,
                mean: next.baseline.mean,
                variance: next.baseline.variance,
                windowSize: next.window.length
            }, 'Pool baseline recalibrated on request');
            return next.baseline;
        });
    }

    async summary(cohortKey: string, competencyId: string): Promise<PoolSummary> {
        const poolKey = poolKeyOf(cohortKey, competencyId);
        const snapshot = await this.load(poolKey);
        return {
            poolKey,
            size: snapshot.sketch.total,
            acceptedSamples: snapshot.stats.count,
            outliersFlagged: snapshot.outliersFlagged,
            mean: snapshot.stats.mean,
            stddev: Math.sqrt(runningVariance(snapshot.stats)),
            baseline: snapshot.baseline
        };
    }

    /**
     * Run a write under the in-process mutex and the shared lease for the pool.
     */
    private async exclusive<T>(poolKey: string, task: () => Promise<T>): Promise<T> {
        return this.mutex.runExclusive(poolKey, async () => {
            const leaseKey = LEASE_PREFIX + poolKey;
            const token = crypto.randomUUID();
            const leased = await this.acquireLease(leaseKey, token, poolKey);
            try {
                return await task();
            } finally {
                if (leased) {
                    await this.releaseLease(leaseKey, token);
                }
            }
        });
    }

    /**
     * Resolves false when the store cannot be reached; the write then goes
     * ahead under the local mutex only.
     */
    private async acquireLease(leaseKey: string, token: string, poolKey: string): Promise<boolean> {
        const leaseMs = this.options.leaseMs ?? DEFAULT_LEASE_MS;
        const pollIntervalMs = this.options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
        const deadline = Date.now() + leaseMs * 2;
        while (true) {
            try {
                if (await this.store.setIfAbsent(leaseKey, token, leaseMs)) {
                    return true;
                }
            } catch (error) {
                this.logger.warn({ poolKey, ...errorFields(error) }, 'Pool lease unavailable, writing under the local lock only');
                return false;
            }
            if (Date.now() >= deadline) {
                throw new ScoringError(`Timed out waiting for the write lease on pool ${poolKey}`, poolKey, this.committed.get(poolKey)?.sketch.total ?? 0);
            }
            await sleep(pollIntervalMs);
        }
    }

    private async releaseLease(leaseKey: string, token: string): Promise<void> {
        try {
            if (await this.store.get(leaseKey) === token) {
                await this.store.delete(leaseKey);
            }
        } catch (error) {
            this.logger.warn({ leaseKey, ...errorFields(error) }, 'Failed to release pool lease');
        }
    }

    private async readMarker(markerKey: string): Promise<Omit<RecordOutcome, 'duplicate'> | null> {
        let raw: string | null;
        try {
            raw = await this.store.get(markerKey);
        } catch (error) {
            this.logger.warn({ markerKey, ...errorFields(error) }, 'Record marker lookup failed, recording anyway');
            return null;
        }
        if (!raw) {
            return null;
        }
        let decoded: unknown;
        try {
            decoded = JSON.parse(raw);
        } catch {
            this.logger.warn({ markerKey }, 'Discarding unreadable record marker');
            return null;
        }
        const parsed = recordedOutcomeSchema.safeParse(decoded);
        return parsed.success ? parsed.data : null;
    }

    private async writeMarker(markerKey: string, outcome: Omit<RecordOutcome, 'duplicate'>): Promise<void> {
        try {
            await this.store.set(markerKey, JSON.stringify(outcome), this.options.recordMarkerTtlMs ?? DEFAULT_RECORD_MARKER_TTL_MS);
        } catch (error) {
            this.logger.warn({ markerKey, ...errorFields(error) }, 'Record marker write failed');
        }
    }

    /**
     * Latest snapshot for a write: the stored one, unless this process holds
     * one with more samples because its last persist failed.
     */
    private async reload(poolKey: string): Promise<PoolState> {
        const stored = await this.readSnapshot(poolKey);
        const local = this.committed.get(poolKey);
        if (stored && (!local || stored.sketch.total >= local.sketch.total)) {
            this.committed.set(poolKey, stored);
            return stored;
        }
        return local ?? emptyPool(poolKey, this.options.bins, this.now());
    }

    private async load(poolKey: string): Promise<PoolState> {
        const committed = this.committed.get(poolKey);
        if (committed) {
            return committed;
        }
        const pending = this.restoring.get(poolKey);
        if (pending) {
            return pending;
        }

        const restore = this.restore(poolKey);
        this.restoring.set(poolKey, restore);
        try {
            const state = await restore;
            // A write may have committed while the restore was in flight.
            const latest = this.committed.get(poolKey);
            if (latest) {
                return latest;
            }
            this.committed.set(poolKey, state);
            return state;
        } finally {
            this.restoring.delete(poolKey);
        }
    }

    private async restore(poolKey: string): Promise<PoolState> {
        const state = await this.readSnapshot(poolKey);
        if (state) {
            this.logger.debug({ poolKey, size: state.sketch.total }, 'Restored pool snapshot');
            return state;
        }
        return emptyPool(poolKey, this.options.bins, this.now());
    }

    private async readSnapshot(poolKey: string): Promise<PoolState | null> {
        let raw: string | null;
        try {
            raw = await this.store.get(SNAPSHOT_PREFIX + poolKey);
        } catch (error) {
            this.logger.warn({ poolKey, ...errorFields(error) }, 'Pool snapshot read failed');
            return null;
        }
        if (!raw) {
            return null;
        }
        const state = deserializePool(raw, this.options.bins);
        if (!state) {
            this.logger.warn({ poolKey }, 'Discarding unreadable pool snapshot');
        }
        return state;
    }

    private async commit(state: PoolState): Promise<void> {
        this.committed.set(state.key, state);
        try {
            await this.store.set(SNAPSHOT_PREFIX + state.key, serializePool(state));
        } catch (error) {
            this.logger.warn({ poolKey: state.key, ...errorFields(error) }, 'Pool snapshot persist failed');
        }
    }
}

// Singleton instance
let scoringPool: ScoringPool | null = null;

export function getScoringPool(): ScoringPool {
    if (!scoringPool) {
        scoringPool = ScoringPool.create();
    }
    return scoringPool;
}
