import { z } from 'zod';
import { HistogramSketch } from './quantile-sketch';

export interface RunningStats {
    count: number;
    mean: number;
    /** Sum of squared deviations (Welford). */
    m2: number;
}

export interface Baseline {
    mean: number;
    variance: number;
    version: number;
    recalibratedAt: number;
}

export interface PoolPolicy {
    outlierK: number;
    outlierMinSamples: number;
    recalibrateEvery: number;
    recalibrateIntervalMs: number;
    decayHalfLife: number;
    windowSize: number;
}

/**
 * Committed state of one (cohort, competency) pool. Never mutated once
 * committed; transitions return a new state.
 */
export interface PoolState {
    readonly key: string;
    readonly sketch: HistogramSketch;
    readonly stats: RunningStats;
    readonly window: readonly number[];
    readonly baseline: Baseline | null;
    readonly insertionsSinceRecalibration: number;
    readonly lastRecalibratedAt: number;
    readonly outliersFlagged: number;
}

export interface InsertResult {
    state: PoolState;
    isOutlier: boolean;
    recalibrated: boolean;
}

export function emptyPool(key: string, bins: number, now: number): PoolState {
    return {
        key,
        sketch: HistogramSketch.empty(bins),
        stats: { count: 0, mean: 0, m2: 0 },
        window: [],
        baseline: null,
        insertionsSinceRecalibration: 0,
        lastRecalibratedAt: now,
        outliersFlagged: 0
    };
}

export function runningVariance(stats: RunningStats): number {
    return stats.count > 1 ? stats.m2 / (stats.count - 1) : 0;
}

/**
 * Reference distribution for outlier checks: the baseline once one exists,
 * otherwise the running statistics.
 */
export function referenceDistribution(state: PoolState): { mean: number; stddev: number } {
    if (state.baseline) {
        return { mean: state.baseline.mean, stddev: Math.sqrt(state.baseline.variance) };
    }
    return { mean: state.stats.mean, stddev: Math.sqrt(runningVariance(state.stats)) };
}

export function isOutlier(state: PoolState, value: number, policy: PoolPolicy): boolean {
    if (state.stats.count < policy.outlierMinSamples) {
        return false;
    }
    const { mean, stddev } = referenceDistribution(state);
    return stddev > 0 && Math.abs(value - mean) > policy.outlierK * stddev;
}

function welford(stats: RunningStats, value: number): RunningStats {
    const count = stats.count + 1;
    const delta = value - stats.mean;
    const mean = stats.mean + delta / count;
    return { count, mean, m2: stats.m2 + delta * (value - mean) };
}

/**
 * Exponentially decayed mean and variance over the window; the newest
 * sample has weight 1 and weights halve every `halfLife` samples.
 */
export function decayedMoments(window: readonly number[], halfLife: number): { mean: number; variance: number } {
    let weightSum = 0;
    let weightedSum = 0;
    window.forEach((value, index) => {
        const age = window.length - 1 - index;
        const weight = Math.pow(0.5, age / halfLife);
        weightSum += weight;
        weightedSum += weight * value;
    });
    if (weightSum === 0) {
        return { mean: 0, variance: 0 };
    }
    const mean = weightedSum / weightSum;
    let weightedSquares = 0;
    window.forEach((value, index) => {
        const age = window.length - 1 - index;
        weightedSquares += Math.pow(0.5, age / halfLife) * (value - mean) ** 2;
    });
    return { mean, variance: weightedSquares / weightSum };
}

export function recalibrate(state: PoolState, policy: PoolPolicy, now: number): PoolState {
    const { mean, variance } = decayedMoments(state.window, policy.decayHalfLife);
    return {
        ...state,
        baseline: {
            mean,
            variance,
            version: (state.baseline?.version ?? 0) + 1,
            recalibratedAt: now
        },
        insertionsSinceRecalibration: 0,
        lastRecalibratedAt: now
    };
}

function recalibrationDue(state: PoolState, policy: PoolPolicy, now: number): boolean {
    if (state.window.length === 0) {
        return false;
    }
    return state.insertionsSinceRecalibration >= policy.recalibrateEvery
        || now - state.lastRecalibratedAt >= policy.recalibrateIntervalMs;
}

/**
 * Record a score. Outliers still enter the sketch, so ranks stay honest,
 * but are kept out of the statistics and the recalibration window.
 */
export function insert(state: PoolState, value: number, policy: PoolPolicy, now: number): InsertResult {
    const outlier = isOutlier(state, value, policy);
    let window = state.window;
    if (!outlier) {
        window = [...state.window, value];
        if (window.length > policy.windowSize) {
            window = window.slice(window.length - policy.windowSize);
        }
    }

    const next: PoolState = {
        ...state,
        sketch: state.sketch.add(value),
        stats: outlier ? state.stats : welford(state.stats, value),
        window,
        insertionsSinceRecalibration: state.insertionsSinceRecalibration + 1,
        outliersFlagged: state.outliersFlagged + (outlier ? 1 : 0)
    };

    if (recalibrationDue(next, policy, now)) {
        return { state: recalibrate(next, policy, now), isOutlier: outlier, recalibrated: true };
    }
    return { state: next, isOutlier: outlier, recalibrated: false };
}

const persistedPoolSchema = z.object({
    key: z.string(),
    bins: z.number().int().positive(),
    sketch: z.array(z.tuple([z.number().int().min(0), z.number().int().min(0)])),
    stats: z.object({ count: z.number(), mean: z.number(), m2: z.number() }),
    window: z.array(z.number()),
    baseline: z.object({
        mean: z.number(),
        variance: z.number(),
        version: z.number().int(),
        recalibratedAt: z.number()
    }).nullable(),
    insertionsSinceRecalibration: z.number().int().min(0),
    lastRecalibratedAt: z.number(),
    outliersFlagged: z.number().int().min(0)
});

export function serializePool(state: PoolState): string {
    return JSON.stringify({
        key: state.key,
        bins: state.sketch.bins,
        sketch: state.sketch.toSparse(),
        stats: state.stats,
        window: state.window,
        baseline: state.baseline,
        insertionsSinceRecalibration: state.insertionsSinceRecalibration,
        lastRecalibratedAt: state.lastRecalibratedAt,
        outliersFlagged: state.outliersFlagged
    });
}

/**
 * Returns null when the payload is not a pool snapshot with the expected
 * bin count.
 */
export function deserializePool(raw: string, bins: number): PoolState | null {
    let decoded: unknown;
    try {
        decoded = JSON.parse(raw);
    } catch {
        return null;
    }
    const parsed = persistedPoolSchema.safeParse(decoded);
    if (!parsed.success || parsed.data.bins !== bins) {
        return null;
    }
    const data = parsed.data;
    return {
        key: data.key,
        sketch: HistogramSketch.fromSparse(bins, data.sketch),
        stats: data.stats,
        window: data.window,
        baseline: data.baseline,
        insertionsSinceRecalibration: data.insertionsSinceRecalibration,
        lastRecalibratedAt: data.lastRecalibratedAt,
        outliersFlagged: data.outliersFlagged
    };
}
