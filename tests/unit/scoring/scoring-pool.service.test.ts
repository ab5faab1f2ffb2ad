import { describe, it, expect, beforeEach } from 'vitest';
import { ScoringPool, poolKeyOf } from '../../../src/scoring/scoring-pool.service';
import type { ScoringPoolOptions } from '../../../src/scoring/scoring-pool.service';
import { MemorySharedStore } from '../../../src/cache/shared-store';
import { ScoringError } from '../../../src/errors';
import type { ILogger } from '../../../src/config/logger';
import { createMockLogger } from '../../helpers/mock-logger';

describe('ScoringPool', () => {
    let clock: number;
    let store: MemorySharedStore;
    let logger: ILogger;

    function pool(overrides: Partial<ScoringPoolOptions> = {}): ScoringPool {
        return new ScoringPool(store, {
            bins: 100,
            minPoolSize: 3,
            outlierK: 3,
            outlierMinSamples: 5,
            recalibrateEvery: 1000,
            recalibrateIntervalMs: 1e12,
            decayHalfLife: 50,
            windowSize: 100,
            now: () => clock,
            ...overrides
        }, logger);
    }

    beforeEach(() => {
        clock = 0;
        store = new MemorySharedStore();
        logger = createMockLogger();
    });

    it('should key pools by cohort and competency', () => {
        expect(poolKeyOf('backend:senior', 'system-design')).toBe('backend:senior::system-design');
    });

    describe('record', () => {
        it('should reject scores outside the unit interval', async () => {
            const subject = pool();

            await expect(subject.record('backend', 'design', 1.5)).rejects.toThrow('Score 1.5 is outside [0, 1]');
            await expect(subject.record('backend', 'design', Number.NaN)).rejects.toBeInstanceOf(ScoringError);
        });

        it('should report the outcome of an insertion', async () => {
            const outcome = await pool().record('backend:senior', 'design', 0.6);

            expect(outcome).toEqual({
                poolKey: 'backend:senior::design',
                poolSize: 1,
                isOutlier: false,
                recalibrated: false,
                baselineVersion: 0,
                duplicate: false
            });
        });

        it('should record an answer only once per pool', async () => {
            const subject = pool();

            const first = await subject.record('backend', 'design', 0.6, { answerId: 'answer-1' });
            const again = await subject.record('backend', 'design', 0.6, { answerId: 'answer-1' });
            await subject.record('backend', 'composite', 0.6, { answerId: 'answer-1' });

            expect(first.duplicate).toBe(false);
            expect(again).toEqual({ ...first, duplicate: true });
            expect((await subject.summary('backend', 'design')).size).toBe(1);
            expect((await subject.summary('backend', 'composite')).size).toBe(1);
        });

        it('should remember recorded answers across instances', async () => {
            await pool().record('backend', 'design', 0.6, { answerId: 'answer-1' });

            const other = pool();
            const outcome = await other.record('backend', 'design', 0.6, { answerId: 'answer-1' });

            expect(outcome.duplicate).toBe(true);
            expect((await other.summary('backend', 'design')).size).toBe(1);
        });

        it('should flag and log outliers', async () => {
            const subject = pool();
            for (const score of [0.4, 0.5, 0.6, 0.5, 0.5]) {
                await subject.record('backend', 'design', score);
            }

            const outcome = await subject.record('backend', 'design', 0.95);

            expect(outcome.isOutlier).toBe(true);
            expect(outcome.poolSize).toBe(6);
            expect(logger.info).toHaveBeenCalledWith(
                expect.objectContaining({ poolKey: 'backend::design', rawScore: 0.95 }),
                'Score flagged as outlier and excluded from pool statistics'
            );
            const summary = await subject.summary('backend', 'design');
            expect(summary).toMatchObject({ size: 6, acceptedSamples: 5, outliersFlagged: 1 });
        });

        it('should serialize concurrent writes to the same pool', async () => {
            const subject = pool();

            await Promise.all(Array.from({ length: 50 }, () => subject.record('backend', 'design', 0.5)));

            const summary = await subject.summary('backend', 'design');
            expect(summary.size).toBe(50);
            expect(summary.acceptedSamples).toBe(50);
        });

        it('should keep recording when the snapshot cannot be persisted', async () => {
            const subject = pool();
            store.set = async () => {
                throw new Error('redis down');
            };

            const outcome = await subject.record('backend', 'design', 0.5);

            expect(outcome.poolSize).toBe(1);
            expect(logger.warn).toHaveBeenCalledWith(
                expect.objectContaining({ poolKey: 'backend::design', error: 'redis down' }),
                'Pool snapshot persist failed'
            );
        });
    });

    describe('percentile', () => {
        it('should reject scores that are not finite numbers', async () => {
            const subject = pool();
            await subject.record('backend', 'design', 0.5);

            await expect(subject.percentile('backend', 'design', Number.NaN)).rejects.toThrow('Score NaN is not a finite number');
            await expect(subject.percentile('backend', 'design', Number.POSITIVE_INFINITY)).rejects.toBeInstanceOf(ScoringError);
        });

        it('should fail on an empty pool', async () => {
            await expect(pool().percentile('backend', 'design', 0.5)).rejects.toThrow('Pool backend::design is empty');
        });

        it('should mark percentiles from undersized pools provisional', async () => {
            const subject = pool();
            await subject.record('backend', 'design', 0.25);
            await subject.record('backend', 'design', 0.75);

            const result = await subject.percentile('backend', 'design', 0.75, { answerId: 'answer-1', isOutlierExcluded: false });

            expect(result).toEqual({
                answerId: 'answer-1',
                competencyId: 'design',
                percentile: 75,
                poolSizeAtComputation: 2,
                isOutlierExcluded: false,
                provisional: true
            });
        });

        it('should stop marking provisional once the pool reaches the minimum size', async () => {
            const subject = pool();
            for (const score of [0.25, 0.75, 0.5]) {
                await subject.record('backend', 'design', score);
            }

            const result = await subject.percentile('backend', 'design', 0.75);

            expect(result.provisional).toBe(false);
            expect(result.percentile).toBeCloseTo(250 / 3, 10);
            expect(result.answerId).toBe('');
        });

        it('should keep pools of different cohorts apart', async () => {
            const subject = pool();
            await subject.record('backend', 'design', 0.25);
            await subject.record('frontend', 'design', 0.75);

            expect((await subject.percentile('backend', 'design', 0.5)).percentile).toBe(100);
            expect((await subject.percentile('frontend', 'design', 0.5)).percentile).toBe(0);
        });
    });

    describe('recalibrate', () => {
        it('should fail without accepted samples', async () => {
            await expect(pool().recalibrate('backend', 'design')).rejects.toThrow('Pool backend::design has no samples to recalibrate from');
        });

        it('should keep excluded outliers from pulling the baseline', async () => {
            const scores = [0.45, 0.5, 0.55, 0.5, 0.45, 0.55, 0.5, 0.5, 0.45, 0.55, 0.99, 0.99, 0.99];
            const guarded = pool({ outlierK: 3 });
            const unguarded = pool({ outlierK: Number.POSITIVE_INFINITY });
            for (const score of scores) {
                await guarded.record('guarded', 'design', score);
                await unguarded.record('unguarded', 'design', score);
            }

            const excluded = await guarded.recalibrate('guarded', 'design');
            const included = await unguarded.recalibrate('unguarded', 'design');

            expect(excluded.mean).toBeCloseTo(0.5003, 3);
            expect(included.mean).toBeCloseTo(0.6212, 3);
            expect((await guarded.summary('guarded', 'design')).outliersFlagged).toBe(3);
            expect((await unguarded.summary('unguarded', 'design')).outliersFlagged).toBe(0);
        });

        it('should compute a decayed baseline on request', async () => {
            const subject = pool();
            await subject.record('backend', 'design', 0.25);
            await subject.record('backend', 'design', 0.75);
            clock = 500;

            const baseline = await subject.recalibrate('backend', 'design');

            expect(baseline.version).toBe(1);
            expect(baseline.recalibratedAt).toBe(500);
            expect(baseline.mean).toBeCloseTo(0.5017, 3);
            expect((await subject.summary('backend', 'design')).baseline).toEqual(baseline);
        });
    });

    describe('snapshots', () => {
        it('should restore pools written by another instance', async () => {
            const writer = pool();
            await writer.record('backend', 'design', 0.25);
            await writer.record('backend', 'design', 0.75);

            const reader = pool();
            const summary = await reader.summary('backend', 'design');

            expect(summary.size).toBe(2);
            expect(summary.mean).toBeCloseTo(0.5, 10);
        });

        it('should keep insertions made by other instances on the same store', async () => {
            const first = pool({ pollIntervalMs: 1 });
            const second = pool({ pollIntervalMs: 1 });

            await first.record('backend', 'design', 0.25);
            await second.record('backend', 'design', 0.75);
            await Promise.all([
                first.record('backend', 'design', 0.5),
                second.record('backend', 'design', 0.6),
                first.record('backend', 'design', 0.4)
            ]);

            expect((await pool().summary('backend', 'design')).size).toBe(5);
            expect(await store.get('scoring:lease:backend::design')).toBeNull();
        });

        it('should start empty when the snapshot is unreadable', async () => {
            await store.set('scoring:pool:backend::design', 'garbage');

            const summary = await pool().summary('backend', 'design');

            expect(summary.size).toBe(0);
            expect(logger.warn).toHaveBeenCalledWith({ poolKey: 'backend::design' }, 'Discarding unreadable pool snapshot');
        });

        it('should discard snapshots taken with another bin count', async () => {
            await pool({ bins: 100 }).record('backend', 'design', 0.5);

            const summary = await pool({ bins: 50 }).summary('backend', 'design');

            expect(summary.size).toBe(0);
        });
    });
});
