/**
 * Fixed-bin histogram over [0, 1]. Memory is bounded by the bin count and
 * the rank error of any value is at most one bin width.
 *
 * Instances are immutable; `add` returns a new sketch so committed
 * snapshots can be shared with readers.
 */
export class HistogramSketch {
    private constructor(
        readonly bins: number,
        private readonly counts: readonly number[],
        readonly total: number
    ) { }

    static empty(bins: number): HistogramSketch {
        if (!Number.isInteger(bins) || bins < 1) {
            throw new Error(`Sketch bin count must be a positive integer, got ${bins}`);
        }
        return new HistogramSketch(bins, new Array<number>(bins).fill(0), 0);
    }

    /**
     * Rebuild from sparse `[bin, count]` pairs as produced by `toSparse`.
     */
    static fromSparse(bins: number, entries: ReadonlyArray<readonly [number, number]>): HistogramSketch {
        const counts = new Array<number>(bins).fill(0);
        let total = 0;
        for (const [bin, count] of entries) {
            if (bin >= 0 && bin < bins && count > 0) {
                counts[bin] += count;
                total += count;
            }
        }
        return new HistogramSketch(bins, counts, total);
    }

    binOf(value: number): number {
        const clamped = Math.min(1, Math.max(0, value));
        return Math.min(this.bins - 1, Math.floor(clamped * this.bins));
    }

    add(value: number): HistogramSketch {
        const counts = this.counts.slice();
        counts[this.binOf(value)] += 1;
        return new HistogramSketch(this.bins, counts, this.total + 1);
    }

    /**
     * Mid-rank percentile: values below the bin count fully, values sharing
     * the bin count half. Non-decreasing in `value`.
     */
    percentile(value: number): number {
        if (this.total === 0) {
            return 0;
        }
        const bin = this.binOf(value);
        let below = 0;
        for (let index = 0; index < bin; index++) {
            below += this.counts[index];
        }
        return (100 * (below + 0.5 * this.counts[bin])) / this.total;
    }

    toSparse(): Array<[number, number]> {
        const entries: Array<[number, number]> = [];
        this.counts.forEach((count, bin) => {
            if (count > 0) {
                entries.push([bin, count]);
            }
        });
        return entries;
    }
}
