import { logger, ILogger } from '../config/logger';
import { getSettings } from '../config/settings';
import type {
    CompositeScore,
    DimensionHighlight,
    ExplanationArtifact,
    PercentileResult
} from '../types/evaluation';

const DECISIVE_FACTORS = 3;

function formatScore(value: number): string {
    return value.toFixed(2);
}

function ordinal(value: number): string {
    const rounded = Math.round(value);
    const lastTwo = rounded % 100;
    if (lastTwo >= 11 && lastTwo <= 13) {
        return `${rounded}th`;
    }
    switch (rounded % 10) {
        case 1: return `${rounded}st`;
        case 2: return `${rounded}nd`;
        case 3: return `${rounded}rd`;
        default: return `${rounded}th`;
    }
}

export interface IExplainabilityComposer {
    compose(compositeScore: CompositeScore, percentileResults: readonly PercentileResult[]): ExplanationArtifact;
}

/**
 * Explainability Composer
 *
 * Builds the reviewer-facing explanation of a composite score. Pure over
 * its inputs: the same score and percentiles always give the same text.
 */
export class ExplainabilityComposer implements IExplainabilityComposer {
    constructor(
        private logger: ILogger,
        private minConfidence: number = getSettings().EXPLAIN_MIN_CONFIDENCE
    ) { }

    static create(): ExplainabilityComposer {
        return new ExplainabilityComposer(logger);
    }

    compose(compositeScore: CompositeScore, percentileResults: readonly PercentileResult[]): ExplanationArtifact {
        const highlights = this.highlights(compositeScore);
        const lowConfidenceReasons = this.lowConfidenceReasons(compositeScore, percentileResults);
        const explanation: ExplanationArtifact = {
            answerId: compositeScore.answerId,
            narrative: this.narrative(compositeScore, highlights, percentileResults),
            highlights,
            confidence: lowConfidenceReasons.length > 0 ? 'low' : 'high',
            lowConfidenceReasons
        };

        this.logger.debug({
            answerId: compositeScore.answerId,
            confidence: explanation.confidence,
            reasons: lowConfidenceReasons.length
        }, 'Explanation composed');
        return explanation;
    }

    /**
     * Dimensions ordered by the size of their contribution to the composite.
     */
    highlights(compositeScore: CompositeScore): DimensionHighlight[] {
        return compositeScore.dimensions
            .map(dimension => {
                const weight = compositeScore.effectiveWeights[dimension.competencyId] ?? 0;
                return {
                    competencyId: dimension.competencyId,
                    contribution: weight * dimension.rawScore,
                    rawScore: dimension.rawScore,
                    confidence: dimension.confidence,
                    justification: dimension.justification,
                    positives: dimension.contributingSpans.filter(span => span.polarity === 'positive').map(span => span.text),
                    negatives: dimension.contributingSpans.filter(span => span.polarity === 'negative').map(span => span.text)
                };
            })
            .sort((a, b) =>
                Math.abs(b.contribution) - Math.abs(a.contribution) || a.competencyId.localeCompare(b.competencyId));
    }

    private lowConfidenceReasons(compositeScore: CompositeScore, percentileResults: readonly PercentileResult[]): string[] {
        const reasons: string[] = [];
        for (const dimension of compositeScore.dimensions) {
            if (dimension.confidence < this.minConfidence) {
                reasons.push(
                    `Evaluator confidence for ${dimension.competencyId} is ${formatScore(dimension.confidence)}, ` +
                    `below ${formatScore(this.minConfidence)}`
                );
            }
        }
        for (const result of percentileResults) {
            if (result.provisional) {
                reasons.push(`Percentile for ${result.competencyId} comes from a pool of only ${result.poolSizeAtComputation} scores`);
            }
        }
        return reasons;
    }

    private narrative(
        compositeScore: CompositeScore,
        highlights: readonly DimensionHighlight[],
        percentileResults: readonly PercentileResult[]
    ): string {
        const evaluated = compositeScore.dimensions.length;
        const total = evaluated + compositeScore.failures.length;
        const sentences: string[] = [
            `Composite score ${formatScore(compositeScore.raw)} from ${evaluated} of ${total} dimensions.`
        ];

        const decisive = highlights.slice(0, DECISIVE_FACTORS).map(highlight =>
            `${highlight.competencyId} (score ${formatScore(highlight.rawScore)}, ` +
            `weight ${formatScore(compositeScore.effectiveWeights[highlight.competencyId] ?? 0)})`);
        if (decisive.length > 0) {
            sentences.push(`Decisive factors: ${decisive.join(', ')}.`);
        }

        for (const failure of compositeScore.failures) {
            sentences.push(
                `${failure.competencyId} could not be evaluated (${failure.reason.replace(/_/g, ' ')}); ` +
                'its weight was redistributed across the other dimensions.'
            );
        }

        const ranked = percentileResults.map(result => `${result.competencyId} ${ordinal(result.percentile)}`);
        if (ranked.length > 0) {
            sentences.push(`Cohort percentiles: ${ranked.join(', ')}.`);
        }
        const provisional = percentileResults.filter(result => result.provisional).map(result => result.competencyId);
        if (provisional.length > 0) {
            sentences.push(`Percentiles for ${provisional.join(', ')} are provisional until their cohort pools grow.`);
        }

        return sentences.join(' ');
    }
}

// Singleton instance
let explainabilityComposer: ExplainabilityComposer | null = null;

export function getExplainabilityComposer(): ExplainabilityComposer {
    if (!explainabilityComposer) {
        explainabilityComposer = ExplainabilityComposer.create();
    }
    return explainabilityComposer;
}
