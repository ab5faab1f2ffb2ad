/**
 * Evaluation result types
 *
 * These are stored in evaluation_artifacts.payload_json, one artifact per
 * kind and key, and assembled into the EvaluationReport returned to callers.
 */

export interface Answer {
    id: string;
    questionSetId: string;
    questionId: string;
    candidateId: string;
    text: string;
    submittedAt: string;
}

export type SpanPolarity = 'positive' | 'negative' | 'neutral';

export interface ContributingSpan {
    text: string;
    polarity: SpanPolarity;
}

export interface DimensionScore {
    answerId: string;
    competencyId: string;
    rubricVersion: string;
    rawScore: number;
    confidence: number;
    justification: string;
    contributingSpans: ContributingSpan[];
}

export type DimensionFailureReason = 'provider_error' | 'deadline_exceeded' | 'malformed_response' | 'unknown';

export interface DimensionFailure {
    competencyId: string;
    reason: DimensionFailureReason;
    message: string;
}

export interface CompositeScore {
    answerId: string;
    raw: number;
    /** Set when at least one dimension failed and its weight was redistributed. */
    partial: boolean;
    dimensions: DimensionScore[];
    effectiveWeights: Record<string, number>;
    failures: DimensionFailure[];
}

export interface PercentileResult {
    answerId: string;
    competencyId: string;
    percentile: number;
    poolSizeAtComputation: number;
    isOutlierExcluded: boolean;
    provisional: boolean;
}

export type ConfidenceFlag = 'high' | 'low';

export interface DimensionHighlight {
    competencyId: string;
    contribution: number;
    rawScore: number;
    confidence: number;
    justification: string;
    positives: string[];
    negatives: string[];
}

export interface ExplanationArtifact {
    answerId: string;
    narrative: string;
    highlights: DimensionHighlight[];
    confidence: ConfidenceFlag;
    lowConfidenceReasons: string[];
}

export type Degradation = 'partial_composite' | 'provisional_percentile' | 'low_confidence' | 'partial_coverage';

export interface EvaluationReport {
    answerId: string;
    candidateId: string;
    composite: CompositeScore;
    percentiles: PercentileResult[];
    compositePercentile: PercentileResult;
    explanation: ExplanationArtifact;
    degradations: Degradation[];
    completedAt: string;
}
