import { z } from 'zod';
import type { ZodType, ZodTypeDef } from 'zod';
import type {
    CompositeScore,
    ContributingSpan,
    DimensionScore,
    EvaluationReport,
    ExplanationArtifact,
    PercentileResult
} from './evaluation';
import type { Competency, CompetencyFramework } from './framework';
import type { Question, QuestionSet, Rubric } from './question';

/**
 * A schema that validates untrusted input into `T`. Input may differ from
 * output (defaults, coercion).
 */
export type OutputSchema<T> = ZodType<T, ZodTypeDef, unknown>;

const unitInterval = z.number().min(0).max(1);

export const competencySchema: OutputSchema<Competency> = z.object({
    id: z.string().min(1),
    name: z.string().min(1),
    category: z.enum(['technical', 'soft_skill', 'culture']),
    weight: unitInterval,
    rationale: z.string()
});

export const competencyFrameworkSchema: OutputSchema<CompetencyFramework> = z.object({
    id: z.string(),
    jobContextId: z.string(),
    competencies: z.array(competencySchema).min(1),
    templateVersion: z.string(),
    createdAt: z.string()
});

export const rubricSchema: OutputSchema<Rubric> = z.object({
    version: z.string(),
    expectedAnswerComponents: z.array(z.string()),
    scoringAnchors: z.array(z.object({
        band: z.object({ min: unitInterval, max: unitInterval }),
        description: z.string()
    }))
});

export const questionSchema: OutputSchema<Question> = z.object({
    id: z.string(),
    competencyIds: z.array(z.string()).min(1),
    text: z.string().min(1),
    rubric: rubricSchema,
    followUpQuestions: z.array(z.string())
});

export const questionSetSchema: OutputSchema<QuestionSet> = z.object({
    id: z.string(),
    jobContextId: z.string(),
    frameworkId: z.string(),
    questions: z.array(questionSchema),
    generationMetadata: z.object({
        templateVersion: z.string(),
        generatedAt: z.string(),
        correctiveRequests: z.number().int().min(0)
    }),
    partialCoverage: z.boolean(),
    uncoveredCompetencyIds: z.array(z.string())
});

export const contributingSpanSchema: OutputSchema<ContributingSpan> = z.object({
    text: z.string(),
    polarity: z.enum(['positive', 'negative', 'neutral'])
});

export const dimensionScoreSchema: OutputSchema<DimensionScore> = z.object({
    answerId: z.string(),
    competencyId: z.string(),
    rubricVersion: z.string(),
    rawScore: unitInterval,
    confidence: unitInterval,
    justification: z.string(),
    contributingSpans: z.array(contributingSpanSchema)
});

export const compositeScoreSchema: OutputSchema<CompositeScore> = z.object({
    answerId: z.string(),
    raw: unitInterval,
    partial: z.boolean(),
    dimensions: z.array(dimensionScoreSchema),
    effectiveWeights: z.record(z.number()),
    failures: z.array(z.object({
        competencyId: z.string(),
        reason: z.enum(['provider_error', 'deadline_exceeded', 'malformed_response', 'unknown']),
        message: z.string()
    }))
});

export const percentileResultSchema: OutputSchema<PercentileResult> = z.object({
    answerId: z.string(),
    competencyId: z.string(),
    percentile: z.number().min(0).max(100),
    poolSizeAtComputation: z.number().int().min(0),
    isOutlierExcluded: z.boolean(),
    provisional: z.boolean()
});

export const explanationArtifactSchema: OutputSchema<ExplanationArtifact> = z.object({
    answerId: z.string(),
    narrative: z.string(),
    highlights: z.array(z.object({
        competencyId: z.string(),
        contribution: z.number(),
        rawScore: z.number(),
        confidence: z.number(),
        justification: z.string(),
        positives: z.array(z.string()),
        negatives: z.array(z.string())
    })),
    confidence: z.enum(['high', 'low']),
    lowConfidenceReasons: z.array(z.string())
});

export const evaluationReportSchema: OutputSchema<EvaluationReport> = z.object({
    answerId: z.string(),
    candidateId: z.string(),
    composite: compositeScoreSchema,
    percentiles: z.array(percentileResultSchema),
    compositePercentile: percentileResultSchema,
    explanation: explanationArtifactSchema,
    degradations: z.array(z.enum(['partial_composite', 'provisional_percentile', 'low_confidence', 'partial_coverage'])),
    completedAt: z.string()
});
