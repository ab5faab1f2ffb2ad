import { z } from 'zod';
import { errorFields, logger, ILogger } from '../config/logger';
import { getSettings } from '../config/settings';
import { getResponseCache, ResponseCache } from '../cache/response-cache.service';
import { EvaluationUnavailable, NotFoundError, ProviderError } from '../errors';
import { getPromptRegistry, PromptRegistry } from '../prompts/prompt-registry.service';
import type { PromptContext, PromptTemplate } from '../prompts/prompt.types';
import { TEMPLATE_NAMES } from '../prompts/templates';
import { defaultGenerationConfig, getProviderGateway } from '../providers/provider-gateway.service';
import type { IProviderGateway } from '../providers/provider-gateway.service';
import type {
    Answer,
    CompositeScore,
    ContributingSpan,
    DimensionFailure,
    DimensionFailureReason,
    DimensionScore
} from '../types/evaluation';
import type { Competency, CompetencyFramework } from '../types/framework';
import type { JobContext, Seniority } from '../types/job';
import type { GenerationConfig } from '../types/provider';
import type { Question, QuestionSet } from '../types/question';
import { dimensionScoreSchema } from '../types/schemas';
import { abortReason, anySignal, raceAbort } from '../utils/async.util';
import { fingerprint, normalizeText } from '../utils/fingerprint.util';

/**
 * What a rubric's top band means at each level.
 */
export const SENIORITY_BARS: Record<Seniority, string> = {
    intern: 'Correct fundamentals and curiosity are enough for a high score; gaps in production experience are expected.',
    junior: 'Expect sound basics applied to a concrete example; limited exposure to trade-offs is acceptable.',
    mid: 'Expect independent delivery: concrete examples, awareness of trade-offs and of how the work was verified.',
    senior: 'Expect ownership of ambiguous problems, explicit trade-off reasoning and impact beyond their own tasks.',
    staff: 'Expect cross-team influence, architecture-level reasoning and decisions justified by long-term cost.',
    principal: 'Expect organisation-wide direction setting, with strategy grounded in evidence and measurable outcomes.'
};

const ANSWER_SLOT = '<answer>';

const polaritySchema = z
    .string()
    .transform(value => value.trim().toLowerCase())
    .pipe(z.enum(['positive', 'negative', 'neutral']))
    .catch('neutral');

const evaluatorResponseSchema = z.object({
    raw_score: z.number(),
    confidence: z.number(),
    justification: z.string().default(''),
    contributing_spans: z.array(z.object({
        text: z.string(),
        polarity: polaritySchema
    })).default([])
});

export interface EvaluateOptions {
    signal?: AbortSignal;
    /** Settle after this many milliseconds with whatever dimensions finished. */
    deadlineMs?: number;
    subjectId?: string;
    experimentId?: string;
    templateVersion?: string;
    config?: Partial<GenerationConfig>;
}

export interface IEvaluationOrchestrator {
    evaluate(
        answer: Answer,
        questionSet: QuestionSet,
        framework: CompetencyFramework,
        jobContext: JobContext,
        options?: EvaluateOptions
    ): Promise<CompositeScore>;
}

class DeadlineExceeded extends Error {
    constructor(deadlineMs: number) {
        super(`Evaluation deadline of ${deadlineMs}ms exceeded`);
        this.name = 'DeadlineExceeded';
    }
}

function clampUnit(value: number): number {
    return Number.isFinite(value) ? Math.min(1, Math.max(0, value)) : 0;
}

/**
 * Keep only spans that quote the answer; comparison ignores case and
 * whitespace differences.
 */
export function groundedSpans(spans: readonly ContributingSpan[], answerText: string): ContributingSpan[] {
    const haystack = normalizeText(answerText);
    return spans.filter(span => {
        const needle = normalizeText(span.text);
        return needle.length > 0 && haystack.includes(needle);
    });
}

/**
 * Weighted mean of the successful dimensions. Weights of failed dimensions
 * are redistributed in proportion to the remaining ones.
 */
export function aggregate(
    answerId: string,
    competencies: readonly Competency[],
    dimensions: DimensionScore[],
    failures: DimensionFailure[]
): CompositeScore {
    const weightOf = new Map(competencies.map(competency => [competency.id, competency.weight]));
    const totalWeight = dimensions.reduce((sum, dimension) => sum + (weightOf.get(dimension.competencyId) ?? 0), 0);

    const effectiveWeights: Record<string, number> = {};
    for (const dimension of dimensions) {
        effectiveWeights[dimension.competencyId] = totalWeight > 0
            ? (weightOf.get(dimension.competencyId) ?? 0) / totalWeight
            : 1 / dimensions.length;
    }
    for (const failure of failures) {
        effectiveWeights[failure.competencyId] = 0;
    }

    const raw = dimensions.reduce((sum, dimension) => sum + effectiveWeights[dimension.competencyId] * dimension.rawScore, 0);
    return {
        answerId,
        raw: clampUnit(raw),
        partial: failures.length > 0,
        dimensions,
        effectiveWeights,
        failures
    };
}

/**
 * Evaluation Orchestrator
 *
 * Scores one answer on every competency its question targets. Dimension
 * evaluators run concurrently and join on completion or deadline; anything
 * unfinished at the deadline is cancelled and reported as a failure.
 */
export class EvaluationOrchestrator implements IEvaluationOrchestrator {
    constructor(
        private gateway: IProviderGateway,
        private registry: PromptRegistry,
        private cache: ResponseCache,
        private logger: ILogger,
        private cacheTtlMs: number = getSettings().CACHE_TTL_MS
    ) { }

    static create(): EvaluationOrchestrator {
        return new EvaluationOrchestrator(getProviderGateway(), getPromptRegistry(), getResponseCache(), logger);
    }

    async evaluate(
        answer: Answer,
        questionSet: QuestionSet,
        framework: CompetencyFramework,
        jobContext: JobContext,
        options: EvaluateOptions = {}
    ): Promise<CompositeScore> {
        const question = questionSet.questions.find(candidate => candidate.id === answer.questionId);
        if (!question) {
            throw new NotFoundError('Question', answer.questionId);
        }
        const competencies = question.competencyIds
            .map(id => framework.competencies.find(competency => competency.id === id))
            .filter((competency): competency is Competency => competency !== undefined);
        const unknownIds = question.competencyIds.filter(id => !competencies.some(competency => competency.id === id));
        if (unknownIds.length > 0) {
            this.logger.warn({
                answerId: answer.id,
                questionId: question.id,
                frameworkId: framework.id,
                competencyIds: unknownIds
            }, 'Question targets competencies missing from the framework, skipping them');
        }
        if (competencies.length === 0) {
            throw new EvaluationUnavailable(answer.id, question.competencyIds.map(competencyId => ({
                competencyId,
                message: 'competency is not part of the framework'
            })));
        }

        const template = this.registry.resolve(TEMPLATE_NAMES.dimensionEvaluation, {
            subjectId: options.subjectId ?? answer.candidateId,
            experimentId: options.experimentId,
            version: options.templateVersion
        });

        const deadline = new AbortController();
        const timer = options.deadlineMs !== undefined
            ? setTimeout(() => deadline.abort(new DeadlineExceeded(options.deadlineMs ?? 0)), options.deadlineMs)
            : undefined;
        const signal = anySignal(options.signal, deadline.signal);

        this.logger.info({
            answerId: answer.id,
            questionId: question.id,
            competencies: competencies.map(competency => competency.id),
            deadlineMs: options.deadlineMs
        }, 'Evaluating answer');

        try {
            const settled = await Promise.allSettled(competencies.map(competency =>
                raceAbort(this.evaluateDimension(answer, question, competency, jobContext, template, options, signal), signal)
            ));

            const dimensions: DimensionScore[] = [];
            const failures: DimensionFailure[] = [];
            settled.forEach((outcome, index) => {
                const competency = competencies[index];
                if (outcome.status === 'fulfilled') {
                    dimensions.push(outcome.value);
                    return;
                }
                const failure = this.toFailure(competency.id, outcome.reason, signal);
                failures.push(failure);
                this.logger.warn({
                    answerId: answer.id,
                    competencyId: competency.id,
                    reason: failure.reason,
                    ...errorFields(outcome.reason)
                }, 'Dimension evaluation failed');
            });

            if (dimensions.length === 0) {
                this.logger.error({ answerId: answer.id, failures }, 'No dimension evaluation completed');
                throw new EvaluationUnavailable(answer.id, failures.map(failure => ({
                    competencyId: failure.competencyId,
                    message: failure.message
                })));
            }

            const composite = aggregate(answer.id, competencies, dimensions, failures);
            this.logger.info({
                answerId: answer.id,
                raw: composite.raw,
                partial: composite.partial,
                failed: failures.map(failure => failure.competencyId)
            }, 'Composite score computed');
            return composite;
        } finally {
            if (timer) {
                clearTimeout(timer);
            }
        }
    }

    private async evaluateDimension(
        answer: Answer,
        question: Question,
        competency: Competency,
        jobContext: JobContext,
        template: PromptTemplate,
        options: EvaluateOptions,
        signal?: AbortSignal
    ): Promise<DimensionScore> {
        if (normalizeText(answer.text).length === 0) {
            return {
                answerId: answer.id,
                competencyId: competency.id,
                rubricVersion: question.rubric.version,
                rawScore: 0,
                confidence: 1,
                justification: 'No answer was given.',
                contributingSpans: []
            };
        }

        const seniority = jobContext.attributes.seniority;
        const context: PromptContext = {
            competencyName: competency.name,
            competencyRationale: competency.rationale || competency.name,
            seniority,
            seniorityBar: SENIORITY_BARS[seniority],
            question: question.text,
            expectedComponents: question.rubric.expectedAnswerComponents.length > 0
                ? question.rubric.expectedAnswerComponents
                : ['No explicit components; judge against the competency description.'],
            scoringAnchors: question.rubric.scoringAnchors.length > 0
                ? question.rubric.scoringAnchors.map(anchor =>
                    `${anchor.band.min.toFixed(2)}-${anchor.band.max.toFixed(2)}: ${anchor.description}`)
                : ['0.00-1.00: Score proportionally to how well the competency is demonstrated.'],
            answer: answer.text
        };
        const prompt = this.registry.render(template, context);
        // Everything but the answer is keyed by the rendered prompt; the answer by normalized text.
        const questionPrompt = this.registry.render(template, { ...context, answer: ANSWER_SLOT });
        const key = fingerprint(
            TEMPLATE_NAMES.dimensionEvaluation,
            template.version,
            fingerprint(questionPrompt),
            fingerprint(normalizeText(answer.text)),
            question.id,
            competency.id,
            question.rubric.version
        );

        const score = await this.cache.getOrCompute(key, this.cacheTtlMs, async computeSignal => {
            const result = await this.gateway.completeJson(
                prompt,
                'quality',
                defaultGenerationConfig(options.config),
                evaluatorResponseSchema,
                { signal: computeSignal, system: template.system, promptName: `${template.name}@${template.version}` }
            );
            const spans = groundedSpans(result.data.contributing_spans, answer.text);
            if (spans.length < result.data.contributing_spans.length) {
                this.logger.debug({
                    answerId: answer.id,
                    competencyId: competency.id,
                    dropped: result.data.contributing_spans.length - spans.length
                }, 'Dropped contributing spans not found in the answer');
            }
            return {
                answerId: answer.id,
                competencyId: competency.id,
                rubricVersion: question.rubric.version,
                rawScore: clampUnit(result.data.raw_score),
                confidence: clampUnit(result.data.confidence),
                justification: result.data.justification,
                contributingSpans: spans
            };
        }, dimensionScoreSchema, signal);

        // Cached by answer content, so the stored id may belong to an identical earlier answer.
        return { ...score, answerId: answer.id };
    }

    private toFailure(competencyId: string, error: unknown, signal?: AbortSignal): DimensionFailure {
        const interrupted = signal?.aborted === true && (
            error === abortReason(signal) || (error instanceof ProviderError && error.kind === 'Cancelled')
        );
        let reason: DimensionFailureReason = 'unknown';
        if (interrupted) {
            reason = 'deadline_exceeded';
        } else if (error instanceof ProviderError) {
            reason = error.kind === 'MalformedResponse' ? 'malformed_response' : 'provider_error';
        }
        return {
            competencyId,
            reason,
            message: error instanceof Error ? error.message : String(error)
        };
    }
}

// Singleton instance
let evaluationOrchestrator: EvaluationOrchestrator | null = null;

export function getEvaluationOrchestrator(): EvaluationOrchestrator {
    if (!evaluationOrchestrator) {
        evaluationOrchestrator = EvaluationOrchestrator.create();
    }
    return evaluationOrchestrator;
}
