import * as crypto from 'crypto';
import { errorFields, logger, ILogger } from '../config/logger';
import { getSettings } from '../config/settings';
import { getEvaluationStore } from '../db/evaluation-store';
import type { ArtifactRecord, EvaluationJobRecord, EvaluationStore } from '../db/evaluation-store';
import { EngineError, NotFoundError } from '../errors';
import { COMPOSITE_COMPETENCY_ID, getScoringPool } from '../scoring/scoring-pool.service';
import type { IScoringPool } from '../scoring/scoring-pool.service';
import type {
    Answer,
    CompositeScore,
    Degradation,
    EvaluationReport,
    ExplanationArtifact,
    PercentileResult
} from '../types/evaluation';
import type { CompetencyFramework } from '../types/framework';
import type { JobAttributes, JobContext } from '../types/job';
import type { QuestionSet } from '../types/question';
import { fingerprint, normalizeText } from '../utils/fingerprint.util';
import { getEvaluationOrchestrator } from './evaluation-orchestrator.service';
import type { IEvaluationOrchestrator } from './evaluation-orchestrator.service';
import { getEvaluationEvents, EvaluationEvents } from './evaluation-events';
import { getExplainabilityComposer } from './explainability.service';
import type { IExplainabilityComposer } from './explainability.service';
import { getQuestionGenerator } from './question-generator.service';
import type { IQuestionGenerator, QuestionGeneratorOptions } from './question-generator.service';
import { getThoughtChainGenerator } from './thought-chain.service';
import type { IThoughtChainGenerator, ThoughtChainOptions } from './thought-chain.service';

export interface CreateJobContextInput {
    description: string;
    attributes: JobAttributes;
}

export interface SubmitAnswerInput {
    id?: string;
    questionSetId: string;
    questionId: string;
    candidateId: string;
    text: string;
}

export interface BuildQuestionSetOptions extends QuestionGeneratorOptions {
    frameworkId?: string;
}

export interface EvaluateAnswerOptions {
    evaluationJobId?: number;
    deadlineMs?: number;
    signal?: AbortSignal;
}

export interface EvaluationResultView {
    job: EvaluationJobRecord;
    report: EvaluationReport | null;
}

/**
 * Cohort a job context's scores are ranked against: the explicit family
 * when given, else domain and seniority.
 */
export function cohortKeyOf(jobContext: JobContext): string {
    const family = jobContext.attributes.family?.trim();
    if (family) {
        return family.toLowerCase();
    }
    return `${jobContext.attributes.domain}:${jobContext.attributes.seniority}`.toLowerCase();
}

export function degradationsOf(
    composite: CompositeScore,
    percentiles: readonly PercentileResult[],
    explanation: ExplanationArtifact,
    questionSet: QuestionSet
): Degradation[] {
    const degradations: Degradation[] = [];
    if (composite.partial) {
        degradations.push('partial_composite');
    }
    if (percentiles.some(result => result.provisional)) {
        degradations.push('provisional_percentile');
    }
    if (explanation.confidence === 'low') {
        degradations.push('low_confidence');
    }
    if (questionSet.partialCoverage) {
        degradations.push('partial_coverage');
    }
    return degradations;
}

/**
 * Evaluation Report Service
 *
 * Facade over the generators, the orchestrator, the scoring pool and the
 * composer. Routes and the queue worker go through this class only.
 */
export class EvaluationReportService {
    constructor(
        private store: EvaluationStore,
        private thoughtChain: IThoughtChainGenerator,
        private questionGenerator: IQuestionGenerator,
        private orchestrator: IEvaluationOrchestrator,
        private scoringPool: IScoringPool,
        private composer: IExplainabilityComposer,
        private events: EvaluationEvents,
        private logger: ILogger,
        private defaultDeadlineMs: number = getSettings().EVALUATION_DEADLINE_MS
    ) { }

    /**
     * Factory method for production use
     */
    static create(): EvaluationReportService {
        return new EvaluationReportService(
            getEvaluationStore(),
            getThoughtChainGenerator(),
            getQuestionGenerator(),
            getEvaluationOrchestrator(),
            getScoringPool(),
            getExplainabilityComposer(),
            getEvaluationEvents(),
            logger
        );
    }

    async createJobContext(input: CreateJobContextInput): Promise<JobContext> {
        const id = fingerprint(normalizeText(input.description));
        const existing = await this.store.getJobContext(id);
        if (existing) {
            return existing;
        }

        const jobContext: JobContext = {
            id,
            description: input.description,
            attributes: input.attributes,
            createdAt: new Date().toISOString()
        };
        await this.store.saveJobContext(jobContext);
        this.logger.info({ jobContextId: id, seniority: input.attributes.seniority, domain: input.attributes.domain }, 'Job context created');
        return jobContext;
    }

    async buildFramework(jobContextId: string, options: ThoughtChainOptions = {}): Promise<CompetencyFramework> {
        const jobContext = await this.requireJobContext(jobContextId);
        const framework = await this.thoughtChain.generate(jobContext, options);
        await this.store.saveFramework(framework);
        return framework;
    }

    async buildQuestionSet(jobContextId: string, options: BuildQuestionSetOptions = {}): Promise<QuestionSet> {
        const jobContext = await this.requireJobContext(jobContextId);
        const framework = options.frameworkId
            ? await this.store.getFramework(options.frameworkId)
            : await this.store.getLatestFramework(jobContextId);
        if (!framework || framework.jobContextId !== jobContextId) {
            throw new NotFoundError('CompetencyFramework', options.frameworkId ?? `for job context ${jobContextId}`);
        }

        const questionSet = await this.questionGenerator.generate(framework, jobContext, options);
        await this.store.saveQuestionSet(questionSet);
        return questionSet;
    }

    /**
     * Store an answer and open an evaluation job for it. Queueing the job is
     * the caller's concern.
     */
    async submitAnswer(input: SubmitAnswerInput): Promise<{ answer: Answer; job: EvaluationJobRecord }> {
        const questionSet = await this.store.getQuestionSet(input.questionSetId);
        if (!questionSet) {
            throw new NotFoundError('QuestionSet', input.questionSetId);
        }
        if (!questionSet.questions.some(question => question.id === input.questionId)) {
            throw new NotFoundError('Question', input.questionId);
        }

        const answer: Answer = {
            id: input.id ?? crypto.randomUUID(),
            questionSetId: input.questionSetId,
            questionId: input.questionId,
            candidateId: input.candidateId,
            text: input.text,
            submittedAt: new Date().toISOString()
        };
        await this.store.saveAnswer(answer);
        const job = await this.store.createEvaluationJob(answer.id);

        this.logger.info({ answerId: answer.id, evaluationJobId: job.id }, 'Answer submitted');
        return { answer, job };
    }

    async markJob(evaluationJobId: number, update: Parameters<EvaluationStore['updateEvaluationJob']>[1]): Promise<void> {
        await this.store.updateEvaluationJob(evaluationJobId, update);
    }

    async evaluateAnswer(answerId: string, options: EvaluateAnswerOptions = {}): Promise<EvaluationReport> {
        try {
            const report = await this.runEvaluation(answerId, options);
            this.events.emit('report.completed', report);
            return report;
        } catch (error) {
            this.events.emit('report.failed', {
                answerId,
                evaluationJobId: options.evaluationJobId,
                code: error instanceof EngineError ? error.code : 'internal_error',
                message: error instanceof Error ? error.message : String(error)
            });
            throw error;
        }
    }

    async getResult(answerId: string): Promise<EvaluationResultView> {
        const job = await this.store.getLatestEvaluationJob(answerId);
        if (!job) {
            throw new NotFoundError('Evaluation', answerId);
        }
        const report = job.status === 'completed' ? await this.store.getReport(job.id) : null;
        return { job, report };
    }

    private async runEvaluation(answerId: string, options: EvaluateAnswerOptions): Promise<EvaluationReport> {
        const answer = await this.store.getAnswer(answerId);
        if (!answer) {
            throw new NotFoundError('Answer', answerId);
        }
        const questionSet = await this.store.getQuestionSet(answer.questionSetId);
        if (!questionSet) {
            throw new NotFoundError('QuestionSet', answer.questionSetId);
        }
        const framework = await this.store.getFramework(questionSet.frameworkId);
        if (!framework) {
            throw new NotFoundError('CompetencyFramework', questionSet.frameworkId);
        }
        const jobContext = await this.requireJobContext(framework.jobContextId);

        const composite = await this.orchestrator.evaluate(answer, questionSet, framework, jobContext, {
            deadlineMs: options.deadlineMs ?? this.defaultDeadlineMs,
            signal: options.signal
        });

        const cohortKey = cohortKeyOf(jobContext);
        const percentiles = await Promise.all(composite.dimensions.map(dimension =>
            this.rank(cohortKey, dimension.competencyId, dimension.rawScore, answer.id)));
        const compositePercentile = await this.rank(cohortKey, COMPOSITE_COMPETENCY_ID, composite.raw, answer.id);

        const explanation = this.composer.compose(composite, [...percentiles, compositePercentile]);
        const report: EvaluationReport = {
            answerId: answer.id,
            candidateId: answer.candidateId,
            composite,
            percentiles,
            compositePercentile,
            explanation,
            degradations: degradationsOf(composite, [...percentiles, compositePercentile], explanation, questionSet),
            completedAt: new Date().toISOString()
        };

        if (options.evaluationJobId !== undefined) {
            await this.persist(options.evaluationJobId, report);
        }

        this.logger.info({
            answerId: answer.id,
            cohortKey,
            raw: composite.raw,
            compositePercentile: compositePercentile.percentile,
            degradations: report.degradations
        }, 'Evaluation report completed');
        return report;
    }

    private async rank(cohortKey: string, competencyId: string, rawScore: number, answerId: string): Promise<PercentileResult> {
        // A retried job records nothing new; the pool returns the first outcome.
        const outcome = await this.scoringPool.record(cohortKey, competencyId, rawScore, { answerId });
        return this.scoringPool.percentile(cohortKey, competencyId, rawScore, {
            answerId,
            isOutlierExcluded: outcome.isOutlier
        });
    }

    private async persist(evaluationJobId: number, report: EvaluationReport): Promise<void> {
        const artifacts: ArtifactRecord[] = [
            ...report.composite.dimensions.map(dimension => ({
                kind: 'dimension_score' as const,
                key: dimension.competencyId,
                payload: dimension,
                version: dimension.rubricVersion
            })),
            { kind: 'composite', payload: report.composite },
            ...[...report.percentiles, report.compositePercentile].map(result => ({
                kind: 'percentile' as const,
                key: result.competencyId,
                payload: result
            })),
            { kind: 'explanation', payload: report.explanation },
            { kind: 'report', payload: report }
        ];

        try {
            await this.store.saveArtifacts(evaluationJobId, artifacts);
        } catch (error) {
            this.logger.error({ evaluationJobId, answerId: report.answerId, ...errorFields(error) }, 'Failed to persist evaluation artifacts');
            throw error;
        }
    }

    private async requireJobContext(jobContextId: string): Promise<JobContext> {
        const jobContext = await this.store.getJobContext(jobContextId);
        if (!jobContext) {
            throw new NotFoundError('JobContext', jobContextId);
        }
        return jobContext;
    }
}

// Singleton instance
let evaluationReportService: EvaluationReportService | null = null;

export function getEvaluationReportService(): EvaluationReportService {
    if (!evaluationReportService) {
        evaluationReportService = EvaluationReportService.create();
    }
    return evaluationReportService;
}
