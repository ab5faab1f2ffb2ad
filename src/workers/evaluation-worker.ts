import { Job } from 'bullmq';
import { errorFields, logger, ILogger } from '../config/logger';
import { EngineError, ProviderError } from '../errors';
import { getEvaluationReportService } from '../services/evaluation-report.service';
import type { EvaluationReportService } from '../services/evaluation-report.service';

export interface EvaluationJobData {
    evaluationJobId: number;
    answerId: string;
}

export interface EvaluationJobResult {
    success: boolean;
    evaluationJobId: number;
    answerId: string;
}

/** The parts of a BullMQ job the worker touches. */
export type EvaluationJob = Pick<Job<EvaluationJobData>, 'id' | 'data' | 'attemptsMade' | 'discard'>;

export interface IEvaluationWorker {
    processEvaluation(job: EvaluationJob): Promise<EvaluationJobResult>;
}

/**
 * Errors worth another queue attempt. Everything else fails the job for good.
 */
export function isTransientFailure(error: unknown): boolean {
    return error instanceof ProviderError && (error.kind === 'AllProvidersExhausted' || error.retryable);
}

/**
 * Evaluation Worker with Dependency Injection
 *
 * Runs queued answer evaluations and tracks the evaluation job status:
 * queued → processing → completed | failed.
 */
export class EvaluationWorker implements IEvaluationWorker {
    constructor(
        private reports: Pick<EvaluationReportService, 'evaluateAnswer' | 'markJob'>,
        private logger: ILogger
    ) { }

    /**
     * Factory method for production use
     */
    static create(): EvaluationWorker {
        return new EvaluationWorker(getEvaluationReportService(), logger);
    }

    async processEvaluation(job: EvaluationJob): Promise<EvaluationJobResult> {
        const { evaluationJobId, answerId } = job.data;

        this.logger.info({
            evaluationJobId,
            answerId,
            workerJobId: job.id,
            attempt: job.attemptsMade + 1
        }, 'Starting evaluation processing');

        try {
            // Status change only; attempts count failures
            await this.reports.markJob(evaluationJobId, { status: 'processing' });

            const report = await this.reports.evaluateAnswer(answerId, { evaluationJobId });

            await this.reports.markJob(evaluationJobId, { status: 'completed', errorCode: null });

            this.logger.info({
                evaluationJobId,
                answerId,
                raw: report.composite.raw,
                degradations: report.degradations
            }, 'Evaluation processing completed');

            return { success: true, evaluationJobId, answerId };
        } catch (error) {
            const errorCode = error instanceof EngineError ? error.code : 'processing_error';
            this.logger.error({
                evaluationJobId,
                answerId,
                errorCode,
                ...errorFields(error)
            }, 'Evaluation processing failed');

            await this.reports.markJob(evaluationJobId, { status: 'failed', errorCode, incrementAttempts: true });

            if (!isTransientFailure(error)) {
                job.discard();
            }
            throw error;
        }
    }
}

// Export worker function for BullMQ
export async function evaluationProcessor(job: Job<EvaluationJobData>): Promise<EvaluationJobResult> {
    const worker = EvaluationWorker.create();
    return await worker.processEvaluation(job);
}
