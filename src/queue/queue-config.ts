import { Job, Queue, Worker, QueueEvents } from 'bullmq';
import { Redis } from 'ioredis';
import { logger } from '../config/logger';
import { getSettings } from '../config/settings';
import type { EvaluationJobData, EvaluationJobResult } from '../workers/evaluation-worker';

export const EVALUATION_QUEUE = 'evaluation';

export type EvaluationProcessor = (job: Job<EvaluationJobData>) => Promise<EvaluationJobResult>;

/**
 * Queue Configuration
 *
 * BullMQ setup for async answer evaluation.
 * Handles job queuing, processing, and monitoring.
 */
export class QueueConfig {
    private redis: Redis;
    private evaluationQueue: Queue<EvaluationJobData, EvaluationJobResult>;
    private evaluationWorker: Worker<EvaluationJobData, EvaluationJobResult> | null = null;
    private queueEvents: QueueEvents;

    constructor() {
        const settings = getSettings();

        // Redis connection
        this.redis = new Redis(settings.REDIS_URL || 'redis://localhost:6379', {
            enableReadyCheck: false,
            maxRetriesPerRequest: null,
        });

        // Evaluation queue
        this.evaluationQueue = new Queue<EvaluationJobData, EvaluationJobResult>(EVALUATION_QUEUE, {
            connection: this.redis,
            defaultJobOptions: {
                removeOnComplete: 10,
                removeOnFail: 5,
                attempts: settings.EVAL_MAX_ATTEMPTS,
                backoff: {
                    type: 'exponential',
                    delay: settings.EVAL_BACKOFF_MS,
                },
            },
        });

        // Queue events for monitoring
        this.queueEvents = new QueueEvents(EVALUATION_QUEUE, {
            connection: this.redis,
        });

        this.setupEventListeners();
    }

    async enqueueEvaluation(data: EvaluationJobData): Promise<void> {
        await this.evaluationQueue.add('evaluate', data, {
            jobId: `evaluation-${data.evaluationJobId}`
        });
    }

    /**
     * Start the evaluation worker
     */
    startWorker(processor: EvaluationProcessor, concurrency: number = 2) {
        this.evaluationWorker = new Worker<EvaluationJobData, EvaluationJobResult>(EVALUATION_QUEUE, processor, {
            connection: this.redis,
            concurrency,
        });

        this.evaluationWorker.on('completed', (job) => {
            logger.info({
                jobId: job.id,
                jobName: job.name,
                duration: job.processedOn !== undefined ? job.processedOn - job.timestamp : undefined
            }, 'Evaluation job completed');
        });

        this.evaluationWorker.on('failed', (job, err) => {
            logger.error({
                jobId: job?.id,
                jobName: job?.name,
                error: err.message,
                attempts: job?.attemptsMade
            }, 'Evaluation job failed');
        });

        this.evaluationWorker.on('stalled', (jobId) => {
            logger.warn({ jobId }, 'Evaluation job stalled');
        });
    }

    /**
     * Setup queue event listeners
     */
    private setupEventListeners() {
        this.queueEvents.on('waiting', ({ jobId }) => {
            logger.debug({ jobId }, 'Job waiting in queue');
        });

        this.queueEvents.on('active', ({ jobId }) => {
            logger.debug({ jobId }, 'Job started processing');
        });

        this.queueEvents.on('failed', ({ jobId, failedReason }) => {
            logger.error({ jobId, failedReason }, 'Job failed');
        });
    }

    /**
     * Close all connections
     */
    async close() {
        await this.evaluationWorker?.close();
        await this.evaluationQueue.close();
        await this.queueEvents.close();
        await this.redis.quit();
    }
}

// Singleton instance
let queueConfig: QueueConfig | null = null;

export function getQueueConfig(): QueueConfig {
    if (!queueConfig) {
        queueConfig = new QueueConfig();
    }
    return queueConfig;
}
