import { AppDataSource } from "./data-source";
import { JobContextEntity } from "./entities/job-context.entity";
import { CompetencyFrameworkEntity } from "./entities/competency-framework.entity";
import { QuestionSetEntity } from "./entities/question-set.entity";
import { AnswerEntity } from "./entities/answer.entity";
import { EvaluationJobEntity } from "./entities/evaluation-job.entity";
import type { EvaluationJobStatus } from "./entities/evaluation-job.entity";
import { EvaluationArtifactEntity } from "./entities/evaluation-artifact.entity";
import type { ArtifactKind } from "./entities/evaluation-artifact.entity";
import type { IDataSource, IRepository } from "./interfaces";
import type { Answer, EvaluationReport } from "../types/evaluation";
import type { CompetencyFramework } from "../types/framework";
import type { JobContext } from "../types/job";
import type { QuestionSet } from "../types/question";
import { evaluationReportSchema } from "../types/schemas";

export type { ArtifactKind, EvaluationJobStatus };

export interface EvaluationJobRecord {
    id: number;
    answerId: string;
    status: EvaluationJobStatus;
    errorCode: string | null;
    attempts: number;
    createdAt: Date;
    updatedAt: Date;
}

export interface EvaluationJobUpdate {
    status: EvaluationJobStatus;
    errorCode?: string | null;
    incrementAttempts?: boolean;
}

export interface ArtifactRecord {
    kind: ArtifactKind;
    key?: string;
    payload: object;
    version?: string;
}

/**
 * Persistence contract for the evaluation engine.
 */
export interface EvaluationStore {
    saveJobContext(jobContext: JobContext): Promise<void>;
    getJobContext(id: string): Promise<JobContext | null>;
    saveFramework(framework: CompetencyFramework): Promise<void>;
    getFramework(id: string): Promise<CompetencyFramework | null>;
    getLatestFramework(jobContextId: string): Promise<CompetencyFramework | null>;
    saveQuestionSet(questionSet: QuestionSet): Promise<void>;
    getQuestionSet(id: string): Promise<QuestionSet | null>;
    saveAnswer(answer: Answer): Promise<void>;
    getAnswer(id: string): Promise<Answer | null>;
    createEvaluationJob(answerId: string): Promise<EvaluationJobRecord>;
    updateEvaluationJob(id: number, update: EvaluationJobUpdate): Promise<void>;
    getLatestEvaluationJob(answerId: string): Promise<EvaluationJobRecord | null>;
    /** All-or-nothing write of one job's artifacts. */
    saveArtifacts(evaluationJobId: number, artifacts: ArtifactRecord[]): Promise<void>;
    getReport(evaluationJobId: number): Promise<EvaluationReport | null>;
}

function toJobRecord(entity: EvaluationJobEntity): EvaluationJobRecord {
    return {
        id: entity.id,
        answerId: entity.answerId,
        status: entity.status,
        errorCode: entity.error_code,
        attempts: entity.attempts,
        createdAt: entity.created_at,
        updatedAt: entity.updated_at
    };
}

/**
 * TypeORM/PostgreSQL implementation of EvaluationStore.
 */
export class TypeOrmEvaluationStore implements EvaluationStore {
    private jobContextRepository: IRepository<JobContextEntity>;
    private frameworkRepository: IRepository<CompetencyFrameworkEntity>;
    private questionSetRepository: IRepository<QuestionSetEntity>;
    private answerRepository: IRepository<AnswerEntity>;
    private jobRepository: IRepository<EvaluationJobEntity>;
    private artifactRepository: IRepository<EvaluationArtifactEntity>;

    constructor(private dataSource: IDataSource) {
        this.jobContextRepository = dataSource.getRepository(JobContextEntity);
        this.frameworkRepository = dataSource.getRepository(CompetencyFrameworkEntity);
        this.questionSetRepository = dataSource.getRepository(QuestionSetEntity);
        this.answerRepository = dataSource.getRepository(AnswerEntity);
        this.jobRepository = dataSource.getRepository(EvaluationJobEntity);
        this.artifactRepository = dataSource.getRepository(EvaluationArtifactEntity);
    }

    /**
     * Factory method for production use
     */
    static create(): TypeOrmEvaluationStore {
        return new TypeOrmEvaluationStore(AppDataSource);
    }

    async saveJobContext(jobContext: JobContext): Promise<void> {
        await this.jobContextRepository.save({
            id: jobContext.id,
            description: jobContext.description,
            attributes_json: jobContext.attributes,
            created_at: new Date(jobContext.createdAt)
        });
    }

    async getJobContext(id: string): Promise<JobContext | null> {
        const entity = await this.jobContextRepository.findOne({ where: { id } });
        if (!entity) {
            return null;
        }
        return {
            id: entity.id,
            description: entity.description,
            attributes: entity.attributes_json,
            createdAt: entity.created_at.toISOString()
        };
    }

    async saveFramework(framework: CompetencyFramework): Promise<void> {
        await this.frameworkRepository.save({
            id: framework.id,
            jobContextId: framework.jobContextId,
            template_version: framework.templateVersion,
            competencies_json: framework.competencies,
            created_at: new Date(framework.createdAt)
        });
    }

    async getFramework(id: string): Promise<CompetencyFramework | null> {
        const entity = await this.frameworkRepository.findOne({ where: { id } });
        return entity ? this.toFramework(entity) : null;
    }

    async getLatestFramework(jobContextId: string): Promise<CompetencyFramework | null> {
        const entity = await this.frameworkRepository.findOne({
            where: { jobContextId },
            order: { created_at: 'DESC' }
        });
        return entity ? this.toFramework(entity) : null;
    }

    async saveQuestionSet(questionSet: QuestionSet): Promise<void> {
        await this.questionSetRepository.save({
            id: questionSet.id,
            jobContextId: questionSet.jobContextId,
            frameworkId: questionSet.frameworkId,
            questions_json: questionSet.questions,
            metadata_json: questionSet.generationMetadata,
            partial_coverage: questionSet.partialCoverage,
            uncovered_competency_ids: questionSet.uncoveredCompetencyIds
        });
    }

    async getQuestionSet(id: string): Promise<QuestionSet | null> {
        const entity = await this.questionSetRepository.findOne({ where: { id } });
        if (!entity) {
            return null;
        }
        return {
            id: entity.id,
            jobContextId: entity.jobContextId,
            frameworkId: entity.frameworkId,
            questions: entity.questions_json,
            generationMetadata: entity.metadata_json,
            partialCoverage: entity.partial_coverage,
            uncoveredCompetencyIds: entity.uncovered_competency_ids
        };
    }

    async saveAnswer(answer: Answer): Promise<void> {
        await this.answerRepository.save({
            id: answer.id,
            questionSetId: answer.questionSetId,
            question_id: answer.questionId,
            candidate_id: answer.candidateId,
            text: answer.text,
            submitted_at: new Date(answer.submittedAt)
        });
    }

    async getAnswer(id: string): Promise<Answer | null> {
        const entity = await this.answerRepository.findOne({ where: { id } });
        if (!entity) {
            return null;
        }
        return {
            id: entity.id,
            questionSetId: entity.questionSetId,
            questionId: entity.question_id,
            candidateId: entity.candidate_id,
            text: entity.text,
            submittedAt: entity.submitted_at.toISOString()
        };
    }

    async createEvaluationJob(answerId: string): Promise<EvaluationJobRecord> {
        const entity = await this.jobRepository.save({ answerId, status: 'queued', attempts: 0 });
        return toJobRecord(entity);
    }

    async updateEvaluationJob(id: number, update: EvaluationJobUpdate): Promise<void> {
        const job = await this.jobRepository.findOne({ where: { id } });
        if (!job) {
            return;
        }
        job.status = update.status;
        if (update.errorCode !== undefined) {
            job.error_code = update.errorCode;
        }
        // Only failed runs count as attempts
        if (update.incrementAttempts) {
            job.attempts = (job.attempts || 0) + 1;
        }
        await this.jobRepository.save(job);
    }

    async getLatestEvaluationJob(answerId: string): Promise<EvaluationJobRecord | null> {
        const entity = await this.jobRepository.findOne({
            where: { answerId },
            order: { id: 'DESC' }
        });
        return entity ? toJobRecord(entity) : null;
    }

    async saveArtifacts(evaluationJobId: number, artifacts: ArtifactRecord[]): Promise<void> {
        await this.dataSource.transaction(async manager => {
            await manager.save(EvaluationArtifactEntity, artifacts.map(artifact => ({
                evaluationJobId,
                kind: artifact.kind,
                key: artifact.key ?? '',
                payload_json: artifact.payload,
                version: artifact.version ?? '1.0'
            })));
        });
    }

    async getReport(evaluationJobId: number): Promise<EvaluationReport | null> {
        const artifact = await this.artifactRepository.findOne({
            where: { evaluationJobId, kind: 'report' },
            order: { id: 'DESC' }
        });
        if (!artifact) {
            return null;
        }
        const parsed = evaluationReportSchema.safeParse(artifact.payload_json);
        return parsed.success ? parsed.data : null;
    }

    private toFramework(entity: CompetencyFrameworkEntity): CompetencyFramework {
        return {
            id: entity.id,
            jobContextId: entity.jobContextId,
            competencies: entity.competencies_json,
            templateVersion: entity.template_version,
            createdAt: entity.created_at.toISOString()
        };
    }
}

// Singleton instance
let evaluationStore: EvaluationStore | null = null;

export function getEvaluationStore(): EvaluationStore {
    if (!evaluationStore) {
        evaluationStore = TypeOrmEvaluationStore.create();
    }
    return evaluationStore;
}
