import type {
    ArtifactRecord,
    EvaluationJobRecord,
    EvaluationJobUpdate,
    EvaluationStore
} from '../../src/db/evaluation-store';
import type { Answer, EvaluationReport } from '../../src/types/evaluation';
import type { CompetencyFramework } from '../../src/types/framework';
import type { JobContext } from '../../src/types/job';
import type { QuestionSet } from '../../src/types/question';
import { evaluationReportSchema } from '../../src/types/schemas';

/**
 * In-process EvaluationStore keeping plain records in maps.
 */
export class MemoryEvaluationStore implements EvaluationStore {
    readonly jobContexts = new Map<string, JobContext>();
    readonly frameworks = new Map<string, CompetencyFramework>();
    readonly questionSets = new Map<string, QuestionSet>();
    readonly answers = new Map<string, Answer>();
    readonly jobs = new Map<number, EvaluationJobRecord>();
    readonly artifacts = new Map<number, ArtifactRecord[]>();
    private nextJobId = 1;

    async saveJobContext(jobContext: JobContext): Promise<void> {
        this.jobContexts.set(jobContext.id, jobContext);
    }

    async getJobContext(id: string): Promise<JobContext | null> {
        return this.jobContexts.get(id) ?? null;
    }

    async saveFramework(framework: CompetencyFramework): Promise<void> {
        this.frameworks.set(framework.id, framework);
    }

    async getFramework(id: string): Promise<CompetencyFramework | null> {
        return this.frameworks.get(id) ?? null;
    }

    async getLatestFramework(jobContextId: string): Promise<CompetencyFramework | null> {
        const matching = [...this.frameworks.values()].filter(framework => framework.jobContextId === jobContextId);
        return matching[matching.length - 1] ?? null;
    }

    async saveQuestionSet(questionSet: QuestionSet): Promise<void> {
        this.questionSets.set(questionSet.id, questionSet);
    }

    async getQuestionSet(id: string): Promise<QuestionSet | null> {
        return this.questionSets.get(id) ?? null;
    }

    async saveAnswer(answer: Answer): Promise<void> {
        this.answers.set(answer.id, answer);
    }

    async getAnswer(id: string): Promise<Answer | null> {
        return this.answers.get(id) ?? null;
    }

    async createEvaluationJob(answerId: string): Promise<EvaluationJobRecord> {
        const now = new Date('2026-01-02T00:00:00.000Z');
        const job: EvaluationJobRecord = {
            id: this.nextJobId++,
            answerId,
            status: 'queued',
            errorCode: null,
            attempts: 0,
            createdAt: now,
            updatedAt: now
        };
        this.jobs.set(job.id, job);
        return { ...job };
    }

    async updateEvaluationJob(id: number, update: EvaluationJobUpdate): Promise<void> {
        const job = this.jobs.get(id);
        if (!job) {
            return;
        }
        job.status = update.status;
        if (update.errorCode !== undefined) {
            job.errorCode = update.errorCode;
        }
        if (update.incrementAttempts) {
            job.attempts += 1;
        }
    }

    async getLatestEvaluationJob(answerId: string): Promise<EvaluationJobRecord | null> {
        const matching = [...this.jobs.values()].filter(job => job.answerId === answerId);
        const latest = matching[matching.length - 1];
        return latest ? { ...latest } : null;
    }

    async saveArtifacts(evaluationJobId: number, artifacts: ArtifactRecord[]): Promise<void> {
        this.artifacts.set(evaluationJobId, [...(this.artifacts.get(evaluationJobId) ?? []), ...artifacts]);
    }

    async getReport(evaluationJobId: number): Promise<EvaluationReport | null> {
        const report = (this.artifacts.get(evaluationJobId) ?? []).filter(artifact => artifact.kind === 'report').pop();
        if (!report) {
            return null;
        }
        const parsed = evaluationReportSchema.safeParse(report.payload);
        return parsed.success ? parsed.data : null;
    }
}
