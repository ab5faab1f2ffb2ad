import { ResponseCache } from '../../src/cache/response-cache.service';
import { MemorySharedStore } from '../../src/cache/shared-store';
import type { ILogger } from '../../src/config/logger';
import { PromptRegistry } from '../../src/prompts/prompt-registry.service';
import { BUILT_IN_TEMPLATES } from '../../src/prompts/templates';
import type { Answer } from '../../src/types/evaluation';
import type { CompetencyFramework } from '../../src/types/framework';
import type { JobContext } from '../../src/types/job';
import type { Question, QuestionSet } from '../../src/types/question';

export function testJobContext(overrides: Partial<JobContext> = {}): JobContext {
    return {
        id: 'job-1',
        description: 'Senior backend engineer building payment APIs in TypeScript and PostgreSQL.',
        attributes: {
            seniority: 'senior',
            domain: 'backend',
            cultureTags: ['ownership']
        },
        createdAt: '2026-01-01T00:00:00.000Z',
        ...overrides
    };
}

export function testFramework(overrides: Partial<CompetencyFramework> = {}): CompetencyFramework {
    return {
        id: 'framework-1',
        jobContextId: 'job-1',
        competencies: [
            { id: 'api-design', name: 'API Design', category: 'technical', weight: 0.5, rationale: 'Owns public payment APIs' },
            { id: 'databases', name: 'Databases', category: 'technical', weight: 0.3, rationale: 'Heavy PostgreSQL use' },
            { id: 'ownership', name: 'Ownership', category: 'culture', weight: 0.2, rationale: 'Small team' }
        ],
        templateVersion: 'v1',
        createdAt: '2026-01-01T00:00:00.000Z',
        ...overrides
    };
}

export function testQuestion(overrides: Partial<Question> = {}): Question {
    return {
        id: 'question-1',
        competencyIds: ['api-design', 'databases', 'ownership'],
        text: 'Walk through how you would design an idempotent payment API.',
        rubric: {
            version: 'rubric-1',
            expectedAnswerComponents: ['idempotency keys', 'retries', 'transaction boundaries'],
            scoringAnchors: [
                { band: { min: 0, max: 0.4 }, description: 'Vague' },
                { band: { min: 0.4, max: 0.7 }, description: 'Covers basics' },
                { band: { min: 0.7, max: 1 }, description: 'Thorough' }
            ]
        },
        followUpQuestions: [],
        ...overrides
    };
}

export function testQuestionSet(overrides: Partial<QuestionSet> = {}): QuestionSet {
    return {
        id: 'question-set-1',
        jobContextId: 'job-1',
        frameworkId: 'framework-1',
        questions: [testQuestion()],
        generationMetadata: { templateVersion: 'v1', generatedAt: '2026-01-01T00:00:00.000Z', correctiveRequests: 0 },
        partialCoverage: false,
        uncoveredCompetencyIds: [],
        ...overrides
    };
}

export function testAnswer(overrides: Partial<Answer> = {}): Answer {
    return {
        id: 'answer-1',
        questionSetId: 'question-set-1',
        questionId: 'question-1',
        candidateId: 'candidate-1',
        text: 'I would require idempotency keys and store them in PostgreSQL next to the payment row.',
        submittedAt: '2026-01-02T00:00:00.000Z',
        ...overrides
    };
}

export function testRegistry(logger: ILogger): PromptRegistry {
    const registry = new PromptRegistry(logger);
    for (const template of BUILT_IN_TEMPLATES) {
        registry.register(template);
    }
    return registry;
}

export function testCache(logger: ILogger): ResponseCache {
    return new ResponseCache(new MemorySharedStore(), {
        capacity: 100,
        sweepIntervalMs: 60_000,
        leaseMs: 1000,
        pollIntervalMs: 5
    }, logger);
}
