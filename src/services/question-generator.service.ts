import { z } from 'zod';
import { errorFields, logger, ILogger } from '../config/logger';
import { getSettings } from '../config/settings';
import { getResponseCache, ResponseCache } from '../cache/response-cache.service';
import { CoverageError, ProviderError } from '../errors';
import { getPromptRegistry, PromptRegistry } from '../prompts/prompt-registry.service';
import type { PromptContext, PromptTemplate } from '../prompts/prompt.types';
import { TEMPLATE_NAMES } from '../prompts/templates';
import { defaultGenerationConfig, getProviderGateway } from '../providers/provider-gateway.service';
import type { IProviderGateway } from '../providers/provider-gateway.service';
import type { Competency, CompetencyFramework } from '../types/framework';
import type { JobContext } from '../types/job';
import type { GenerationConfig } from '../types/provider';
import type { Question, QuestionSet, ScoringAnchor } from '../types/question';
import { questionSetSchema } from '../types/schemas';
import { fingerprint, normalizeText, shortFingerprint } from '../utils/fingerprint.util';
import { jaccardSimilarity } from '../utils/similarity.util';

export const MAX_QUESTIONS_PER_COMPETENCY = 3;

const questionResponseSchema = z.object({
    questions: z.array(z.object({
        text: z.string().trim().min(1),
        competency_ids: z.array(z.string()).default([]),
        expected_answer_components: z.array(z.string()).default([]),
        scoring_anchors: z.array(z.object({
            min: z.number(),
            max: z.number(),
            description: z.string()
        })).default([]),
        follow_up_questions: z.array(z.string()).default([])
    }))
});

type QuestionResponse = z.infer<typeof questionResponseSchema>;

export interface QuestionGeneratorOptions {
    signal?: AbortSignal;
    /** Return a partially covering set instead of throwing CoverageError. */
    allowPartial?: boolean;
    subjectId?: string;
    experimentId?: string;
    templateVersion?: string;
    config?: Partial<GenerationConfig>;
}

export interface IQuestionGenerator {
    generate(framework: CompetencyFramework, jobContext: JobContext, options?: QuestionGeneratorOptions): Promise<QuestionSet>;
}

function clampUnit(value: number): number {
    return Math.min(1, Math.max(0, value));
}

function toAnchors(raw: QuestionResponse['questions'][number]['scoring_anchors']): ScoringAnchor[] {
    return raw
        .map(anchor => {
            const low = clampUnit(Math.min(anchor.min, anchor.max));
            const high = clampUnit(Math.max(anchor.min, anchor.max));
            return { band: { min: low, max: high }, description: anchor.description };
        })
        .sort((a, b) => a.band.min - b.band.min);
}

/**
 * Fold `candidate` into `questions`: a near-duplicate of an existing
 * question adds its competencies to that question instead of being kept.
 */
export function mergeQuestion(questions: Question[], candidate: Question, threshold: number): boolean {
    const duplicate = questions.find(existing => jaccardSimilarity(existing.text, candidate.text) >= threshold);
    if (!duplicate) {
        questions.push(candidate);
        return true;
    }
    for (const competencyId of candidate.competencyIds) {
        if (!duplicate.competencyIds.includes(competencyId)) {
            duplicate.competencyIds.push(competencyId);
        }
    }
    return false;
}

export function uncoveredCompetencies(framework: CompetencyFramework, questions: readonly Question[]): string[] {
    const covered = new Set(questions.flatMap(question => question.competencyIds));
    return framework.competencies.map(competency => competency.id).filter(id => !covered.has(id));
}

/**
 * Question Generator
 *
 * One request per competency, run concurrently. Near-duplicate questions
 * merge, and every competency left uncovered gets one corrective request
 * aimed at it alone.
 */
export class QuestionGenerator implements IQuestionGenerator {
    constructor(
        private gateway: IProviderGateway,
        private registry: PromptRegistry,
        private cache: ResponseCache,
        private logger: ILogger,
        private similarityThreshold: number = getSettings().QUESTION_SIMILARITY_THRESHOLD,
        private cacheTtlMs: number = getSettings().CACHE_TTL_MS
    ) { }

    static create(): QuestionGenerator {
        return new QuestionGenerator(getProviderGateway(), getPromptRegistry(), getResponseCache(), logger);
    }

    async generate(
        framework: CompetencyFramework,
        jobContext: JobContext,
        options: QuestionGeneratorOptions = {}
    ): Promise<QuestionSet> {
        const template = this.registry.resolve(TEMPLATE_NAMES.questionSet, {
            subjectId: options.subjectId ?? jobContext.id,
            experimentId: options.experimentId,
            version: options.templateVersion
        });
        const contexts = framework.competencies.map(competency => this.contextFor(competency, framework, jobContext));
        const prompts = contexts.map(context => this.registry.render(template, context));
        const key = fingerprint(
            TEMPLATE_NAMES.questionSet,
            template.version,
            prompts,
            framework.id,
            jobContext.id,
            options.allowPartial ?? false
        );

        return this.cache.getOrCompute(
            key,
            this.cacheTtlMs,
            signal => this.build(framework, jobContext, template, contexts, prompts, options, signal),
            questionSetSchema,
            options.signal
        );
    }

    private async build(
        framework: CompetencyFramework,
        jobContext: JobContext,
        template: PromptTemplate,
        contexts: PromptContext[],
        prompts: string[],
        options: QuestionGeneratorOptions,
        signal: AbortSignal
    ): Promise<QuestionSet> {
        const config = defaultGenerationConfig(options.config);
        const knownIds = new Set(framework.competencies.map(competency => competency.id));
        const failures: ProviderError[] = [];

        const requestFor = async (index: number, prompt: string): Promise<Question[]> => {
            const competency = framework.competencies[index];
            try {
                return await this.request(prompt, competency, knownIds, template, config, signal);
            } catch (error) {
                if (!(error instanceof ProviderError) || error.kind === 'Cancelled') {
                    throw error;
                }
                failures.push(error);
                this.logger.warn({ competencyId: competency.id, ...errorFields(error) }, 'Question request failed');
                return [];
            }
        };

        this.logger.info({
            frameworkId: framework.id,
            competencies: framework.competencies.length,
            templateVersion: template.version
        }, 'Generating question set');

        const batches = await Promise.all(prompts.map((prompt, index) => requestFor(index, prompt)));
        const questions: Question[] = [];
        for (const batch of batches) {
            for (const question of batch) {
                mergeQuestion(questions, question, this.similarityThreshold);
            }
        }

        const missing = uncoveredCompetencies(framework, questions);
        if (missing.length > 0) {
            this.logger.warn({ frameworkId: framework.id, uncovered: missing }, 'Competencies uncovered, issuing corrective requests');
            const corrective = await Promise.all(missing.map(competencyId => {
                const index = framework.competencies.findIndex(competency => competency.id === competencyId);
                const prompt = this.registry.render(template, {
                    ...contexts[index],
                    correction: `No usable question targeted "${competencyId}" yet. Every question you return must list "${competencyId}" first in competency_ids and assess it directly.`
                });
                return requestFor(index, prompt);
            }));
            for (const batch of corrective) {
                for (const question of batch) {
                    mergeQuestion(questions, question, this.similarityThreshold);
                }
            }
        }

        const uncovered = uncoveredCompetencies(framework, questions);
        if (questions.length === 0 && failures.length > 0) {
            throw failures[failures.length - 1];
        }

        const questionSet: QuestionSet = {
            id: fingerprint('question-set', framework.id, template.name, template.version).slice(0, 32),
            jobContextId: jobContext.id,
            frameworkId: framework.id,
            questions,
            generationMetadata: {
                templateVersion: template.version,
                generatedAt: new Date().toISOString(),
                correctiveRequests: missing.length
            },
            partialCoverage: uncovered.length > 0,
            uncoveredCompetencyIds: uncovered
        };

        if (uncovered.length > 0) {
            this.logger.warn({ frameworkId: framework.id, uncovered }, 'Question set leaves competencies uncovered');
            if (!options.allowPartial) {
                throw new CoverageError(uncovered, questionSet);
            }
        }

        this.logger.info({
            frameworkId: framework.id,
            questionSetId: questionSet.id,
            questions: questions.length,
            correctiveRequests: missing.length
        }, 'Question set generated');
        return questionSet;
    }

    private contextFor(competency: Competency, framework: CompetencyFramework, jobContext: JobContext): PromptContext {
        const others = framework.competencies
            .filter(other => other.id !== competency.id)
            .map(other => `${other.id}: ${other.name}`);
        return {
            competencyId: competency.id,
            competencyName: competency.name,
            competencyCategory: competency.category,
            competencyRationale: competency.rationale || competency.name,
            otherCompetencies: others.length > 0 ? others : ['none'],
            seniority: jobContext.attributes.seniority,
            domain: jobContext.attributes.domain,
            description: jobContext.description
        };
    }

    private async request(
        prompt: string,
        competency: Competency,
        knownIds: ReadonlySet<string>,
        template: PromptTemplate,
        config: GenerationConfig,
        signal?: AbortSignal
    ): Promise<Question[]> {
        const result = await this.gateway.completeJson(prompt, 'quality', config, questionResponseSchema, {
            signal,
            system: template.system,
            promptName: `${template.name}@${template.version}`
        });

        if (result.data.questions.length > MAX_QUESTIONS_PER_COMPETENCY) {
            this.logger.debug({
                competencyId: competency.id,
                returned: result.data.questions.length
            }, 'Dropping questions beyond the per-competency limit');
        }

        return result.data.questions.slice(0, MAX_QUESTIONS_PER_COMPETENCY).map(item => {
            const competencyIds = [competency.id];
            for (const id of item.competency_ids) {
                if (knownIds.has(id) && !competencyIds.includes(id)) {
                    competencyIds.push(id);
                }
            }
            const scoringAnchors = toAnchors(item.scoring_anchors);
            const expectedAnswerComponents = item.expected_answer_components.filter(component => component.trim().length > 0);
            return {
                id: shortFingerprint('question', template.version, normalizeText(item.text)),
                competencyIds,
                text: item.text,
                rubric: {
                    version: shortFingerprint(
                        template.version,
                        normalizeText(item.text),
                        expectedAnswerComponents,
                        scoringAnchors.map(anchor => [anchor.band.min, anchor.band.max, anchor.description])
                    ),
                    expectedAnswerComponents,
                    scoringAnchors
                },
                followUpQuestions: item.follow_up_questions
            };
        });
    }
}

// Singleton instance
let questionGenerator: QuestionGenerator | null = null;

export function getQuestionGenerator(): QuestionGenerator {
    if (!questionGenerator) {
        questionGenerator = QuestionGenerator.create();
    }
    return questionGenerator;
}
