import { z } from 'zod';
import { logger, ILogger } from '../config/logger';
import { getSettings } from '../config/settings';
import { getResponseCache, ResponseCache } from '../cache/response-cache.service';
import { FrameworkValidationError } from '../errors';
import { getPromptRegistry, PromptRegistry } from '../prompts/prompt-registry.service';
import type { PromptContext, PromptTemplate } from '../prompts/prompt.types';
import { TEMPLATE_NAMES } from '../prompts/templates';
import { defaultGenerationConfig, getProviderGateway } from '../providers/provider-gateway.service';
import type { IProviderGateway } from '../providers/provider-gateway.service';
import type { Competency, CompetencyCategory, CompetencyFramework } from '../types/framework';
import type { JobContext } from '../types/job';
import type { GenerationConfig } from '../types/provider';
import { competencyFrameworkSchema } from '../types/schemas';
import { fingerprint, slugify } from '../utils/fingerprint.util';

const CATEGORY_ALIASES: Record<string, CompetencyCategory> = {
    technical: 'technical',
    technical_skill: 'technical',
    technical_skills: 'technical',
    hard_skill: 'technical',
    soft_skill: 'soft_skill',
    soft_skills: 'soft_skill',
    soft: 'soft_skill',
    culture: 'culture',
    culture_fit: 'culture',
    cultural_fit: 'culture',
    team_fit: 'culture'
};

const categorySchema = z.string().transform((value, ctx) => {
    const category = CATEGORY_ALIASES[value.trim().toLowerCase().replace(/[\s-]+/g, '_')];
    if (!category) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown competency category "${value}"` });
        return z.NEVER;
    }
    return category;
});

const frameworkResponseSchema = z.object({
    competencies: z.array(z.object({
        name: z.string().trim().min(1),
        category: categorySchema,
        weight: z.number().nullable().optional(),
        rationale: z.string().default('')
    })).min(1)
});

type FrameworkResponse = z.infer<typeof frameworkResponseSchema>;

export interface ThoughtChainOptions {
    signal?: AbortSignal;
    /** Variant assignment subject; defaults to the job context id. */
    subjectId?: string;
    experimentId?: string;
    templateVersion?: string;
    config?: Partial<GenerationConfig>;
}

export interface IThoughtChainGenerator {
    generate(jobContext: JobContext, options?: ThoughtChainOptions): Promise<CompetencyFramework>;
}

/**
 * Normalize raw weights to sum to 1. Negative weights count as 0; missing
 * ones take the mean of the given ones, or all become equal when none is
 * given. An all-zero result falls back to equal weights.
 */
export function normalizeWeights(raw: ReadonlyArray<number | null | undefined>): number[] {
    if (raw.length === 0) {
        return [];
    }
    const given = raw.map(weight => (typeof weight === 'number' && Number.isFinite(weight) ? Math.max(0, weight) : null));
    const present = given.filter((weight): weight is number => weight !== null);
    const uniform = raw.map(() => 1 / raw.length);
    if (present.length === 0) {
        return uniform;
    }

    const fill = present.reduce((sum, weight) => sum + weight, 0) / present.length;
    const filled = given.map(weight => weight ?? fill);
    const total = filled.reduce((sum, weight) => sum + weight, 0);
    if (total <= 0) {
        return uniform;
    }
    return filled.map(weight => weight / total);
}

/**
 * Failures of the framework shape rules, empty when the framework is valid.
 */
export function frameworkProblems(competencies: readonly Competency[]): string[] {
    const problems: string[] = [];
    if (competencies.length === 0) {
        problems.push('no competencies were extracted');
    }
    if (!competencies.some(competency => competency.category === 'technical')) {
        problems.push('at least one technical competency is required');
    }
    if (!competencies.some(competency => competency.category !== 'technical')) {
        problems.push('at least one soft skill or culture competency is required');
    }
    return problems;
}

/**
 * Thought-Chain Generator
 *
 * Turns a job context into a weighted competency framework. Output is
 * validated before it is cached, so an invalid framework is never served
 * from the cache.
 */
export class ThoughtChainGenerator implements IThoughtChainGenerator {
    constructor(
        private gateway: IProviderGateway,
        private registry: PromptRegistry,
        private cache: ResponseCache,
        private logger: ILogger,
        private cacheTtlMs: number = getSettings().CACHE_TTL_MS
    ) { }

    static create(): ThoughtChainGenerator {
        return new ThoughtChainGenerator(getProviderGateway(), getPromptRegistry(), getResponseCache(), logger);
    }

    async generate(jobContext: JobContext, options: ThoughtChainOptions = {}): Promise<CompetencyFramework> {
        const template = this.registry.resolve(TEMPLATE_NAMES.thoughtChain, {
            subjectId: options.subjectId ?? jobContext.id,
            experimentId: options.experimentId,
            version: options.templateVersion
        });
        const context: PromptContext = {
            description: jobContext.description,
            seniority: jobContext.attributes.seniority,
            domain: jobContext.attributes.domain,
            companySize: jobContext.attributes.companySize ?? 'unspecified',
            cultureTags: jobContext.attributes.cultureTags.length > 0 ? jobContext.attributes.cultureTags : ['none given']
        };
        const prompt = this.registry.render(template, context);
        const key = fingerprint(TEMPLATE_NAMES.thoughtChain, template.version, prompt, jobContext.id);

        return this.cache.getOrCompute(
            key,
            this.cacheTtlMs,
            signal => this.build(jobContext, template, context, prompt, options, signal),
            competencyFrameworkSchema,
            options.signal
        );
    }

    private async build(
        jobContext: JobContext,
        template: PromptTemplate,
        context: PromptContext,
        prompt: string,
        options: ThoughtChainOptions,
        signal: AbortSignal
    ): Promise<CompetencyFramework> {
        const config = defaultGenerationConfig(options.config);

        this.logger.info({ jobContextId: jobContext.id, templateVersion: template.version }, 'Generating competency framework');
        let competencies = await this.request(prompt, template, config, signal);
        let problems = frameworkProblems(competencies);

        if (problems.length > 0) {
            this.logger.warn({ jobContextId: jobContext.id, problems }, 'Framework failed validation, requesting correction');
            const corrected = this.registry.render(template, {
                ...context,
                correction: `Your previous framework was rejected: ${problems.join('; ')}. Produce a corrected framework.`
            });
            competencies = await this.request(corrected, template, config, signal);
            problems = frameworkProblems(competencies);
        }

        if (problems.length > 0) {
            this.logger.error({ jobContextId: jobContext.id, problems }, 'Framework failed validation after correction');
            throw new FrameworkValidationError(`Invalid competency framework: ${problems.join('; ')}`, jobContext.id);
        }

        const framework: CompetencyFramework = {
            id: fingerprint('framework', jobContext.id, template.name, template.version).slice(0, 32),
            jobContextId: jobContext.id,
            competencies,
            templateVersion: template.version,
            createdAt: new Date().toISOString()
        };

        this.logger.info({
            jobContextId: jobContext.id,
            frameworkId: framework.id,
            competencies: competencies.map(competency => `${competency.id}:${competency.weight.toFixed(3)}`)
        }, 'Competency framework generated');

        return framework;
    }

    private async request(
        prompt: string,
        template: PromptTemplate,
        config: GenerationConfig,
        signal?: AbortSignal
    ): Promise<Competency[]> {
        const result = await this.gateway.completeJson(prompt, 'quality', config, frameworkResponseSchema, {
            signal,
            system: template.system,
            promptName: `${template.name}@${template.version}`
        });
        return this.toCompetencies(result.data);
    }

    private toCompetencies(response: FrameworkResponse): Competency[] {
        const seen = new Set<string>();
        const unique = response.competencies.filter(item => {
            const id = slugify(item.name);
            if (id.length === 0 || seen.has(id)) {
                return false;
            }
            seen.add(id);
            return true;
        });

        const weights = normalizeWeights(unique.map(item => item.weight));
        return unique.map((item, index) => ({
            id: slugify(item.name),
            name: item.name,
            category: item.category,
            weight: weights[index],
            rationale: item.rationale
        }));
    }
}

// Singleton instance
let thoughtChainGenerator: ThoughtChainGenerator | null = null;

export function getThoughtChainGenerator(): ThoughtChainGenerator {
    if (!thoughtChainGenerator) {
        thoughtChainGenerator = ThoughtChainGenerator.create();
    }
    return thoughtChainGenerator;
}
