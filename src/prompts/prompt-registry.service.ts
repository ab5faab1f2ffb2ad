import { logger, ILogger } from '../config/logger';
import { TemplateRenderError } from '../errors';
import { stableHash32 } from '../utils/fingerprint.util';
import type { PromptContext, PromptTemplate, PromptValue, VariantSelector } from './prompt.types';
import { BUILT_IN_TEMPLATES } from './templates';

const PLACEHOLDER_PATTERN = /\{\{\s*([a-zA-Z][a-zA-Z0-9_]*)\s*\}\}/g;

export function placeholdersIn(text: string): string[] {
    return Array.from(new Set(Array.from(text.matchAll(PLACEHOLDER_PATTERN), match => match[1])));
}

function renderValue(value: PromptValue): string {
    if (typeof value === 'string') {
        return value;
    }
    if (typeof value === 'number') {
        return String(value);
    }
    return value.map(item => `- ${item}`).join('\n');
}

function isMissing(value: PromptValue | undefined): boolean {
    if (value === undefined) {
        return true;
    }
    if (typeof value === 'string') {
        return value.trim().length === 0;
    }
    return typeof value !== 'number' && value.length === 0;
}

/**
 * Prompt Registry
 *
 * Holds every live version of every named template and assigns variants
 * deterministically per subject, so a subject keeps its variant for the
 * whole experiment.
 */
export class PromptRegistry {
    private readonly templates = new Map<string, PromptTemplate[]>();

    constructor(private logger: ILogger) { }

    static create(): PromptRegistry {
        const registry = new PromptRegistry(logger);
        for (const template of BUILT_IN_TEMPLATES) {
            registry.register(template);
        }
        return registry;
    }

    /**
     * Add a template version. Placeholders declared and placeholders used in
     * the text must match exactly.
     */
    register(template: PromptTemplate): void {
        const used = placeholdersIn(template.text);
        const declared = template.placeholders.map(placeholder => placeholder.name);
        const undeclared = used.filter(name => !declared.includes(name));
        const unused = declared.filter(name => !used.includes(name));
        if (undeclared.length > 0 || unused.length > 0) {
            throw new Error(
                `Template ${template.name}@${template.version} placeholder mismatch ` +
                `(undeclared: ${undeclared.join(', ') || 'none'}; unused: ${unused.join(', ') || 'none'})`
            );
        }
        if (template.weight < 0) {
            throw new Error(`Template ${template.name}@${template.version} has a negative weight`);
        }

        const versions = (this.templates.get(template.name) ?? []).filter(existing => existing.version !== template.version);
        versions.push(template);
        versions.sort((a, b) => a.version.localeCompare(b.version));
        this.templates.set(template.name, versions);
    }

    versions(templateName: string): string[] {
        return (this.templates.get(templateName) ?? []).map(template => template.version);
    }

    resolve(templateName: string, selector: VariantSelector = {}): PromptTemplate {
        const versions = this.templates.get(templateName);
        if (!versions || versions.length === 0) {
            throw new Error(`Unknown prompt template: ${templateName}`);
        }

        if (selector.version) {
            const pinned = versions.find(template => template.version === selector.version);
            if (!pinned) {
                throw new Error(`Unknown version ${selector.version} of prompt template ${templateName}`);
            }
            return pinned;
        }

        const live = versions.filter(template => template.weight > 0);
        if (live.length === 0) {
            throw new Error(`Prompt template ${templateName} has no live version`);
        }
        if (live.length === 1) {
            return live[0];
        }

        const totalWeight = live.reduce((sum, template) => sum + template.weight, 0);
        const bucketKey = `${selector.experimentId ?? 'default'}:${selector.subjectId ?? ''}:${templateName}`;
        const point = (stableHash32(bucketKey) / 0x100000000) * totalWeight;

        let cumulative = 0;
        for (const template of live) {
            cumulative += template.weight;
            if (point < cumulative) {
                return template;
            }
        }
        return live[live.length - 1];
    }

    /**
     * Fill `{{name}}` placeholders. Lists render as "- item" lines; a missing
     * or blank required value is a TemplateRenderError, a missing optional
     * value renders empty.
     */
    render(template: PromptTemplate, context: PromptContext): string {
        const missing = template.placeholders
            .filter(placeholder => placeholder.required && isMissing(context[placeholder.name]))
            .map(placeholder => placeholder.name);
        if (missing.length > 0) {
            this.logger.error({ template: template.name, version: template.version, missing }, 'Prompt render failed');
            throw new TemplateRenderError(template.name, missing);
        }

        return template.text.replace(PLACEHOLDER_PATTERN, (_match, name: string) => {
            const value = context[name];
            return value === undefined ? '' : renderValue(value);
        });
    }
}

// Singleton instance
let promptRegistry: PromptRegistry | null = null;

export function getPromptRegistry(): PromptRegistry {
    if (!promptRegistry) {
        promptRegistry = PromptRegistry.create();
    }
    return promptRegistry;
}
