import type { QuestionSet } from '../types/question';

export type ProviderErrorKind =
    | 'Timeout'
    | 'RateLimited'
    | 'MalformedResponse'
    | 'AllProvidersExhausted'
    | 'Unavailable'
    | 'Rejected'
    | 'Cancelled';

export type EngineErrorCode =
    | 'provider_error'
    | 'template_render_error'
    | 'framework_validation_error'
    | 'coverage_error'
    | 'evaluation_unavailable'
    | 'scoring_error'
    | 'not_found';

/**
 * Base class for every error the engine raises on purpose. `code` is stable
 * and safe to persist (evaluation jobs store it as their error_code).
 */
export abstract class EngineError extends Error {
    abstract readonly code: EngineErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export interface ProviderAttemptRecord {
    provider: string;
    kind: ProviderErrorKind;
    message: string;
}

export class ProviderError extends EngineError {
    readonly code = 'provider_error';

    constructor(
        readonly kind: ProviderErrorKind,
        message: string,
        readonly provider?: string,
        readonly attempts: ProviderAttemptRecord[] = [],
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }

    /** Transient failures worth another attempt against the same provider. */
    get retryable(): boolean {
        return this.kind === 'Timeout' || this.kind === 'RateLimited' || this.kind === 'Unavailable';
    }
}

export class TemplateRenderError extends EngineError {
    readonly code = 'template_render_error';

    constructor(readonly templateName: string, readonly missingPlaceholders: string[]) {
        super(`Template "${templateName}" is missing required placeholders: ${missingPlaceholders.join(', ')}`);
    }
}

export class FrameworkValidationError extends EngineError {
    readonly code = 'framework_validation_error';

    constructor(message: string, readonly jobContextId: string) {
        super(message);
    }
}

export class CoverageError extends EngineError {
    readonly code = 'coverage_error';

    constructor(readonly uncoveredCompetencyIds: string[], readonly partialQuestionSet: QuestionSet) {
        super(`Competencies left uncovered after corrective pass: ${uncoveredCompetencyIds.join(', ')}`);
    }
}

export class EvaluationUnavailable extends EngineError {
    readonly code = 'evaluation_unavailable';

    constructor(readonly answerId: string, readonly failures: Array<{ competencyId: string; message: string }>) {
        super(`No dimension evaluation completed for answer ${answerId}`);
    }
}

export class ScoringError extends EngineError {
    readonly code = 'scoring_error';

    constructor(message: string, readonly poolKey: string, readonly poolSize: number) {
        super(message);
    }
}

export class NotFoundError extends EngineError {
    readonly code = 'not_found';

    constructor(readonly entity: string, readonly id: string) {
        super(`${entity} ${id} not found`);
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : 'Unknown error';
}
