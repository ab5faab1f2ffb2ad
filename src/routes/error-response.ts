import { Response } from "express";
import { z } from "zod";
import { errorFields, logger } from "../config/logger";
import { CoverageError, EngineError, EvaluationUnavailable, NotFoundError, ProviderError } from "../errors";

export interface HttpError {
    status: number;
    body: Record<string, unknown>;
}

/**
 * Map an error raised while handling a request to a status and JSON body.
 */
export function toHttpError(error: unknown, operation: string): HttpError {
    if (error instanceof z.ZodError) {
        return { status: 400, body: { error: 'Validation failed', details: error.errors } };
    }
    if (error instanceof NotFoundError) {
        return { status: 404, body: { error: error.message, code: error.code } };
    }
    if (error instanceof CoverageError) {
        return {
            status: 409,
            body: {
                error: error.message,
                code: error.code,
                uncoveredCompetencyIds: error.uncoveredCompetencyIds,
                partialQuestionSet: error.partialQuestionSet
            }
        };
    }
    if (error instanceof ProviderError) {
        return {
            status: 502,
            body: { error: `${operation} failed upstream`, code: error.code, kind: error.kind, attempts: error.attempts }
        };
    }
    if (error instanceof EvaluationUnavailable) {
        return { status: 503, body: { error: error.message, code: error.code, failures: error.failures } };
    }
    if (error instanceof EngineError) {
        return { status: 500, body: { error: `${operation} failed`, code: error.code, message: error.message } };
    }
    return {
        status: 500,
        body: { error: `${operation} failed`, message: error instanceof Error ? error.message : 'Unknown error' }
    };
}

export function sendError(res: Response, error: unknown, operation: string): void {
    const { status, body } = toHttpError(error, operation);
    if (status >= 500) {
        logger.error({ operation, status, ...errorFields(error) }, 'Request failed');
    } else {
        logger.warn({ operation, status, error: error instanceof Error ? error.message : String(error) }, 'Request rejected');
    }
    res.status(status).json(body);
}
