import pino from 'pino';

/**
 * Logger Interface
 *
 * Structured fields first, message second, matching pino's call shape so the
 * shared instance can be injected wherever an ILogger is expected.
 */
export interface ILogger {
    info(data: Record<string, unknown>, message: string): void;
    error(data: Record<string, unknown>, message: string): void;
    warn(data: Record<string, unknown>, message: string): void;
    debug(data: Record<string, unknown>, message: string): void;
}

const environment = process.env.NODE_ENV || 'development';

/**
 * Logger Configuration
 *
 * JSON logger for the evaluation engine. Pretty-printed in development,
 * raw JSON in production and no transport worker under test.
 */
export const logger = pino({
    level: process.env.LOG_LEVEL || 'info',
    transport: environment === 'development'
        ? {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname',
                singleLine: false
            }
        }
        : undefined,
    serializers: {
        req: pino.stdSerializers.req,
        res: pino.stdSerializers.res,
        err: pino.stdSerializers.err
    }
});

/**
 * Normalize an unknown thrown value into log fields.
 */
export function errorFields(error: unknown): Record<string, unknown> {
    if (error instanceof Error) {
        return { err: error, error: error.message };
    }
    return { error: String(error) };
}
