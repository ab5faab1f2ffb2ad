import { config } from 'dotenv';
import { z } from 'zod';

config();

const providerName = z.enum(['openai', 'anthropic']);

const providerOrderSchema = z
    .string()
    .transform(value => value.split(',').map(item => item.trim()).filter(item => item.length > 0))
    .pipe(z.array(providerName).min(1, 'PROVIDER_ORDER must name at least one provider'));

const settingsSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    LOG_LEVEL: z.string().default('info'),

    DATABASE_URL: z.string().optional(),
    REDIS_URL: z.string().optional(),

    OPENAI_API_KEY: z.string().optional(),
    OPENAI_MODEL: z.string().default('gpt-4o-mini'),
    OPENAI_QUALITY_MODEL: z.string().default('gpt-4o'),
    ANTHROPIC_API_KEY: z.string().optional(),
    ANTHROPIC_MODEL: z.string().default('claude-3-5-haiku-latest'),
    ANTHROPIC_QUALITY_MODEL: z.string().default('claude-3-5-sonnet-latest'),
    PROVIDER_ORDER: providerOrderSchema.default('openai,anthropic'),
    PROVIDER_CONCURRENCY: z.coerce.number().int().positive().default(8),

    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
    LLM_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(2000),
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    LLM_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
    RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(500),
    RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(8000),

    CIRCUIT_FAILURE_THRESHOLD: z.coerce.number().int().positive().default(5),
    CIRCUIT_WINDOW_MS: z.coerce.number().int().positive().default(60000),
    CIRCUIT_COOLDOWN_MS: z.coerce.number().int().positive().default(30000),

    CACHE_TTL_MS: z.coerce.number().int().positive().default(86400000),
    CACHE_CAPACITY: z.coerce.number().int().positive().default(5000),
    CACHE_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(60000),
    SHARED_STORE_CAPACITY: z.coerce.number().int().positive().default(50000),

    QUESTION_SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.8),
    EVALUATION_DEADLINE_MS: z.coerce.number().int().positive().default(60000),

    SCORING_MIN_POOL_SIZE: z.coerce.number().int().positive().default(30),
    SCORING_OUTLIER_K: z.coerce.number().positive().default(3),
    SCORING_OUTLIER_MIN_SAMPLES: z.coerce.number().int().min(2).default(10),
    SCORING_SKETCH_BINS: z.coerce.number().int().min(10).default(1000),
    SCORING_RECALIBRATE_EVERY: z.coerce.number().int().positive().default(50),
    SCORING_RECALIBRATE_INTERVAL_MS: z.coerce.number().int().positive().default(3600000),
    SCORING_DECAY_HALF_LIFE: z.coerce.number().positive().default(200),
    SCORING_WINDOW_SIZE: z.coerce.number().int().positive().default(1000),
    SCORING_LEASE_MS: z.coerce.number().int().positive().default(5000),
    SCORING_RECORD_MARKER_TTL_MS: z.coerce.number().int().positive().default(604800000),

    EXPLAIN_MIN_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.6),

    EVAL_MAX_ATTEMPTS: z.coerce.number().int().positive().default(5),
    EVAL_BACKOFF_MS: z.coerce.number().int().positive().default(1000)
});

export type ProviderName = z.infer<typeof providerName>;
export type AppSettings = z.infer<typeof settingsSchema>;

/**
 * Parse settings from an environment map. Throws a ZodError listing every
 * invalid key.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): AppSettings {
    return settingsSchema.parse(env);
}

let settings: AppSettings | null = null;

export function getSettings(): AppSettings {
    if (!settings) {
        settings = loadSettings();
    }
    return settings;
}
