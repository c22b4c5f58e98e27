import { config } from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../errors';

const booleanFlag = z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .transform(value => value === 'true' || value === '1' || value === 'yes');

// setTimeout fires after 1ms for any delay above this
const MAX_TIMER_MS = 2_147_483_647;

const timerMs = z.coerce.number().int().positive().max(MAX_TIMER_MS, `must be at most ${MAX_TIMER_MS}ms`);

const optionalString = z
    .string()
    .trim()
    .transform(value => (value === '' ? undefined : value))
    .optional();

const settingsSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3000),
    NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
    CORS_ORIGINS: z
        .string()
        .default('http://localhost:3000,http://localhost:8000,http://localhost:8001')
        .transform(value => value.split(',').map(origin => origin.trim()).filter(origin => origin.length > 0)),

    OPENAI_API_KEY: optionalString,
    LLM_BASE_URL: optionalString.pipe(z.string().url().optional()),
    LLM_MODEL: z.string().min(1).default('gpt-4o-mini'),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.3),
    LLM_MAX_TOKENS: z.coerce.number().int().positive().default(2000),
    LLM_TIMEOUT_MS: timerMs.default(30000),
    LLM_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
    AGENT_PARSE_ATTEMPTS: z.coerce.number().int().min(1).max(5).default(2),

    ENABLE_CACHING: booleanFlag.default('true'),
    REDIS_URL: z.string().min(1).default('redis://localhost:6379'),
    CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(86400),
    CACHE_TIMEOUT_MS: timerMs.default(1000),
    CACHE_KEY_PREFIX: z.string().default('eval:'),
    PIPELINE_VERSION: z.string().min(1).default('1.0'),

    RANK_MAX_CONCURRENCY: z.coerce.number().int().min(1).max(50).default(5),
    RANK_DEADLINE_MS: timerMs.default(120000)
});

export interface ModelSettings {
    apiKey?: string;
    baseURL?: string;
    model: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
    maxAttempts: number;
}

export interface CacheSettings {
    enabled: boolean;
    redisUrl: string;
    ttlSeconds: number;
    commandTimeoutMs: number;
    keyPrefix: string;
}

export interface Settings {
    port: number;
    environment: 'development' | 'test' | 'staging' | 'production';
    logLevel: string;
    corsOrigins: string[];
    llm: ModelSettings;
    parseAttempts: number;
    cache: CacheSettings;
    pipelineVersion: string;
    ranking: {
        maxConcurrency: number;
        deadlineMs: number;
    };
}

/**
 * Build the typed settings object from environment variables.
 *
 * Throws ConfigurationError listing every invalid variable.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Readonly<Settings> {
    const parsed = settingsSchema.safeParse(env);

    if (!parsed.success) {
        throw new ConfigurationError(
            parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
        );
    }

    const values = parsed.data;

    return Object.freeze({
        port: values.PORT,
        environment: values.NODE_ENV,
        logLevel: values.LOG_LEVEL,
        corsOrigins: values.CORS_ORIGINS,
        llm: {
            apiKey: values.OPENAI_API_KEY,
            baseURL: values.LLM_BASE_URL,
            model: values.LLM_MODEL,
            temperature: values.LLM_TEMPERATURE,
            maxTokens: values.LLM_MAX_TOKENS,
            timeoutMs: values.LLM_TIMEOUT_MS,
            maxAttempts: values.LLM_MAX_ATTEMPTS
        },
        parseAttempts: values.AGENT_PARSE_ATTEMPTS,
        cache: {
            enabled: values.ENABLE_CACHING,
            redisUrl: values.REDIS_URL,
            ttlSeconds: values.CACHE_TTL_SECONDS,
            commandTimeoutMs: values.CACHE_TIMEOUT_MS,
            keyPrefix: values.CACHE_KEY_PREFIX
        },
        pipelineVersion: values.PIPELINE_VERSION,
        ranking: {
            maxConcurrency: values.RANK_MAX_CONCURRENCY,
            deadlineMs: values.RANK_DEADLINE_MS
        }
    });
}

let settings: Readonly<Settings> | null = null;

export function getSettings(): Readonly<Settings> {
    if (!settings) {
        config();
        settings = loadSettings();
    }
    return settings;
}
