import { ConfigService } from '@nestjs/config';
import { z } from 'zod';

export const TUTOR_CONFIG = Symbol('TUTOR_CONFIG');

const optionalString = z
    .string()
    .optional()
    .transform(value => (value && value.trim() ? value.trim() : undefined));

const flag = (fallback: 'true' | 'false') =>
    z.enum(['true', 'false']).default(fallback).transform(value => value === 'true');

const blankAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const positiveInt = (fallback: number) =>
    z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(fallback));

export const envSchema = z
    .object({
        PORT: positiveInt(8787),
        CORS_ORIGINS: z.string().default('http://localhost:3000,http://localhost:5173'),

        DB_HOST: z.string().default('localhost'),
        DB_PORT: positiveInt(3306),
        DB_USERNAME: z.string().default('root'),
        DB_PASSWORD: z.string().default(''),
        DB_DATABASE: z.string().default('ai_tutor'),
        DB_SYNCHRONIZE: flag('true'),

        GEMINI_API_KEY: optionalString,
        GEMINI_EMBED_MODEL: z.string().default('text-embedding-004'),
        GEMINI_CHAT_MODEL: z.string().default('gemini-2.5-flash-lite'),
        GEMINI_TEMPERATURE: z.preprocess(blankAsUndefined, z.coerce.number().min(0).max(2).default(0.3)),
        GEMINI_MAX_OUTPUT_TOKENS: positiveInt(1000),

        CHUNK_SIZE: positiveInt(1000),
        CHUNK_OVERLAP: z.preprocess(blankAsUndefined, z.coerce.number().int().min(0).default(200)),
        MAX_CONTEXT_CHUNKS: positiveInt(5),
        // cosine rescaled to [0, 1]; recalibrate when switching embedding models
        SIMILARITY_THRESHOLD: z.preprocess(blankAsUndefined, z.coerce.number().min(0).max(1).default(0.8)),
        MAX_HISTORY_TURNS: positiveInt(10),
        GENERATION_TIMEOUT_MS: positiveInt(30_000),
        EMBEDDING_TIMEOUT_MS: positiveInt(10_000),
        EMBEDDING_DIMENSION: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().optional()),
        EMBEDDING_BATCH_SIZE: positiveInt(100),
        PERSIST_PARTIAL_ANSWERS: flag('false'),
        SESSION_IDLE_TTL_MS: positiveInt(60 * 60 * 1000),
        MAX_UPLOAD_BYTES: positiveInt(10 * 1024 * 1024),
        SEED_DIRECTORY: optionalString,
    })
    .refine(env => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
        message: 'CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
        path: ['CHUNK_OVERLAP'],
    });

export interface GeminiSettings {
    apiKey?: string;
    embedModel: string;
    chatModel: string;
    temperature: number;
    maxOutputTokens: number;
}

export interface DatabaseSettings {
    host: string;
    port: number;
    username: string;
    password: string;
    database: string;
    synchronize: boolean;
}

export interface TutorConfig {
    port: number;
    corsOrigins: string[];
    database: DatabaseSettings;
    gemini: GeminiSettings;
    chunkSize: number;
    chunkOverlap: number;
    maxContextChunks: number;
    similarityThreshold: number;
    maxHistoryTurns: number;
    generationTimeoutMs: number;
    embeddingTimeoutMs: number;
    embeddingDimension?: number;
    embeddingBatchSize: number;
    persistPartialAnswers: boolean;
    sessionIdleTtlMs: number;
    maxUploadBytes: number;
    seedDirectory?: string;
}

const ENV_KEYS = Object.keys(envSchema.innerType().shape);

/** Used as `ConfigModule.forRoot({ validate })`; throws on the first invalid variable set. */
export function validateEnv(raw: Record<string, unknown>): Record<string, unknown> {
    const parsed = envSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new Error(`Invalid configuration: ${issues.join('; ')}`);
    }
    return raw;
}

export function parseTutorConfig(raw: Record<string, unknown>): TutorConfig {
    const env = envSchema.parse(raw);
    return {
        port: env.PORT,
        corsOrigins: env.CORS_ORIGINS.split(',').map(origin => origin.trim()).filter(Boolean),
        database: {
            host: env.DB_HOST,
            port: env.DB_PORT,
            username: env.DB_USERNAME,
            password: env.DB_PASSWORD,
            database: env.DB_DATABASE,
            synchronize: env.DB_SYNCHRONIZE,
        },
        gemini: {
            apiKey: env.GEMINI_API_KEY,
            embedModel: env.GEMINI_EMBED_MODEL,
            chatModel: env.GEMINI_CHAT_MODEL,
            temperature: env.GEMINI_TEMPERATURE,
            maxOutputTokens: env.GEMINI_MAX_OUTPUT_TOKENS,
        },
        chunkSize: env.CHUNK_SIZE,
        chunkOverlap: env.CHUNK_OVERLAP,
        maxContextChunks: env.MAX_CONTEXT_CHUNKS,
        similarityThreshold: env.SIMILARITY_THRESHOLD,
        maxHistoryTurns: env.MAX_HISTORY_TURNS,
        generationTimeoutMs: env.GENERATION_TIMEOUT_MS,
        embeddingTimeoutMs: env.EMBEDDING_TIMEOUT_MS,
        embeddingDimension: env.EMBEDDING_DIMENSION,
        embeddingBatchSize: env.EMBEDDING_BATCH_SIZE,
        persistPartialAnswers: env.PERSIST_PARTIAL_ANSWERS,
        sessionIdleTtlMs: env.SESSION_IDLE_TTL_MS,
        maxUploadBytes: env.MAX_UPLOAD_BYTES,
        seedDirectory: env.SEED_DIRECTORY,
    };
}

export function tutorConfigFactory(configService: ConfigService): TutorConfig {
    const raw: Record<string, unknown> = {};
    for (const key of ENV_KEYS) {
        raw[key] = configService.get(key);
    }
    return parseTutorConfig(raw);
}
