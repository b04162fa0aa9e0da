/**
 * Application configuration
 *
 * Reads settings from environment variables (a .env file is loaded by the
 * entry point) and validates them once at startup. Unset variables fall
 * back to defaults suited to a local Ollama install.
 */

import * as path from 'path';
import { z } from 'zod';
import { OllamaClientConfig } from './clients/ollamaClient';
import { ChunkingConfig } from './services/documentChunker';

const intFromEnv = (fallback: number) =>
    z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
    PORT: intFromEnv(3001),
    CORS_ORIGIN: z.string().min(1).default('*'),
    DATA_DIR: z.string().min(1).default('./data'),
    OLLAMA_BASE_URL: z.string().url().default('http://localhost:11434'),
    OLLAMA_CHAT_MODEL: z.string().min(1).default('llama3.2'),
    OLLAMA_EMBEDDING_MODEL: z.string().min(1).default('all-minilm'),
    EMBEDDING_DIMENSION: intFromEnv(384),
    OLLAMA_TIMEOUT_MS: intFromEnv(30000),
    CHUNK_SIZE: intFromEnv(1000),
    CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(200),
    TOP_K: intFromEnv(5),
    MAX_UPLOAD_BYTES: intFromEnv(16 * 1024 * 1024),
}).refine((env) => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
    message: 'CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
    path: ['CHUNK_OVERLAP'],
});

export interface AppConfig {
    port: number;
    corsOrigin: string;
    dataDir: string;
    maxUploadBytes: number;
    topK: number;
    ollama: OllamaClientConfig;
    chunking: ChunkingConfig;
}

/**
 * Raised at startup when an environment variable has an invalid value.
 */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Builds the application config from environment variables.
 * Empty strings count as unset.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const present = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
    );
    const parsed = envSchema.safeParse(present);

    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid configuration: ${issues}`);
    }

    const vars = parsed.data;
    return {
        port: vars.PORT,
        corsOrigin: vars.CORS_ORIGIN,
        dataDir: path.resolve(vars.DATA_DIR),
        maxUploadBytes: vars.MAX_UPLOAD_BYTES,
        topK: vars.TOP_K,
        ollama: {
            baseUrl: vars.OLLAMA_BASE_URL,
            chatModel: vars.OLLAMA_CHAT_MODEL,
            embeddingModel: vars.OLLAMA_EMBEDDING_MODEL,
            embeddingDimension: vars.EMBEDDING_DIMENSION,
            timeoutMs: vars.OLLAMA_TIMEOUT_MS,
        },
        chunking: {
            chunkSize: vars.CHUNK_SIZE,
            chunkOverlap: vars.CHUNK_OVERLAP,
        },
    };
}
