/**
 * Ollama Client
 *
 * Wrapper for communicating with a local Ollama instance. The engine treats
 * embedding and generation as external capabilities; this client is the
 * adapter that provides both of them over Ollama's REST API.
 *
 * Ollama API endpoints used:
 * - GET /api/tags - List available models (used for health check)
 * - POST /api/generate - Generate text completions
 * - POST /api/embed - Generate vector embeddings for a batch of inputs
 */

import { z } from 'zod';
import { GenerationOptions } from '../../shared/types';

/**
 * Configuration for the Ollama client.
 */
export interface OllamaClientConfig {
    /** Base URL for Ollama API (default: http://localhost:11434) */
    baseUrl: string;
    /** Default model for text generation */
    chatModel: string;
    /** Model used for embeddings */
    embeddingModel: string;
    /** Length of every vector the embedding model returns */
    embeddingDimension: number;
    /** Request timeout in milliseconds */
    timeoutMs: number;
}

/**
 * Default configuration values.
 * all-minilm produces 384-dimensional vectors.
 */
export const DEFAULT_OLLAMA_CONFIG: OllamaClientConfig = {
    baseUrl: 'http://localhost:11434',
    chatModel: 'llama3.2',
    embeddingModel: 'all-minilm',
    embeddingDimension: 384,
    timeoutMs: 30000,
};

/**
 * Error codes for different failure scenarios.
 */
export enum OllamaErrorCode {
    /** Ollama service is not running or unreachable */
    CONNECTION_REFUSED = 'CONNECTION_REFUSED',
    /** Request took too long */
    TIMEOUT = 'TIMEOUT',
    /** Requested model is not available */
    MODEL_NOT_FOUND = 'MODEL_NOT_FOUND',
    /** Ollama returned an error response */
    API_ERROR = 'API_ERROR',
    /** Response body did not have the expected shape */
    INVALID_RESPONSE = 'INVALID_RESPONSE',
    /** Embeddings came back with the wrong length or count */
    DIMENSION_MISMATCH = 'DIMENSION_MISMATCH',
    /** Unexpected error during communication */
    UNKNOWN = 'UNKNOWN',
}

const RETRYABLE_CODES: ReadonlySet<OllamaErrorCode> = new Set([
    OllamaErrorCode.CONNECTION_REFUSED,
    OllamaErrorCode.TIMEOUT,
]);

/**
 * Custom error class for Ollama-specific errors.
 * `retryable` is set for failures that may succeed on a later attempt.
 */
export class OllamaError extends Error {
    public readonly retryable: boolean;

    constructor(
        message: string,
        public readonly code: OllamaErrorCode,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'OllamaError';
        this.retryable = RETRYABLE_CODES.has(code);
    }
}

const generateResponseSchema = z.object({
    response: z.string(),
    done: z.boolean().optional(),
});

const embedResponseSchema = z.object({
    embeddings: z.array(z.array(z.number())),
});

const errorBodySchema = z.object({
    error: z.string(),
});

/**
 * Maps text to fixed-length vectors. Identical input and model give
 * identical output.
 */
export interface EmbeddingProvider {
    readonly model: string;
    readonly dimension: number;
    embed(texts: string[]): Promise<number[][]>;
}

/**
 * Produces free-text completions from a prompt.
 */
export interface GenerativeModel {
    generateCompletion(prompt: string, options?: GenerationOptions): Promise<string>;
}

/**
 * Interface defining the Ollama client contract.
 */
export interface IOllamaClient extends EmbeddingProvider, GenerativeModel {
    isAvailable(): Promise<boolean>;
}

/**
 * Ollama Client Implementation
 *
 * Every request is bounded by `timeoutMs`; a timeout surfaces as a
 * retryable OllamaError.
 */
export class OllamaClient implements IOllamaClient {
    private readonly config: OllamaClientConfig;

    constructor(config: Partial<OllamaClientConfig> = {}) {
        this.config = { ...DEFAULT_OLLAMA_CONFIG, ...config };
    }

    get model(): string {
        return this.config.embeddingModel;
    }

    get dimension(): number {
        return this.config.embeddingDimension;
    }

    /**
     * Check if Ollama is available and responding.
     * Used by the /api/health endpoint.
     */
    async isAvailable(): Promise<boolean> {
        try {
            const response = await this.fetchWithTimeout(
                `${this.config.baseUrl}/api/tags`,
                { method: 'GET' },
                5000 // Short timeout for health checks
            );
            return response.ok;
        } catch {
            return false;
        }
    }

    /**
     * Generate a text completion.
     *
     * `options.system` is sent as Ollama's system prompt, separate from the
     * user prompt.
     *
     * @throws OllamaError if generation fails
     */
    async generateCompletion(
        prompt: string,
        options: GenerationOptions = {}
    ): Promise<string> {
        const model = options.model ?? this.config.chatModel;

        try {
            const response = await this.postJson('/api/generate', {
                model,
                prompt,
                system: options.system,
                stream: false,
                options: {
                    temperature: options.temperature ?? 0.7,
                    num_predict: options.maxTokens ?? 1000,
                },
            });

            if (!response.ok) {
                await this.handleErrorResponse(response, model);
            }

            const parsed = generateResponseSchema.safeParse(await response.json());
            if (!parsed.success) {
                throw new OllamaError(
                    'Unexpected response from /api/generate',
                    OllamaErrorCode.INVALID_RESPONSE
                );
            }
            return parsed.data.response;
        } catch (error) {
            throw this.wrapError(error, 'Failed to generate completion');
        }
    }

    /**
     * Generate embeddings for a batch of texts in a single request.
     *
     * The result has one vector per input, in input order, each of length
     * `dimension`.
     *
     * @throws OllamaError if the request fails or the vectors have the wrong shape
     */
    async embed(texts: string[]): Promise<number[][]> {
        if (texts.length === 0) {
            return [];
        }

        try {
            const response = await this.postJson('/api/embed', {
                model: this.config.embeddingModel,
                input: texts,
            });

            if (!response.ok) {
                await this.handleErrorResponse(response, this.config.embeddingModel);
            }

            const parsed = embedResponseSchema.safeParse(await response.json());
            if (!parsed.success) {
                throw new OllamaError(
                    'Unexpected response from /api/embed',
                    OllamaErrorCode.INVALID_RESPONSE
                );
            }

            const { embeddings } = parsed.data;
            if (embeddings.length !== texts.length) {
                throw new OllamaError(
                    `Expected ${texts.length} embeddings, received ${embeddings.length}`,
                    OllamaErrorCode.DIMENSION_MISMATCH
                );
            }
            for (const vector of embeddings) {
                if (vector.length !== this.config.embeddingDimension) {
                    throw new OllamaError(
                        `Model "${this.config.embeddingModel}" returned ${vector.length}-dimensional vectors, ` +
                            `configured dimension is ${this.config.embeddingDimension}`,
                        OllamaErrorCode.DIMENSION_MISMATCH
                    );
                }
            }
            return embeddings;
        } catch (error) {
            throw this.wrapError(error, 'Failed to generate embeddings');
        }
    }

    private postJson(path: string, body: unknown): Promise<Response> {
        return this.fetchWithTimeout(
            `${this.config.baseUrl}${path}`,
            {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                },
                body: JSON.stringify(body),
            },
            this.config.timeoutMs
        );
    }

    /**
     * Fetch with timeout support, via AbortController.
     */
    private async fetchWithTimeout(
        url: string,
        options: RequestInit,
        timeoutMs: number
    ): Promise<Response> {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

        try {
            return await fetch(url, {
                ...options,
                signal: controller.signal,
            });
        } catch (error) {
            if (error instanceof Error && error.name === 'AbortError') {
                throw new OllamaError(
                    `Request timed out after ${timeoutMs}ms`,
                    OllamaErrorCode.TIMEOUT
                );
            }
            throw error;
        } finally {
            clearTimeout(timeoutId);
        }
    }

    /**
     * Handle non-OK HTTP responses from Ollama.
     * 404 means the model has not been pulled.
     */
    private async handleErrorResponse(response: Response, model: string): Promise<never> {
        let errorMessage: string;

        try {
            const body = errorBodySchema.safeParse(await response.json());
            errorMessage = body.success ? body.data.error : `HTTP ${response.status}`;
        } catch {
            errorMessage = `HTTP ${response.status}: ${response.statusText}`;
        }

        if (response.status === 404 || errorMessage.includes('not found')) {
            throw new OllamaError(
                `Model "${model}" not found. Please run: ollama pull ${model}`,
                OllamaErrorCode.MODEL_NOT_FOUND
            );
        }

        throw new OllamaError(
            `Ollama API error: ${errorMessage}`,
            OllamaErrorCode.API_ERROR
        );
    }

    /**
     * Wrap errors in OllamaError so callers see a single error type.
     */
    private wrapError(error: unknown, context: string): OllamaError {
        if (error instanceof OllamaError) {
            return error;
        }

        // Node's fetch rejects with "TypeError: fetch failed" when nothing listens
        if (error instanceof TypeError && error.message.includes('fetch')) {
            return new OllamaError(
                'Cannot connect to Ollama. Please ensure Ollama is running (ollama serve)',
                OllamaErrorCode.CONNECTION_REFUSED,
                error
            );
        }

        const message = error instanceof Error ? error.message : String(error);
        return new OllamaError(
            `${context}: ${message}`,
            OllamaErrorCode.UNKNOWN,
            error instanceof Error ? error : undefined
        );
    }
}

/**
 * Factory function to create an Ollama client.
 */
export function createOllamaClient(config?: Partial<OllamaClientConfig>): OllamaClient {
    return new OllamaClient(config);
}
