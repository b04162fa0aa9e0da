/**
 * External service clients
 *
 * Wrappers for external capabilities:
 * - OllamaClient: embeddings and text generation from a local Ollama instance
 */

export {
    OllamaClient,
    createOllamaClient,
    OllamaError,
    OllamaErrorCode,
    DEFAULT_OLLAMA_CONFIG,
    type IOllamaClient,
    type OllamaClientConfig,
    type EmbeddingProvider,
    type GenerativeModel,
} from './ollamaClient';
