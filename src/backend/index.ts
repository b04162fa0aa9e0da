/**
 * Backend module entry point
 *
 * The backend is organized into:
 * - server/: Express app configuration and route handlers
 * - services/: The engine core (extraction, chunking, index, pipelines)
 * - clients/: External capabilities (OllamaClient)
 * - storage/: Persistence, metadata mirror and query analytics
 *
 * When run directly, this file loads .env and starts the server.
 * When imported, it exports the engine and server factory functions.
 */

import dotenv from 'dotenv';
import { createServer } from './server';

export {
    createApp,
    createServer,
    createEngineFromConfig,
    startServer,
    ApiError,
    DEFAULT_SERVER_CONFIG,
} from './server';

export type { ServerConfig } from './server';

export { loadConfig, ConfigError } from './config';

export type { AppConfig } from './config';

export * from './services';

export * from './storage';

export {
    OllamaClient,
    createOllamaClient,
    OllamaError,
    OllamaErrorCode,
    DEFAULT_OLLAMA_CONFIG,
} from './clients/ollamaClient';

export type {
    OllamaClientConfig,
    IOllamaClient,
    EmbeddingProvider,
    GenerativeModel,
} from './clients/ollamaClient';

if (require.main === module) {
    // Configuration is read inside createServer, after .env is loaded
    dotenv.config();

    createServer(undefined, true)
        .then(() => {
            console.log('Server started successfully');
        })
        .catch((error: unknown) => {
            console.error('Failed to start server:', error);
            process.exit(1);
        });
}
