/**
 * Express Server Configuration and Routes
 *
 * The HTTP host around the engine. It exposes REST endpoints for:
 * - Health checks (Ollama connectivity, knowledge base size)
 * - Document upload, listing and removal
 * - Question answering
 *
 * Routes only translate HTTP to engine calls; everything else lives in the
 * services.
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import multer from 'multer';
import * as path from 'path';
import { createOllamaClient, IOllamaClient } from '../clients/ollamaClient';
import { AppConfig, loadConfig } from '../config';
import {
    DocumentUploadResponse,
    HealthResponse,
    IngestRequest,
    QueryRequest,
    QueryResponse,
} from '../../shared/types';
import { DocumentQaEngine, createDocumentQaEngine, detectDocumentKind } from '../services';
import {
    createDocumentMirror,
    createIndexPersistence,
    createQueryAnalytics,
} from '../storage';

/**
 * Server configuration options.
 */
export interface ServerConfig {
    /** Port to listen on */
    port: number;
    /** CORS origin (default: allow all) */
    corsOrigin?: string;
    /** Largest accepted upload per file, in bytes */
    maxUploadBytes: number;
    /** Engine instance */
    engine: DocumentQaEngine;
    /** Ollama client used by the health check */
    ollamaClient?: IOllamaClient;
}

export const DEFAULT_SERVER_CONFIG = {
    port: 3001,
    corsOrigin: '*',
    maxUploadBytes: 16 * 1024 * 1024,
};

/**
 * Custom error class for API errors.
 * Includes HTTP status code for proper response handling.
 */
export class ApiError extends Error {
    constructor(
        message: string,
        public readonly statusCode: number = 500,
        public readonly code?: string
    ) {
        super(message);
        this.name = 'ApiError';
    }
}

function formField(value: unknown, fallback: string): string {
    return typeof value === 'string' && value.trim() ? value.trim() : fallback;
}

/**
 * Creates and configures the Express application.
 * Creating the app without listening keeps it usable from tests.
 */
export function createApp(config: Partial<ServerConfig> & { engine: DocumentQaEngine }): Express {
    const mergedConfig = { ...DEFAULT_SERVER_CONFIG, ...config };
    const { engine } = mergedConfig;
    const ollamaClient = mergedConfig.ollamaClient;
    const app = express();

    // =========================================================================
    // Middleware Setup
    // =========================================================================

    app.use(
        cors({
            origin: mergedConfig.corsOrigin,
            methods: ['GET', 'POST', 'DELETE'],
            allowedHeaders: ['Content-Type', 'Authorization'],
        })
    );

    app.use(express.json({ limit: '1mb' }));

    // Uploads stay in memory; the engine only needs the bytes
    const upload = multer({
        storage: multer.memoryStorage(),
        limits: {
            fileSize: mergedConfig.maxUploadBytes,
        },
    });

    app.use((req: Request, _res: Response, next: NextFunction) => {
        console.log(`${new Date().toISOString()} ${req.method} ${req.path}`);
        next();
    });

    // =========================================================================
    // Health Endpoint
    // =========================================================================

    /**
     * GET /api/health
     *
     * 503 when Ollama is unreachable: queries would only return the apology.
     */
    app.get('/api/health', async (_req: Request, res: Response) => {
        const stats = engine.stats();
        const ollamaAvailable = ollamaClient ? await ollamaClient.isAvailable() : true;

        const response: HealthResponse = {
            status: ollamaAvailable ? 'ok' : 'error',
            ollama: ollamaAvailable,
            documents: stats.documents,
            chunks: stats.chunks,
        };

        res.status(ollamaAvailable ? 200 : 503).json(response);
    });

    // =========================================================================
    // Document Management Endpoints
    // =========================================================================

    /**
     * POST /api/documents
     *
     * Multipart upload of one or more `file` parts, with optional
     * `department` and `subject` fields applied to every file. Files are
     * ingested one by one and reported individually.
     */
    app.post('/api/documents', upload.array('file'), async (req: Request, res: Response, next: NextFunction) => {
        try {
            const files = Array.isArray(req.files) ? req.files : [];
            if (files.length === 0) {
                throw new ApiError('No file provided', 400, 'MISSING_FILE');
            }

            const body: Record<string, unknown> = req.body ?? {};
            const department = formField(body.department, 'General');
            const subject = formField(body.subject, 'General');

            const response: DocumentUploadResponse = { success: false, uploaded: [], failed: [] };
            const requests: IngestRequest[] = [];

            for (const file of files) {
                const kind = detectDocumentKind(file.originalname);
                if (!kind) {
                    response.failed.push({ filename: file.originalname, error: 'File type not allowed' });
                    continue;
                }
                requests.push({
                    blob: file.buffer,
                    filename: path.basename(file.originalname),
                    kind,
                    department,
                    subject,
                });
            }

            for (const { filename, result } of await engine.ingestDocuments(requests)) {
                if (result.success) {
                    response.uploaded.push({
                        filename,
                        documentId: result.document.id,
                        chunkCount: result.document.chunkCount,
                        department,
                        subject,
                    });
                } else {
                    response.failed.push({ filename, error: result.reason });
                }
            }

            response.success = response.uploaded.length > 0;
            res.status(response.success ? 201 : 400).json(response);
        } catch (error) {
            next(error);
        }
    });

    /**
     * GET /api/documents
     *
     * Documents in upload order.
     */
    app.get('/api/documents', (_req: Request, res: Response) => {
        res.json({ documents: engine.listDocuments() });
    });

    /**
     * DELETE /api/documents/:id
     *
     * Removes the document and rebuilds the index from what remains.
     */
    app.delete('/api/documents/:id', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const id = Number(req.params.id);
            if (!Number.isInteger(id) || id < 0) {
                throw new ApiError('Document ID must be a non-negative integer', 400, 'INVALID_DOCUMENT_ID');
            }

            if (!(await engine.removeDocument(id))) {
                throw new ApiError('Document not found', 404, 'DOCUMENT_NOT_FOUND');
            }

            res.json({ success: true });
        } catch (error) {
            next(error);
        }
    });

    // =========================================================================
    // Query Endpoint
    // =========================================================================

    /**
     * POST /api/query
     *
     * The engine always answers with text, so only a missing query is an
     * HTTP error.
     */
    app.post('/api/query', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const { query }: QueryRequest = req.body ?? {};
            if (typeof query !== 'string' || !query) {
                throw new ApiError('Query is required', 400, 'MISSING_QUERY');
            }

            const response: QueryResponse = { response: await engine.answerQuery(query) };
            console.log(`Query processed: ${query.slice(0, 50)}`);
            res.json(response);
        } catch (error) {
            next(error);
        }
    });

    // =========================================================================
    // Error Handling Middleware
    // =========================================================================

    app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
        if (err instanceof ApiError) {
            res.status(err.statusCode).json({
                error: err.message,
                code: err.code,
            });
            return;
        }

        if (err instanceof multer.MulterError && err.code === 'LIMIT_FILE_SIZE') {
            res.status(413).json({
                error: 'File too large',
                code: 'FILE_TOO_LARGE',
            });
            return;
        }

        console.error('Unhandled error:', err);
        res.status(500).json({
            error: 'Internal server error',
        });
    });

    return app;
}

/**
 * Starts the Express server.
 */
export function startServer(
    app: Express,
    port: number = DEFAULT_SERVER_CONFIG.port
): Promise<void> {
    return new Promise((resolve) => {
        app.listen(port, () => {
            console.log(`Document QA server running on port ${port}`);
            console.log(`Health check: http://localhost:${port}/api/health`);
            resolve();
        });
    });
}

/**
 * Wires the engine and its collaborators from configuration.
 */
export function createEngineFromConfig(
    config: AppConfig,
    ollamaClient: IOllamaClient = createOllamaClient(config.ollama)
): DocumentQaEngine {
    return createDocumentQaEngine({
        embedder: ollamaClient,
        model: ollamaClient,
        persistence: createIndexPersistence({
            dataDir: config.dataDir,
            embeddingModel: config.ollama.embeddingModel,
            embeddingDimension: config.ollama.embeddingDimension,
        }),
        mirror: createDocumentMirror({ storagePath: path.join(config.dataDir, 'documents') }),
        analytics: createQueryAnalytics({ logPath: path.join(config.dataDir, 'query-log.jsonl') }),
        chunking: config.chunking,
        query: { topK: config.topK },
    });
}

/**
 * Loads configuration, restores saved state and optionally starts listening.
 */
export async function createServer(
    config: AppConfig = loadConfig(),
    autoStart: boolean = false
): Promise<Express> {
    const ollamaClient = createOllamaClient(config.ollama);
    const engine = createEngineFromConfig(config, ollamaClient);

    const restored = await engine.initialize();
    if (!restored) {
        console.log('Starting with an empty knowledge base');
    }

    const app = createApp({
        engine,
        ollamaClient,
        port: config.port,
        corsOrigin: config.corsOrigin,
        maxUploadBytes: config.maxUploadBytes,
    });

    if (autoStart) {
        await startServer(app, config.port);
    }

    return app;
}
