/**
 * Unit tests for environment configuration
 */

import * as path from 'path';
import { ConfigError, loadConfig } from '../config';

describe('loadConfig', () => {
    it('should fall back to defaults for an empty environment', () => {
        expect(loadConfig({})).toEqual({
            port: 3001,
            corsOrigin: '*',
            dataDir: path.resolve('./data'),
            maxUploadBytes: 16 * 1024 * 1024,
            topK: 5,
            ollama: {
                baseUrl: 'http://localhost:11434',
                chatModel: 'llama3.2',
                embeddingModel: 'all-minilm',
                embeddingDimension: 384,
                timeoutMs: 30000,
            },
            chunking: { chunkSize: 1000, chunkOverlap: 200 },
        });
    });

    it('should read and convert every variable', () => {
        const config = loadConfig({
            PORT: '8080',
            CORS_ORIGIN: 'http://localhost:5173',
            DATA_DIR: '/var/lib/notes',
            OLLAMA_BASE_URL: 'http://ollama.internal:11434',
            OLLAMA_CHAT_MODEL: 'mistral',
            OLLAMA_EMBEDDING_MODEL: 'nomic-embed-text',
            EMBEDDING_DIMENSION: '768',
            OLLAMA_TIMEOUT_MS: '60000',
            CHUNK_SIZE: '500',
            CHUNK_OVERLAP: '0',
            TOP_K: '3',
            MAX_UPLOAD_BYTES: '1048576',
        });

        expect(config.port).toBe(8080);
        expect(config.corsOrigin).toBe('http://localhost:5173');
        expect(config.dataDir).toBe(path.resolve('/var/lib/notes'));
        expect(config.ollama).toEqual({
            baseUrl: 'http://ollama.internal:11434',
            chatModel: 'mistral',
            embeddingModel: 'nomic-embed-text',
            embeddingDimension: 768,
            timeoutMs: 60000,
        });
        expect(config.chunking).toEqual({ chunkSize: 500, chunkOverlap: 0 });
        expect(config.topK).toBe(3);
        expect(config.maxUploadBytes).toBe(1048576);
    });

    it('should treat blank values as unset', () => {
        expect(loadConfig({ PORT: '  ', OLLAMA_CHAT_MODEL: '' }).port).toBe(3001);
    });

    it('should reject a value that is not a number', () => {
        expect(() => loadConfig({ PORT: 'eighty' })).toThrow(ConfigError);
        expect(() => loadConfig({ PORT: 'eighty' })).toThrow(/^Invalid configuration: PORT: /);
    });

    it('should reject an invalid base URL', () => {
        expect(() => loadConfig({ OLLAMA_BASE_URL: 'localhost' })).toThrow(/OLLAMA_BASE_URL/);
    });

    it('should reject an overlap that is not smaller than the chunk size', () => {
        expect(() => loadConfig({ CHUNK_SIZE: '100', CHUNK_OVERLAP: '100' })).toThrow(
            'Invalid configuration: CHUNK_OVERLAP: CHUNK_OVERLAP must be smaller than CHUNK_SIZE'
        );
    });
});
