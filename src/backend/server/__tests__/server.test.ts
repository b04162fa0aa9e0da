/**
 * HTTP route tests
 *
 * The app listens on an ephemeral port for the duration of each test and is
 * called with fetch. The engine runs without persistence, against
 * in-process model stand-ins.
 */

import { Server } from 'http';
import { IOllamaClient } from '../../clients/ollamaClient';
import { createDocumentQaEngine } from '../../services/documentQaEngine';
import { APOLOGY_RESPONSE } from '../../services/queryPipeline';
import { KeywordEmbedder, RecordingModel } from '../../services/__tests__/testDoubles';
import { createApp } from '..';

class StubOllama implements IOllamaClient {
    private readonly embedder = new KeywordEmbedder(['sky', 'blue', 'grass', 'green']);
    readonly generator = new RecordingModel('Blue.');
    available = true;

    get model(): string {
        return this.embedder.model;
    }

    get dimension(): number {
        return this.embedder.dimension;
    }

    embed(texts: string[]): Promise<number[][]> {
        return this.embedder.embed(texts);
    }

    generateCompletion(prompt: string): Promise<string> {
        return this.generator.generateCompletion(prompt);
    }

    async isAvailable(): Promise<boolean> {
        return this.available;
    }
}

let server: Server;
let baseUrl: string;
let ollama: StubOllama;

beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    ollama = new StubOllama();
    const engine = createDocumentQaEngine({ embedder: ollama, model: ollama });
    const app = createApp({ engine, ollamaClient: ollama, maxUploadBytes: 64 });

    await new Promise<void>((resolve) => {
        server = app.listen(0, () => resolve());
    });
    const address = server.address();
    if (!address || typeof address === 'string') {
        throw new Error('Server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
});

afterEach(async () => {
    jest.restoreAllMocks();
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
    });
});

function upload(files: Array<{ name: string; content: string }>, fields: Record<string, string> = {}): Promise<Response> {
    const form = new FormData();
    for (const file of files) {
        form.append('file', new Blob([file.content], { type: 'text/plain' }), file.name);
    }
    for (const [name, value] of Object.entries(fields)) {
        form.append(name, value);
    }
    return fetch(`${baseUrl}/api/documents`, { method: 'POST', body: form });
}

function ask(body: unknown): Promise<Response> {
    return fetch(`${baseUrl}/api/query`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
    });
}

describe('GET /api/health', () => {
    it('should report the knowledge base size', async () => {
        const response = await fetch(`${baseUrl}/api/health`);

        expect(response.status).toBe(200);
        await expect(response.json()).resolves.toEqual({ status: 'ok', ollama: true, documents: 0, chunks: 0 });
    });

    it('should answer 503 when Ollama is unreachable', async () => {
        ollama.available = false;

        const response = await fetch(`${baseUrl}/api/health`);

        expect(response.status).toBe(503);
        await expect(response.json()).resolves.toMatchObject({ status: 'error', ollama: false });
    });
});

describe('POST /api/documents', () => {
    it('should ingest each file and report it', async () => {
        const response = await upload(
            [
                { name: 'sky.txt', content: 'The sky is blue.' },
                { name: 'photo.png', content: 'not text' },
            ],
            { department: 'Science' }
        );

        expect(response.status).toBe(201);
        await expect(response.json()).resolves.toEqual({
            success: true,
            uploaded: [{ filename: 'sky.txt', documentId: 0, chunkCount: 1, department: 'Science', subject: 'General' }],
            failed: [{ filename: 'photo.png', error: 'File type not allowed' }],
        });
    });

    it('should answer 400 when every file fails', async () => {
        const response = await upload([{ name: 'blank.txt', content: '   ' }]);

        expect(response.status).toBe(400);
        await expect(response.json()).resolves.toEqual({
            success: false,
            uploaded: [],
            failed: [{ filename: 'blank.txt', error: 'No text could be extracted from blank.txt' }],
        });
    });

    it('should answer 400 without files', async () => {
        const response = await upload([], { department: 'Science' });

        expect(response.status).toBe(400);
        await expect(response.json()).resolves.toEqual({ error: 'No file provided', code: 'MISSING_FILE' });
    });

    it('should answer 413 for a file over the size limit', async () => {
        const response = await upload([{ name: 'long.txt', content: 'x'.repeat(65) }]);

        expect(response.status).toBe(413);
        await expect(response.json()).resolves.toEqual({ error: 'File too large', code: 'FILE_TOO_LARGE' });
    });
});

describe('GET and DELETE /api/documents', () => {
    it('should list and remove documents', async () => {
        await upload([{ name: 'sky.txt', content: 'The sky is blue.' }]);
        await upload([{ name: 'grass.txt', content: 'Grass is green.' }]);

        const removal = await fetch(`${baseUrl}/api/documents/0`, { method: 'DELETE' });
        expect(removal.status).toBe(200);

        const listing = await fetch(`${baseUrl}/api/documents`);
        await expect(listing.json()).resolves.toMatchObject({
            documents: [{ id: 1, filename: 'grass.txt', chunkCount: 1 }],
        });
    });

    it('should answer 404 for an unknown document', async () => {
        const response = await fetch(`${baseUrl}/api/documents/12`, { method: 'DELETE' });

        expect(response.status).toBe(404);
        await expect(response.json()).resolves.toEqual({ error: 'Document not found', code: 'DOCUMENT_NOT_FOUND' });
    });

    it('should answer 400 for an id that is not a number', async () => {
        const response = await fetch(`${baseUrl}/api/documents/abc`, { method: 'DELETE' });

        expect(response.status).toBe(400);
    });
});

describe('POST /api/query', () => {
    it('should return the generated answer', async () => {
        await upload([{ name: 'sky.txt', content: 'The sky is blue.' }]);

        const response = await ask({ query: 'What colour is the sky?' });

        expect(response.status).toBe(200);
        await expect(response.json()).resolves.toEqual({ response: 'Blue.' });
        expect(ollama.generator.requests[0]?.prompt).toContain('From sky.txt:\nThe sky is blue.');
    });

    it('should answer 400 without a query', async () => {
        const response = await ask({});

        expect(response.status).toBe(400);
        await expect(response.json()).resolves.toEqual({ error: 'Query is required', code: 'MISSING_QUERY' });
    });

    it('should pass model failures through as the apology text', async () => {
        await upload([{ name: 'sky.txt', content: 'The sky is blue.' }]);
        ollama.generator.failWith = new Error('model crashed');

        const response = await ask({ query: 'What colour is the sky?' });

        expect(response.status).toBe(200);
        await expect(response.json()).resolves.toEqual({ response: APOLOGY_RESPONSE });
    });
});
