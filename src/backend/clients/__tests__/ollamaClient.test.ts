/**
 * Unit tests for the Ollama client
 *
 * fetch is replaced by a spy; no Ollama instance is contacted.
 */

import { OllamaClient, OllamaError, OllamaErrorCode, createOllamaClient } from '../ollamaClient';

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' },
    });
}

function requestBody(spy: jest.SpyInstance, call = 0): unknown {
    const init: RequestInit | undefined = spy.mock.calls[call]?.[1];
    return typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
}

describe('OllamaClient', () => {
    let fetchSpy: jest.SpyInstance;
    let client: OllamaClient;

    beforeEach(() => {
        fetchSpy = jest.spyOn(global, 'fetch');
        client = createOllamaClient({
            baseUrl: 'http://ollama.test:11434',
            embeddingModel: 'all-minilm',
            embeddingDimension: 3,
        });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should expose the embedding model and dimension', () => {
        expect(client.model).toBe('all-minilm');
        expect(client.dimension).toBe(3);
    });

    describe('embed', () => {
        it('should send all texts in one request and return one vector each', async () => {
            fetchSpy.mockResolvedValue(jsonResponse({ embeddings: [[0.1, 0.2, 0.3], [0.4, 0.5, 0.6]] }));

            const vectors = await client.embed(['first', 'second']);

            expect(vectors).toEqual([[0.1, 0.2, 0.3], [0.4, 0.5, 0.6]]);
            expect(fetchSpy).toHaveBeenCalledTimes(1);
            expect(fetchSpy.mock.calls[0]?.[0]).toBe('http://ollama.test:11434/api/embed');
            expect(requestBody(fetchSpy)).toEqual({ model: 'all-minilm', input: ['first', 'second'] });
        });

        it('should not call Ollama for an empty batch', async () => {
            await expect(client.embed([])).resolves.toEqual([]);
            expect(fetchSpy).not.toHaveBeenCalled();
        });

        it('should reject vectors of the wrong dimension', async () => {
            fetchSpy.mockResolvedValue(jsonResponse({ embeddings: [[0.1, 0.2]] }));

            await expect(client.embed(['first'])).rejects.toMatchObject({
                code: OllamaErrorCode.DIMENSION_MISMATCH,
            });
        });

        it('should reject a response with the wrong number of vectors', async () => {
            fetchSpy.mockResolvedValue(jsonResponse({ embeddings: [[0.1, 0.2, 0.3]] }));

            await expect(client.embed(['first', 'second'])).rejects.toThrow('Expected 2 embeddings, received 1');
        });

        it('should reject a malformed response', async () => {
            fetchSpy.mockResolvedValue(jsonResponse({ embedding: [0.1, 0.2, 0.3] }));

            await expect(client.embed(['first'])).rejects.toMatchObject({
                code: OllamaErrorCode.INVALID_RESPONSE,
            });
        });

        it('should report a model that has not been pulled', async () => {
            fetchSpy.mockResolvedValue(jsonResponse({ error: 'model "all-minilm" not found' }, 404));

            await expect(client.embed(['first'])).rejects.toThrow(
                'Model "all-minilm" not found. Please run: ollama pull all-minilm'
            );
        });
    });

    describe('generateCompletion', () => {
        it('should send the prompt, system instruction and options', async () => {
            fetchSpy.mockResolvedValue(jsonResponse({ response: 'Blue.', done: true }));

            const answer = await client.generateCompletion('What colour is the sky?', {
                system: 'Answer briefly.',
                temperature: 0.2,
                maxTokens: 50,
            });

            expect(answer).toBe('Blue.');
            expect(fetchSpy.mock.calls[0]?.[0]).toBe('http://ollama.test:11434/api/generate');
            expect(requestBody(fetchSpy)).toEqual({
                model: 'llama3.2',
                prompt: 'What colour is the sky?',
                system: 'Answer briefly.',
                stream: false,
                options: { temperature: 0.2, num_predict: 50 },
            });
        });

        it('should use the model named in the options', async () => {
            fetchSpy.mockResolvedValue(jsonResponse({ response: 'ok' }));

            await client.generateCompletion('hi', { model: 'mistral' });

            expect(requestBody(fetchSpy)).toMatchObject({ model: 'mistral' });
        });

        it('should surface an API error', async () => {
            fetchSpy.mockResolvedValue(jsonResponse({ error: 'out of memory' }, 500));

            await expect(client.generateCompletion('hi')).rejects.toMatchObject({
                code: OllamaErrorCode.API_ERROR,
                message: 'Ollama API error: out of memory',
                retryable: false,
            });
        });

        it('should mark a refused connection as retryable', async () => {
            fetchSpy.mockRejectedValue(new TypeError('fetch failed'));

            const error: unknown = await client.generateCompletion('hi').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(OllamaError);
            expect(error).toMatchObject({ code: OllamaErrorCode.CONNECTION_REFUSED, retryable: true });
        });

        it('should turn an aborted request into a timeout', async () => {
            const abort = new Error('This operation was aborted');
            abort.name = 'AbortError';
            fetchSpy.mockRejectedValue(abort);

            await expect(client.generateCompletion('hi')).rejects.toMatchObject({
                code: OllamaErrorCode.TIMEOUT,
                retryable: true,
            });
        });
    });

    describe('isAvailable', () => {
        it('should be true when the tags endpoint answers', async () => {
            fetchSpy.mockResolvedValue(jsonResponse({ models: [] }));

            await expect(client.isAvailable()).resolves.toBe(true);
            expect(fetchSpy.mock.calls[0]?.[0]).toBe('http://ollama.test:11434/api/tags');
        });

        it('should be false when Ollama cannot be reached', async () => {
            fetchSpy.mockRejectedValue(new TypeError('fetch failed'));

            await expect(client.isAvailable()).resolves.toBe(false);
        });
    });
});
