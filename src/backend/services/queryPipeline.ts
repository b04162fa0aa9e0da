/**
 * Query Pipeline
 *
 * Answers a question from the knowledge base:
 * 1. Reject blank questions before any external call
 * 2. Embed the question
 * 3. Retrieve the top-k chunks
 * 4. Assemble a context block that names each chunk's source file
 * 5. Ask the generative model to answer from that context only
 *
 * `answer` always resolves to text. Each outcome other than a model answer
 * has its own fixed response so callers (and tests) can tell them apart.
 */

import { ValidationResult } from '../../shared/types';
import { EmbeddingProvider, GenerativeModel } from '../clients/ollamaClient';
import { QueryAnalyticsSink } from '../storage/queryAnalytics';
import { KnowledgeBase, ScoredChunk } from './knowledgeBase';

export const PROMPT_FOR_INPUT_RESPONSE = 'Please provide a valid question.';

export const NO_RELEVANT_INFORMATION_RESPONSE =
    "I don't have any relevant information to answer your question. " +
    'Please make sure notes have been uploaded and try rephrasing your question.';

export const APOLOGY_RESPONSE =
    'I apologize, but I encountered an error while processing your question. Please try again.';

/**
 * System instruction sent with every generation request.
 */
export const SYSTEM_INSTRUCTION =
    'You are a helpful assistant that answers questions using only the provided context ' +
    'from uploaded notes and documents. If the answer cannot be found in the context, ' +
    'say so clearly instead of guessing. Cite the source file when you use it.';

/**
 * Configuration for the query pipeline.
 */
export interface QueryPipelineConfig {
    /** Number of chunks to retrieve for context */
    topK: number;
    temperature: number;
    maxTokens: number;
}

export const DEFAULT_QUERY_CONFIG: QueryPipelineConfig = {
    topK: 5,
    temperature: 0.7,
    maxTokens: 1000,
};

export interface QueryPipelineDeps {
    knowledgeBase: KnowledgeBase;
    embedder: EmbeddingProvider;
    model: GenerativeModel;
    analytics?: QueryAnalyticsSink;
    config?: Partial<QueryPipelineConfig>;
}

/**
 * Validates a user query before processing.
 */
export function validateQuery(query: string | null | undefined): ValidationResult {
    if (query === null || query === undefined) {
        return {
            valid: false,
            error: 'Query is required',
        };
    }

    if (query.trim().length === 0) {
        return {
            valid: false,
            error: 'Query cannot be empty or contain only whitespace',
        };
    }

    return {
        valid: true,
    };
}

/**
 * Joins retrieved chunks into one context block, keeping their order.
 */
export function assembleContext(matches: ScoredChunk[]): string {
    return matches
        .map(({ chunk }) => `From ${chunk.filename}:\n${chunk.text}`)
        .join('\n\n');
}

/**
 * Builds the user prompt around an assembled context block.
 */
export function buildPrompt(question: string, context: string): string {
    return `Based on the following context from uploaded notes and documents, please answer the question. If the answer cannot be found in the context, say so clearly.

Context:
${context}

Question: ${question}

Answer:`;
}

export class QueryPipeline {
    private readonly knowledgeBase: KnowledgeBase;
    private readonly embedder: EmbeddingProvider;
    private readonly model: GenerativeModel;
    private readonly analytics?: QueryAnalyticsSink;
    private readonly config: QueryPipelineConfig;

    constructor(deps: QueryPipelineDeps) {
        this.knowledgeBase = deps.knowledgeBase;
        this.embedder = deps.embedder;
        this.model = deps.model;
        this.analytics = deps.analytics;
        this.config = { ...DEFAULT_QUERY_CONFIG, ...deps.config };
    }

    /**
     * Answers a question. Never rejects.
     */
    async answer(question: string): Promise<string> {
        if (!validateQuery(question).valid) {
            return PROMPT_FOR_INPUT_RESPONSE;
        }

        let answer: string;
        let chunksUsed: number;
        try {
            const matches = await this.retrieve(question);
            if (matches.length === 0) {
                return NO_RELEVANT_INFORMATION_RESPONSE;
            }

            const prompt = buildPrompt(question, assembleContext(matches));
            answer = await this.model.generateCompletion(prompt, {
                system: SYSTEM_INSTRUCTION,
                temperature: this.config.temperature,
                maxTokens: this.config.maxTokens,
            });
            chunksUsed = matches.length;
        } catch (error) {
            console.error('Error processing query:', error);
            return APOLOGY_RESPONSE;
        }

        await this.recordQuery(question, chunksUsed);
        return answer;
    }

    /**
     * The top-k chunks for a question, highest score first.
     */
    async retrieve(question: string): Promise<ScoredChunk[]> {
        const [queryVector] = await this.embedder.embed([question]);
        if (!queryVector) {
            throw new Error('Embedding provider returned no vector for the query');
        }
        return this.knowledgeBase.search(queryVector, this.config.topK);
    }

    private async recordQuery(query: string, chunksUsed: number): Promise<void> {
        if (!this.analytics) {
            return;
        }

        try {
            await this.analytics.record({
                query,
                timestamp: new Date(),
                chunksUsed,
                totalDocuments: this.knowledgeBase.stats().documents,
            });
        } catch (error) {
            console.error('Error logging query:', error);
        }
    }
}

/**
 * Factory function to create a query pipeline.
 */
export function createQueryPipeline(deps: QueryPipelineDeps): QueryPipeline {
    return new QueryPipeline(deps);
}
