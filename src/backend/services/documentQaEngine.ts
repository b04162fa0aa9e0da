/**
 * Document QA Engine
 *
 * The entry points a host application calls:
 * - ingestDocument: add a file to the knowledge base
 * - answerQuery: answer a question from it
 * - listDocuments / removeDocument: manage what it holds
 *
 * The engine owns one KnowledgeBase and hands it to both pipelines, so all
 * reads and writes go through the same lock.
 */

import {
    DocumentSummary,
    FileIngestOutcome,
    IngestRequest,
    IngestResult,
} from '../../shared/types';
import { EmbeddingProvider, GenerativeModel } from '../clients/ollamaClient';
import { DocumentMirror } from '../storage/documentMirror';
import { IndexPersistence } from '../storage/indexPersistence';
import { QueryAnalyticsSink } from '../storage/queryAnalytics';
import { ChunkingConfig } from './documentChunker';
import { IngestionPipeline } from './ingestionPipeline';
import { KnowledgeBase, KnowledgeBaseStats } from './knowledgeBase';
import { QueryPipeline, QueryPipelineConfig } from './queryPipeline';

export interface DocumentQaEngineDeps {
    embedder: EmbeddingProvider;
    model: GenerativeModel;
    persistence?: IndexPersistence;
    mirror?: DocumentMirror;
    analytics?: QueryAnalyticsSink;
    chunking?: Partial<ChunkingConfig>;
    query?: Partial<QueryPipelineConfig>;
}

export class DocumentQaEngine {
    private readonly knowledgeBase: KnowledgeBase;
    private readonly persistence?: IndexPersistence;
    private readonly ingestion: IngestionPipeline;
    private readonly queries: QueryPipeline;

    constructor(deps: DocumentQaEngineDeps) {
        this.knowledgeBase = new KnowledgeBase(deps.embedder);
        this.persistence = deps.persistence;
        this.ingestion = new IngestionPipeline({
            knowledgeBase: this.knowledgeBase,
            embedder: deps.embedder,
            store: deps.persistence,
            mirror: deps.mirror,
            chunking: deps.chunking,
        });
        this.queries = new QueryPipeline({
            knowledgeBase: this.knowledgeBase,
            embedder: deps.embedder,
            model: deps.model,
            analytics: deps.analytics,
            config: deps.query,
        });
    }

    /**
     * Loads saved state, if any. Call once before serving requests.
     *
     * @returns whether saved state was restored
     * @throws IndexCompatibilityError if the saved index does not match the
     * configured embedding model
     */
    async initialize(): Promise<boolean> {
        if (!this.persistence) {
            return false;
        }
        const { state, restored } = await this.persistence.load();
        await this.knowledgeBase.replace(state);
        return restored;
    }

    async ingestDocument(
        blob: Buffer | string,
        filename: string,
        kind: string,
        department?: string,
        subject?: string
    ): Promise<boolean> {
        const result = await this.ingestDocumentDetailed({ blob, filename, kind, department, subject });
        return result.success;
    }

    ingestDocumentDetailed(request: IngestRequest): Promise<IngestResult> {
        return this.ingestion.ingest(request);
    }

    ingestDocuments(requests: IngestRequest[]): Promise<FileIngestOutcome[]> {
        return this.ingestion.ingestMany(requests);
    }

    answerQuery(text: string): Promise<string> {
        return this.queries.answer(text);
    }

    listDocuments(): DocumentSummary[] {
        return this.knowledgeBase.listDocuments();
    }

    removeDocument(id: number): Promise<boolean> {
        return this.ingestion.remove(id);
    }

    stats(): KnowledgeBaseStats {
        return this.knowledgeBase.stats();
    }

    /**
     * The owned knowledge base, for inspection.
     */
    getKnowledgeBase(): KnowledgeBase {
        return this.knowledgeBase;
    }

    /**
     * Waits for background mirror writes to finish.
     */
    flush(): Promise<void> {
        return this.ingestion.flush();
    }
}

/**
 * Factory function to create an engine.
 */
export function createDocumentQaEngine(deps: DocumentQaEngineDeps): DocumentQaEngine {
    return new DocumentQaEngine(deps);
}
