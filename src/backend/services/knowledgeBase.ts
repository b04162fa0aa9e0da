/**
 * Knowledge Base
 *
 * The single owner of the vector index and the document catalog. Both
 * pipelines reach them only through this class, which keeps the two aligned:
 * after every operation, chunk i of the catalog is the text vector i of the
 * index was embedded from.
 *
 * Access discipline:
 * - append, remove and replace take the write lock (one at a time, and never
 *   while a search runs)
 * - search takes the read lock (searches run alongside each other)
 *
 * append and remove accept a commit hook that runs under the same write
 * lock, right after the change. Saves done from the hook therefore happen
 * in mutation order and always see the state they follow.
 */

import { Chunk, Document, DocumentSummary } from '../../shared/types';
import { EmbeddingProvider } from '../clients/ollamaClient';
import { CatalogSnapshot, DocumentCatalog, NewDocument } from './documentCatalog';
import { ReadWriteLock } from './readWriteLock';
import {
    IndexCompatibilityError,
    SerializedVectorIndex,
    VectorIndex,
    createVectorIndex,
} from './vectorStore';

/**
 * An index and the catalog it is aligned with.
 */
export interface KnowledgeBaseState {
    index: VectorIndex;
    catalog: DocumentCatalog;
}

/**
 * Serializable copy of a KnowledgeBaseState, taken in a single tick.
 */
export interface KnowledgeBaseSnapshot {
    index: SerializedVectorIndex;
    catalog: CatalogSnapshot;
}

/**
 * A retrieved chunk and its similarity score.
 */
export interface ScoredChunk {
    chunk: Chunk;
    score: number;
}

/**
 * Runs after a mutation, before the write lock is released.
 */
export type CommitHook<T> = (result: T, snapshot: KnowledgeBaseSnapshot) => Promise<void>;

export interface KnowledgeBaseStats {
    documents: number;
    chunks: number;
    vectors: number;
}

/**
 * Throws unless the index and catalog hold the same number of entries and
 * the index dimension matches the expected one.
 */
export function assertAligned(state: KnowledgeBaseState, dimension: number): void {
    if (state.index.dimension !== dimension) {
        throw new IndexCompatibilityError(
            `Index holds ${state.index.dimension}-dimensional vectors, embedding model produces ${dimension}`
        );
    }
    if (state.index.size() !== state.catalog.chunkCount()) {
        throw new Error(
            `Index holds ${state.index.size()} vectors for ${state.catalog.chunkCount()} chunks`
        );
    }
}

function assertVectorCount(vectors: number[][], chunkCount: number): void {
    if (vectors.length !== chunkCount) {
        throw new Error(`Got ${vectors.length} vectors for ${chunkCount} chunks`);
    }
}

export class KnowledgeBase {
    private readonly embedder: EmbeddingProvider;
    private readonly lock = new ReadWriteLock();
    private index: VectorIndex;
    private catalog: DocumentCatalog;

    constructor(embedder: EmbeddingProvider, state?: KnowledgeBaseState) {
        this.embedder = embedder;
        const initial = state ?? KnowledgeBase.emptyState(embedder.dimension);
        assertAligned(initial, embedder.dimension);
        this.index = initial.index;
        this.catalog = initial.catalog;
    }

    static emptyState(dimension: number): KnowledgeBaseState {
        return {
            index: createVectorIndex(dimension),
            catalog: new DocumentCatalog(),
        };
    }

    get dimension(): number {
        return this.index.dimension;
    }

    /**
     * Adds a document with its chunk texts and their vectors.
     *
     * The vectors are checked against the index before anything changes, so
     * either both index and catalog gain the document or neither does.
     */
    async append(
        input: NewDocument,
        chunkTexts: string[],
        vectors: number[][],
        onCommit?: CommitHook<Document>
    ): Promise<Document> {
        assertVectorCount(vectors, chunkTexts.length);

        return this.lock.withWrite(async () => {
            this.index.add(vectors);
            const { document } = this.catalog.append(input, chunkTexts);
            await onCommit?.(document, this.snapshot());
            return document;
        });
    }

    /**
     * Removes a document and its chunks, then rebuilds the index by
     * re-embedding every surviving chunk in order.
     *
     * The new catalog and index replace the old ones together once the
     * rebuild succeeds; if embedding fails nothing changes.
     *
     * @returns the removed document, or undefined if the id is unknown
     */
    async remove(id: number, onCommit?: CommitHook<Document>): Promise<Document | undefined> {
        return this.lock.withWrite(async () => {
            const removed = this.catalog.get(id);
            const nextCatalog = this.catalog.without(id);
            if (!removed || !nextCatalog) {
                return undefined;
            }

            const vectors = await this.embedder.embed(nextCatalog.chunkTexts());
            assertVectorCount(vectors, nextCatalog.chunkCount());
            const nextIndex = createVectorIndex(this.index.dimension);
            nextIndex.add(vectors);

            this.catalog = nextCatalog;
            this.index = nextIndex;
            await onCommit?.(removed, this.snapshot());
            return removed;
        });
    }

    /**
     * Swaps in a whole new state, e.g. one loaded from disk.
     */
    async replace(state: KnowledgeBaseState): Promise<void> {
        assertAligned(state, this.embedder.dimension);
        await this.lock.withWrite(() => {
            this.index = state.index;
            this.catalog = state.catalog;
        });
    }

    /**
     * Top-k chunks for a query vector, highest score first.
     */
    async search(queryVector: number[], k: number): Promise<ScoredChunk[]> {
        return this.lock.withRead(() => {
            const matches: ScoredChunk[] = [];
            for (const { position, score } of this.index.search(queryVector, k)) {
                const chunk = this.catalog.chunkAt(position);
                if (chunk) {
                    matches.push({ chunk, score });
                }
            }
            return matches;
        });
    }

    snapshot(): KnowledgeBaseSnapshot {
        return {
            index: this.index.serialize(),
            catalog: this.catalog.snapshot(),
        };
    }

    getDocument(id: number): Document | undefined {
        return this.catalog.get(id);
    }

    listDocuments(): DocumentSummary[] {
        return this.catalog.list();
    }

    listChunks(): readonly Chunk[] {
        return this.catalog.listChunks();
    }

    vectorAt(position: number): number[] | undefined {
        return this.index.vectorAt(position);
    }

    stats(): KnowledgeBaseStats {
        return {
            documents: this.catalog.documentCount(),
            chunks: this.catalog.chunkCount(),
            vectors: this.index.size(),
        };
    }
}
