/**
 * Document Catalog
 *
 * In-memory registry of documents and their chunks. The chunk list is kept
 * in the same order as the vectors of the index it is paired with: chunk i
 * was embedded into vector i. The catalog never touches the index itself;
 * the KnowledgeBase performs the matching index operation.
 *
 * Document ids come from a counter that only moves forward, so an id held by
 * an external system keeps pointing at the same document (or at nothing)
 * after removals. Positions are looked up through a separate table.
 */

import {
    Chunk,
    Document,
    DocumentSummary,
    StoredDocument,
} from '../../shared/types';

/**
 * Fields of a new document supplied by the ingestion pipeline.
 */
export interface NewDocument {
    filename: string;
    sourceReference: string;
    uploadedAt?: Date;
    department?: string;
    subject?: string;
}

/**
 * Plain-JSON form of the catalog, as written to the metadata artifact.
 */
export interface CatalogSnapshot {
    nextDocumentId: number;
    nextChunkId: number;
    documents: StoredDocument[];
    chunks: Chunk[];
}

export class DocumentCatalog {
    private documents: Document[] = [];
    private chunks: Chunk[] = [];
    private positions = new Map<number, number>();
    private nextDocumentId = 0;
    private nextChunkId = 0;

    /**
     * Registers a document and one chunk per text, in order.
     * `chunkCount` is set from the number of texts.
     */
    append(input: NewDocument, chunkTexts: string[]): { document: Document; chunks: Chunk[] } {
        const document: Document = {
            id: this.nextDocumentId,
            filename: input.filename,
            sourceReference: input.sourceReference,
            uploadedAt: input.uploadedAt ?? new Date(),
            chunkCount: chunkTexts.length,
            department: input.department,
            subject: input.subject,
        };

        const chunks: Chunk[] = chunkTexts.map((text, chunkIndex) => ({
            docId: document.id,
            chunkId: this.nextChunkId + chunkIndex,
            text,
            filename: document.filename,
            chunkIndex,
        }));

        this.nextDocumentId += 1;
        this.nextChunkId += chunks.length;
        this.positions.set(document.id, this.documents.length);
        this.documents.push(document);
        this.chunks.push(...chunks);

        return { document, chunks };
    }

    get(id: number): Document | undefined {
        const position = this.positions.get(id);
        return position === undefined ? undefined : this.documents[position];
    }

    has(id: number): boolean {
        return this.positions.has(id);
    }

    /**
     * Documents in insertion order.
     */
    listDocuments(): readonly Document[] {
        return this.documents;
    }

    list(): DocumentSummary[] {
        return this.documents.map((doc) => ({
            id: doc.id,
            filename: doc.filename,
            uploadedAt: doc.uploadedAt,
            chunkCount: doc.chunkCount,
        }));
    }

    listChunks(): readonly Chunk[] {
        return this.chunks;
    }

    chunkAt(position: number): Chunk | undefined {
        return this.chunks[position];
    }

    chunkTexts(): string[] {
        return this.chunks.map((chunk) => chunk.text);
    }

    documentCount(): number {
        return this.documents.length;
    }

    chunkCount(): number {
        return this.chunks.length;
    }

    /**
     * A copy of this catalog without the given document and its chunks.
     * Surviving chunks keep their relative order; the id counters are kept.
     * Returns undefined when the id is unknown.
     */
    without(id: number): DocumentCatalog | undefined {
        if (!this.has(id)) {
            return undefined;
        }

        const next = new DocumentCatalog();
        next.documents = this.documents.filter((doc) => doc.id !== id);
        next.chunks = this.chunks.filter((chunk) => chunk.docId !== id);
        next.nextDocumentId = this.nextDocumentId;
        next.nextChunkId = this.nextChunkId;
        next.reindexPositions();
        return next;
    }

    snapshot(): CatalogSnapshot {
        return {
            nextDocumentId: this.nextDocumentId,
            nextChunkId: this.nextChunkId,
            documents: this.documents.map((doc) => ({
                id: doc.id,
                filename: doc.filename,
                sourceReference: doc.sourceReference,
                uploadedAt: doc.uploadedAt.toISOString(),
                chunkCount: doc.chunkCount,
                department: doc.department,
                subject: doc.subject,
            })),
            chunks: this.chunks.map((chunk) => ({ ...chunk })),
        };
    }

    /**
     * Restores a catalog from its snapshot.
     *
     * @throws Error when the snapshot breaks a catalog invariant (duplicate
     * ids, a chunk without its document, a chunkCount that disagrees with
     * the chunks, or counters behind the stored ids)
     */
    static fromSnapshot(snapshot: CatalogSnapshot): DocumentCatalog {
        const catalog = new DocumentCatalog();
        catalog.documents = snapshot.documents.map((stored) => ({
            id: stored.id,
            filename: stored.filename,
            sourceReference: stored.sourceReference,
            uploadedAt: new Date(stored.uploadedAt),
            chunkCount: stored.chunkCount,
            department: stored.department,
            subject: stored.subject,
        }));
        catalog.chunks = snapshot.chunks.map((chunk) => ({ ...chunk }));
        catalog.nextDocumentId = snapshot.nextDocumentId;
        catalog.nextChunkId = snapshot.nextChunkId;
        catalog.reindexPositions();
        catalog.assertConsistent();
        return catalog;
    }

    private reindexPositions(): void {
        this.positions = new Map(this.documents.map((doc, position) => [doc.id, position]));
    }

    private assertConsistent(): void {
        if (this.positions.size !== this.documents.length) {
            throw new Error('Catalog contains duplicate document ids');
        }

        const counts = new Map<number, number>();
        for (const chunk of this.chunks) {
            if (!this.positions.has(chunk.docId)) {
                throw new Error(`Chunk ${chunk.chunkId} refers to unknown document ${chunk.docId}`);
            }
            if (chunk.chunkId >= this.nextChunkId) {
                throw new Error(`Chunk id ${chunk.chunkId} is not below the next chunk id ${this.nextChunkId}`);
            }
            counts.set(chunk.docId, (counts.get(chunk.docId) ?? 0) + 1);
        }

        for (const doc of this.documents) {
            if (doc.id >= this.nextDocumentId) {
                throw new Error(`Document id ${doc.id} is not below the next document id ${this.nextDocumentId}`);
            }
            const actual = counts.get(doc.id) ?? 0;
            if (actual !== doc.chunkCount) {
                throw new Error(
                    `Document ${doc.id} records ${doc.chunkCount} chunks but ${actual} are stored`
                );
            }
        }
    }
}

/**
 * Factory function to create an empty catalog.
 */
export function createDocumentCatalog(): DocumentCatalog {
    return new DocumentCatalog();
}
