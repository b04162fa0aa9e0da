/**
 * Ingestion Pipeline
 *
 * Turns an uploaded file into searchable chunks:
 * 1. Extract plain text (empty text ends the ingestion)
 * 2. Split into overlapping chunks (no chunks ends the ingestion)
 * 3. Embed all chunk texts in one batched call
 * 4. Append vectors and catalog records to the knowledge base as one step
 * 5. Save the knowledge base, still under the knowledge base write lock
 * 6. Queue the mirror write, fire-and-forget
 *
 * Steps 1-4 are all-or-nothing. A failed save is logged and the in-memory
 * state stays authoritative; a failed mirror write is logged and ignored.
 * Mirror writes run one at a time, in the order the changes were committed.
 *
 * Removal lives here too: it is the other operation that mutates the
 * knowledge base and then persists and mirrors the change.
 */

import {
    Document,
    FileIngestOutcome,
    IngestFailureCode,
    IngestRequest,
    IngestResult,
} from '../../shared/types';
import { EmbeddingProvider } from '../clients/ollamaClient';
import { DocumentMirror } from '../storage/documentMirror';
import { ChunkingConfig, DocumentChunker } from './documentChunker';
import { UnsupportedFormatError, extractText, isDocumentKind } from './documentParser';
import { CommitHook, KnowledgeBase, KnowledgeBaseSnapshot } from './knowledgeBase';

/**
 * Anything that can durably store a knowledge base snapshot.
 */
export interface SnapshotStore {
    save(snapshot: KnowledgeBaseSnapshot): Promise<boolean>;
}

export interface IngestionPipelineDeps {
    knowledgeBase: KnowledgeBase;
    embedder: EmbeddingProvider;
    store?: SnapshotStore;
    mirror?: DocumentMirror;
    chunking?: Partial<ChunkingConfig>;
}

interface MirrorWrite {
    label: string;
    task: (mirror: DocumentMirror) => Promise<void>;
}

function failure(code: IngestFailureCode, reason: string): IngestResult {
    return { success: false, code, reason };
}

function reasonOf(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export class IngestionPipeline {
    private readonly knowledgeBase: KnowledgeBase;
    private readonly embedder: EmbeddingProvider;
    private readonly store?: SnapshotStore;
    private readonly mirror?: DocumentMirror;
    private readonly chunker: DocumentChunker;
    private mirrorQueue: Promise<void> = Promise.resolve();

    constructor(deps: IngestionPipelineDeps) {
        this.knowledgeBase = deps.knowledgeBase;
        this.embedder = deps.embedder;
        this.store = deps.store;
        this.mirror = deps.mirror;
        this.chunker = new DocumentChunker(deps.chunking);
    }

    /**
     * Ingests one file. Never rejects; failures come back as results with
     * a reason.
     */
    async ingest(request: IngestRequest): Promise<IngestResult> {
        const { filename, kind } = request;

        if (!isDocumentKind(kind)) {
            return failure('UNSUPPORTED_FORMAT', `Unsupported document type: ${kind}`);
        }

        let text: string;
        try {
            text = await extractText(request.blob, kind);
        } catch (error) {
            console.error(`Text extraction failed for ${filename}:`, error);
            if (error instanceof UnsupportedFormatError) {
                return failure('UNSUPPORTED_FORMAT', error.message);
            }
            return failure('EXTRACTION_FAILED', reasonOf(error));
        }

        if (!text.trim()) {
            console.error(`No text extracted from ${filename}`);
            return failure('EMPTY_TEXT', `No text could be extracted from ${filename}`);
        }

        const chunkTexts = this.chunker.chunk(text);
        if (chunkTexts.length === 0) {
            console.error(`No chunks created from ${filename}`);
            return failure('NO_CHUNKS', `No chunks could be created from ${filename}`);
        }

        let document: Document;
        try {
            const vectors = await this.embedder.embed(chunkTexts);
            document = await this.knowledgeBase.append(
                {
                    filename,
                    sourceReference: request.sourceReference ?? filename,
                    department: request.department,
                    subject: request.subject,
                },
                chunkTexts,
                vectors,
                this.afterCommit((added) => ({
                    label: `mirror document ${added.id}`,
                    task: (mirror) => mirror.upsert(added),
                }))
            );
        } catch (error) {
            console.error(`Failed to index ${filename}:`, error);
            return failure('INDEXING_FAILED', reasonOf(error));
        }

        console.log(`Document indexed: ${filename} (${document.chunkCount} chunks)`);
        return { success: true, document };
    }

    /**
     * Ingests files one after another. One file failing does not stop the
     * rest.
     */
    async ingestMany(requests: IngestRequest[]): Promise<FileIngestOutcome[]> {
        const outcomes: FileIngestOutcome[] = [];
        for (const request of requests) {
            outcomes.push({ filename: request.filename, result: await this.ingest(request) });
        }

        const failed = outcomes.filter((o) => !o.result.success).length;
        console.log(`Upload completed: ${outcomes.length - failed} succeeded, ${failed} failed`);
        return outcomes;
    }

    /**
     * Removes a document and rebuilds the index from the surviving chunks.
     *
     * @returns false if the id is unknown or the rebuild failed
     */
    async remove(id: number): Promise<boolean> {
        let removed: Document | undefined;
        try {
            removed = await this.knowledgeBase.remove(
                id,
                this.afterCommit(() => ({
                    label: `remove mirrored document ${id}`,
                    task: (mirror) => mirror.remove(id),
                }))
            );
        } catch (error) {
            console.error(`Failed to remove document ${id}:`, error);
            return false;
        }

        if (!removed) {
            return false;
        }

        console.log(`Document removed: ${removed.filename}`);
        return true;
    }

    /**
     * Waits for outstanding mirror writes.
     */
    async flush(): Promise<void> {
        await this.mirrorQueue;
    }

    /**
     * Commit hook: saves the snapshot, then queues the mirror write.
     * Never rejects; the change is already committed when it runs.
     */
    private afterCommit(mirrorWrite: (document: Document) => MirrorWrite): CommitHook<Document> {
        return async (document, snapshot) => {
            await this.persist(snapshot);
            this.enqueueMirrorWrite(mirrorWrite(document));
        };
    }

    private async persist(snapshot: KnowledgeBaseSnapshot): Promise<void> {
        if (!this.store) {
            return;
        }
        let saved: boolean;
        try {
            saved = await this.store.save(snapshot);
        } catch (error) {
            console.error('Failed to save knowledge base:', error);
            saved = false;
        }
        if (!saved) {
            console.error('Knowledge base not saved; in-memory state remains authoritative');
        }
    }

    private enqueueMirrorWrite({ label, task }: MirrorWrite): void {
        const mirror = this.mirror;
        if (!mirror) {
            return;
        }

        this.mirrorQueue = this.mirrorQueue
            .then(() => task(mirror))
            .catch((error: unknown) => {
                console.error(`Failed to ${label}:`, error);
            });
    }
}

/**
 * Factory function to create an ingestion pipeline.
 */
export function createIngestionPipeline(deps: IngestionPipelineDeps): IngestionPipeline {
    return new IngestionPipeline(deps);
}
