/**
 * Index Persistence
 *
 * Saves and loads the knowledge base as two paired JSON artifacts:
 * - vector-index.json: every vector, as base64 little-endian float32
 * - documents.json: the document and chunk lists plus the id counters
 *
 * The pair is one logical unit. There is no two-file commit: each file is
 * written through its own uniquely named temp file and renamed, and a torn
 * pair is only noticed on the next load. Callers serialize saves; the
 * knowledge base does so by saving under its write lock.
 *
 * Load prefers availability over durability. A missing, unreadable or
 * inconsistent pair is discarded with a warning and the engine starts
 * empty. The one exception is an index built for another embedding model
 * or dimension, which throws IndexCompatibilityError.
 */

import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { DocumentCatalog } from '../services/documentCatalog';
import {
    KnowledgeBase,
    KnowledgeBaseSnapshot,
    KnowledgeBaseState,
    assertAligned,
} from '../services/knowledgeBase';
import { FlatInnerProductIndex, IndexCompatibilityError } from '../services/vectorStore';

export const INDEX_FILE_NAME = 'vector-index.json';
export const METADATA_FILE_NAME = 'documents.json';
const FORMAT_VERSION = 1;

/**
 * Configuration for index persistence.
 */
export interface IndexPersistenceConfig {
    /** Directory holding both artifacts */
    dataDir: string;
    /** Embedding model the stored vectors must come from */
    embeddingModel: string;
    /** Dimension the stored vectors must have */
    embeddingDimension: number;
}

const indexArtifactSchema = z.object({
    version: z.literal(FORMAT_VERSION),
    model: z.string(),
    dimension: z.number().int().positive(),
    count: z.number().int().nonnegative(),
    vectors: z.string(),
    savedAt: z.string().optional(),
});

const storedDocumentSchema = z.object({
    id: z.number().int().nonnegative(),
    filename: z.string(),
    sourceReference: z.string(),
    uploadedAt: z.string().datetime(),
    chunkCount: z.number().int().nonnegative(),
    department: z.string().optional(),
    subject: z.string().optional(),
});

const chunkSchema = z.object({
    docId: z.number().int().nonnegative(),
    chunkId: z.number().int().nonnegative(),
    text: z.string(),
    filename: z.string(),
    chunkIndex: z.number().int().nonnegative(),
});

const metadataArtifactSchema = z.object({
    version: z.literal(FORMAT_VERSION),
    nextDocumentId: z.number().int().nonnegative(),
    nextChunkId: z.number().int().nonnegative(),
    documents: z.array(storedDocumentSchema),
    chunks: z.array(chunkSchema),
    savedAt: z.string().optional(),
});

type IndexArtifact = z.infer<typeof indexArtifactSchema>;
type MetadataArtifact = z.infer<typeof metadataArtifactSchema>;

/**
 * Outcome of a load. `restored` is false whenever the engine starts empty,
 * including the fallback after a bad pair.
 */
export interface LoadResult {
    state: KnowledgeBaseState;
    restored: boolean;
}

export class IndexPersistence {
    private readonly config: IndexPersistenceConfig;

    constructor(config: IndexPersistenceConfig) {
        this.config = config;
    }

    get indexPath(): string {
        return path.join(this.config.dataDir, INDEX_FILE_NAME);
    }

    get metadataPath(): string {
        return path.join(this.config.dataDir, METADATA_FILE_NAME);
    }

    /**
     * Writes both artifacts.
     *
     * @returns false if either write failed; the error is logged and the
     * caller's in-memory state stays authoritative
     */
    async save(snapshot: KnowledgeBaseSnapshot): Promise<boolean> {
        const savedAt = new Date().toISOString();
        const indexArtifact: IndexArtifact = {
            version: FORMAT_VERSION,
            model: this.config.embeddingModel,
            ...snapshot.index,
            savedAt,
        };
        const metadataArtifact: MetadataArtifact = {
            version: FORMAT_VERSION,
            ...snapshot.catalog,
            savedAt,
        };

        try {
            await fs.promises.mkdir(this.config.dataDir, { recursive: true });
            await this.writeAtomic(this.indexPath, JSON.stringify(indexArtifact));
            await this.writeAtomic(this.metadataPath, JSON.stringify(metadataArtifact, null, 2));
            return true;
        } catch (error) {
            console.error(`Failed to save knowledge base to ${this.config.dataDir}:`, error);
            return false;
        }
    }

    /**
     * Restores the index and catalog, or returns an empty state.
     *
     * @throws IndexCompatibilityError if the stored index was built with a
     * different embedding model or dimension
     */
    async load(): Promise<LoadResult> {
        const empty = (): LoadResult => ({
            state: KnowledgeBase.emptyState(this.config.embeddingDimension),
            restored: false,
        });

        const hasIndex = fs.existsSync(this.indexPath);
        const hasMetadata = fs.existsSync(this.metadataPath);

        if (!hasIndex && !hasMetadata) {
            console.log(`No saved knowledge base in ${this.config.dataDir}, starting empty`);
            return empty();
        }
        if (!hasIndex || !hasMetadata) {
            const missing = hasIndex ? METADATA_FILE_NAME : INDEX_FILE_NAME;
            console.warn(
                `Saved knowledge base is incomplete (${missing} missing); discarding it and starting empty`
            );
            return empty();
        }

        let indexArtifact: IndexArtifact;
        let metadataArtifact: MetadataArtifact;
        try {
            indexArtifact = indexArtifactSchema.parse(await this.readJson(this.indexPath));
            metadataArtifact = metadataArtifactSchema.parse(await this.readJson(this.metadataPath));
        } catch (error) {
            console.warn('Saved knowledge base is unreadable; discarding it and starting empty:', error);
            return empty();
        }

        this.assertCompatible(indexArtifact);

        try {
            const state: KnowledgeBaseState = {
                index: FlatInnerProductIndex.deserialize(indexArtifact),
                catalog: DocumentCatalog.fromSnapshot(metadataArtifact),
            };
            assertAligned(state, this.config.embeddingDimension);
            console.log(
                `Loaded knowledge base: ${state.catalog.documentCount()} documents, ${state.index.size()} vectors`
            );
            return { state, restored: true };
        } catch (error) {
            console.warn('Saved knowledge base is inconsistent; discarding it and starting empty:', error);
            return empty();
        }
    }

    private assertCompatible(artifact: IndexArtifact): void {
        if (artifact.dimension !== this.config.embeddingDimension) {
            throw new IndexCompatibilityError(
                `Saved index at ${this.indexPath} holds ${artifact.dimension}-dimensional vectors, ` +
                    `configured embedding dimension is ${this.config.embeddingDimension}`
            );
        }
        if (artifact.model !== this.config.embeddingModel) {
            throw new IndexCompatibilityError(
                `Saved index at ${this.indexPath} was built with model "${artifact.model}", ` +
                    `configured embedding model is "${this.config.embeddingModel}"`
            );
        }
    }

    private async readJson(filePath: string): Promise<unknown> {
        const raw = await fs.promises.readFile(filePath, 'utf-8');
        return JSON.parse(raw);
    }

    private async writeAtomic(filePath: string, contents: string): Promise<void> {
        const tempPath = `${filePath}.${uuidv4()}.tmp`;
        await fs.promises.writeFile(tempPath, contents);
        await fs.promises.rename(tempPath, filePath);
    }
}

/**
 * Factory function to create an IndexPersistence instance.
 */
export function createIndexPersistence(config: IndexPersistenceConfig): IndexPersistence {
    return new IndexPersistence(config);
}
