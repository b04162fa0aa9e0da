/**
 * Document Mirror
 *
 * Advisory copy of document metadata for systems outside the engine
 * (dashboards, admin listings). The knowledge base stays the source of
 * truth: the ingestion pipeline writes here fire-and-forget and a failed
 * write never undoes an ingestion.
 *
 * FileDocumentMirror keeps one JSON file per document id.
 */

import * as fs from 'fs';
import * as path from 'path';
import { Document, StoredDocument } from '../../shared/types';

/**
 * Interface for the metadata mirror.
 */
export interface DocumentMirror {
    upsert(document: Document): Promise<void>;
    remove(id: number): Promise<void>;
}

/**
 * Configuration for the file-backed mirror.
 */
export interface FileDocumentMirrorConfig {
    /** Directory path where document records are stored */
    storagePath: string;
}

const DEFAULT_STORAGE_PATH = path.join(process.cwd(), 'data', 'documents');

export class FileDocumentMirror implements DocumentMirror {
    private readonly storagePath: string;

    constructor(config?: Partial<FileDocumentMirrorConfig>) {
        this.storagePath = config?.storagePath || DEFAULT_STORAGE_PATH;
    }

    /**
     * Writes the document record, replacing any earlier one.
     */
    async upsert(document: Document): Promise<void> {
        await fs.promises.mkdir(this.storagePath, { recursive: true });

        const filePath = this.getDocumentFilePath(document.id);
        const tempPath = `${filePath}.tmp`;
        await fs.promises.writeFile(tempPath, JSON.stringify(this.serializeDocument(document), null, 2));
        await fs.promises.rename(tempPath, filePath);
    }

    /**
     * Deletes the document record; a missing record is not an error.
     */
    async remove(id: number): Promise<void> {
        await fs.promises.rm(this.getDocumentFilePath(id), { force: true });
    }

    /**
     * Reads a mirrored record back, or null if there is none.
     */
    async get(id: number): Promise<StoredDocument | null> {
        const filePath = this.getDocumentFilePath(id);
        if (!fs.existsSync(filePath)) {
            return null;
        }
        const stored: StoredDocument = JSON.parse(await fs.promises.readFile(filePath, 'utf-8'));
        return stored;
    }

    getStoragePath(): string {
        return this.storagePath;
    }

    private getDocumentFilePath(id: number): string {
        return path.join(this.storagePath, `${id}.json`);
    }

    private serializeDocument(document: Document): StoredDocument {
        return {
            id: document.id,
            filename: document.filename,
            sourceReference: document.sourceReference,
            uploadedAt: document.uploadedAt.toISOString(),
            chunkCount: document.chunkCount,
            department: document.department,
            subject: document.subject,
        };
    }
}

/**
 * Factory function to create a FileDocumentMirror.
 */
export function createDocumentMirror(
    config?: Partial<FileDocumentMirrorConfig>
): FileDocumentMirror {
    return new FileDocumentMirror(config);
}
