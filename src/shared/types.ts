/**
 * Shared type definitions for the Document QA Engine
 *
 * These types define the contract between the engine core and its host.
 * They're organized by domain:
 * - Documents: Knowledge base content and its chunks
 * - Ingestion: Results reported back per uploaded file
 * - Query: Analytics records for answered questions
 * - API: Request/response shapes of the HTTP host
 */

// ============================================================================
// Document Types
// ============================================================================

/**
 * Supported document formats for the knowledge base.
 * Each format requires a specific extractor implementation.
 */
export type DocumentKind = 'text' | 'pdf';

/**
 * A document in the knowledge base.
 *
 * `id` comes from a counter that only increases; it is never reused after a
 * removal and says nothing about the document's position in the catalog.
 */
export interface Document {
    id: number;
    filename: string;
    sourceReference: string;
    uploadedAt: Date;
    chunkCount: number;
    department?: string;
    subject?: string;
}

/**
 * A chunk of a document, the unit of retrieval.
 * Chunk i of the catalog corresponds to vector i of the index.
 */
export interface Chunk {
    docId: number;
    chunkId: number;
    text: string;
    filename: string;
    chunkIndex: number;
}

/**
 * Row shown by document listings.
 */
export interface DocumentSummary {
    id: number;
    filename: string;
    uploadedAt: Date;
    chunkCount: number;
}

// ============================================================================
// Ingestion Types
// ============================================================================

/**
 * Why an ingestion attempt failed.
 */
export type IngestFailureCode =
    | 'UNSUPPORTED_FORMAT'
    | 'EXTRACTION_FAILED'
    | 'EMPTY_TEXT'
    | 'NO_CHUNKS'
    | 'INDEXING_FAILED';

export type IngestResult =
    | { success: true; document: Document }
    | { success: false; code: IngestFailureCode; reason: string };

/**
 * A single file handed to the engine by its host.
 */
export interface IngestRequest {
    blob: Buffer | string;
    filename: string;
    /** Declared kind; anything other than a DocumentKind is rejected */
    kind: string;
    /** Path or blob handle of the stored original (defaults to the filename) */
    sourceReference?: string;
    department?: string;
    subject?: string;
}

/**
 * Per-file outcome of a batch upload.
 */
export interface FileIngestOutcome {
    filename: string;
    result: IngestResult;
}

// ============================================================================
// Query Types
// ============================================================================

/**
 * One answered query, as recorded by the analytics sink.
 */
export interface QueryLogEntry {
    query: string;
    timestamp: Date;
    chunksUsed: number;
    totalDocuments: number;
}

/**
 * Options for text generation.
 */
export interface GenerationOptions {
    model?: string;
    system?: string;
    temperature?: number;
    maxTokens?: number;
}

// ============================================================================
// Persistence Types (JSON serialization)
// ============================================================================

/**
 * Document format for JSON persistence.
 * Dates are stored as ISO strings.
 */
export interface StoredDocument {
    id: number;
    filename: string;
    sourceReference: string;
    uploadedAt: string; // ISO date
    chunkCount: number;
    department?: string;
    subject?: string;
}

// ============================================================================
// API Types
// ============================================================================

/**
 * Request body for POST /api/query
 */
export interface QueryRequest {
    query?: string;
}

/**
 * Response body for POST /api/query
 */
export interface QueryResponse {
    response: string;
}

/**
 * Response body for GET /api/health
 */
export interface HealthResponse {
    status: 'ok' | 'error';
    ollama: boolean;
    documents: number;
    chunks: number;
}

/**
 * Response body for POST /api/documents
 */
export interface DocumentUploadResponse {
    success: boolean;
    uploaded: Array<{ filename: string; documentId: number; chunkCount: number; department: string; subject: string }>;
    failed: Array<{ filename: string; error: string }>;
}

/**
 * Result of validating user input
 */
export interface ValidationResult {
    valid: boolean;
    error?: string;
}
