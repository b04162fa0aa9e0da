/**
 * Backend services
 *
 * Core components of the engine:
 * - DocumentParser / DocumentChunker: text extraction and chunking
 * - VectorIndex / DocumentCatalog / KnowledgeBase: the aligned index and catalog
 * - IngestionPipeline / QueryPipeline: the two data flows
 * - DocumentQaEngine: the host-facing entry points
 */

export {
    PlainTextParser,
    PdfParser,
    UnsupportedFormatError,
    getParser,
    parseDocument,
    extractText,
    isDocumentKind,
    detectDocumentKind,
} from './documentParser';

export type { ParseResult, DocumentParser } from './documentParser';

export {
    DocumentChunker,
    ChunkingConfigError,
    createDocumentChunker,
    computeWindows,
    splitIntoChunks,
    validateChunkingConfig,
    DEFAULT_CHUNKING_CONFIG,
} from './documentChunker';

export type { ChunkingConfig, ChunkWindow } from './documentChunker';

export {
    FlatInnerProductIndex,
    DimensionMismatchError,
    IndexCompatibilityError,
    createVectorIndex,
    innerProduct,
} from './vectorStore';

export type { VectorIndex, SearchResult, SerializedVectorIndex } from './vectorStore';

export { DocumentCatalog, createDocumentCatalog } from './documentCatalog';

export type { NewDocument, CatalogSnapshot } from './documentCatalog';

export { KnowledgeBase, assertAligned } from './knowledgeBase';

export type {
    KnowledgeBaseState,
    KnowledgeBaseSnapshot,
    KnowledgeBaseStats,
    ScoredChunk,
} from './knowledgeBase';

export { ReadWriteLock } from './readWriteLock';

export { IngestionPipeline, createIngestionPipeline } from './ingestionPipeline';

export type { IngestionPipelineDeps, SnapshotStore } from './ingestionPipeline';

export {
    QueryPipeline,
    createQueryPipeline,
    validateQuery,
    assembleContext,
    buildPrompt,
    PROMPT_FOR_INPUT_RESPONSE,
    NO_RELEVANT_INFORMATION_RESPONSE,
    APOLOGY_RESPONSE,
    SYSTEM_INSTRUCTION,
    DEFAULT_QUERY_CONFIG,
} from './queryPipeline';

export type { QueryPipelineConfig, QueryPipelineDeps } from './queryPipeline';

export { DocumentQaEngine, createDocumentQaEngine } from './documentQaEngine';

export type { DocumentQaEngineDeps } from './documentQaEngine';
