/**
 * Data storage modules
 *
 * Persistence layer components:
 * - IndexPersistence: paired index + catalog artifacts on disk
 * - FileDocumentMirror: advisory per-document metadata records
 * - FileQueryAnalytics: JSON Lines log of answered queries
 */

export {
    IndexPersistence,
    createIndexPersistence,
    INDEX_FILE_NAME,
    METADATA_FILE_NAME,
} from './indexPersistence';

export type { IndexPersistenceConfig, LoadResult } from './indexPersistence';

export { FileDocumentMirror, createDocumentMirror } from './documentMirror';

export type { DocumentMirror, FileDocumentMirrorConfig } from './documentMirror';

export { FileQueryAnalytics, createQueryAnalytics } from './queryAnalytics';

export type {
    QueryAnalyticsSink,
    StoredQueryLogEntry,
    FileQueryAnalyticsConfig,
} from './queryAnalytics';
