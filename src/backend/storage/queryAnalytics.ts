/**
 * Query Analytics
 *
 * Records every answered query as one JSON line. Like the document mirror,
 * this is a side channel: the query pipeline ignores its failures.
 */

import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { QueryLogEntry } from '../../shared/types';

/**
 * Sink for query records.
 */
export interface QueryAnalyticsSink {
    record(entry: QueryLogEntry): Promise<void>;
}

/**
 * A query record as stored on disk.
 */
export interface StoredQueryLogEntry {
    id: string;
    query: string;
    timestamp: string; // ISO date
    chunksUsed: number;
    totalDocuments: number;
}

export interface FileQueryAnalyticsConfig {
    /** JSON Lines file the records are appended to */
    logPath: string;
}

const DEFAULT_LOG_PATH = path.join(process.cwd(), 'data', 'query-log.jsonl');

export class FileQueryAnalytics implements QueryAnalyticsSink {
    private readonly logPath: string;

    constructor(config?: Partial<FileQueryAnalyticsConfig>) {
        this.logPath = config?.logPath || DEFAULT_LOG_PATH;
    }

    async record(entry: QueryLogEntry): Promise<void> {
        const stored: StoredQueryLogEntry = {
            id: uuidv4(),
            query: entry.query,
            timestamp: entry.timestamp.toISOString(),
            chunksUsed: entry.chunksUsed,
            totalDocuments: entry.totalDocuments,
        };

        await fs.promises.mkdir(path.dirname(this.logPath), { recursive: true });
        await fs.promises.appendFile(this.logPath, `${JSON.stringify(stored)}\n`);
    }

    /**
     * All records in the order they were written.
     */
    async readAll(): Promise<StoredQueryLogEntry[]> {
        if (!fs.existsSync(this.logPath)) {
            return [];
        }

        const contents = await fs.promises.readFile(this.logPath, 'utf-8');
        return contents
            .split('\n')
            .filter((line) => line.trim())
            .map((line): StoredQueryLogEntry => JSON.parse(line));
    }
}

/**
 * Factory function to create a FileQueryAnalytics sink.
 */
export function createQueryAnalytics(
    config?: Partial<FileQueryAnalyticsConfig>
): FileQueryAnalytics {
    return new FileQueryAnalytics(config);
}
