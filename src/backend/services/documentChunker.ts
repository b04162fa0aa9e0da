/**
 * Document Chunker Service
 *
 * Splits extracted text into overlapping windows for embedding and retrieval.
 *
 * Chunk size trade-off: too small loses context, too large dilutes relevance.
 * Overlap keeps sentences that straddle a boundary retrievable from at least
 * one chunk.
 */

/**
 * Configuration for the chunking process.
 */
export interface ChunkingConfig {
  /** Maximum size of each window in characters */
  chunkSize: number;
  /** Number of characters consecutive windows share */
  chunkOverlap: number;
}

/**
 * Default chunking configuration.
 * 1000 chars is roughly 200-250 tokens, well inside small embedding models.
 */
export const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = {
  chunkSize: 1000,
  chunkOverlap: 200,
};

/**
 * Raised for a configuration that could not make progress through the text.
 */
export class ChunkingConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ChunkingConfigError';
  }
}

/**
 * Checks that a window always advances: overlap must be smaller than size.
 *
 * @throws ChunkingConfigError
 */
export function validateChunkingConfig(config: ChunkingConfig): void {
  const { chunkSize, chunkOverlap } = config;

  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ChunkingConfigError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
    throw new ChunkingConfigError(`chunkOverlap must be a non-negative integer, got ${chunkOverlap}`);
  }
  if (chunkOverlap >= chunkSize) {
    throw new ChunkingConfigError(
      `chunkOverlap (${chunkOverlap}) must be smaller than chunkSize (${chunkSize})`
    );
  }
}

const BOUNDARY_CHARS = ['.', '!', '?', '\n'];

/**
 * Index of the last sentence terminator or newline in `window`, or -1.
 */
function lastBoundary(window: string): number {
  let best = -1;
  for (const char of BOUNDARY_CHARS) {
    best = Math.max(best, window.lastIndexOf(char));
  }
  return best;
}

/**
 * Character range of one window, before trimming.
 */
export interface ChunkWindow {
  start: number;
  end: number;
}

/**
 * Computes the sliding windows over a text.
 *
 * 1. Take chunkSize characters from the current start
 * 2. If more text follows and the last sentence end in the window lies past
 *    its midpoint, cut the window right after that sentence end
 * 3. Start the next window chunkOverlap characters before this one ended,
 *    measuring from the full window size when it ran past the text
 * 4. Stop once the start reaches the end of the text
 *
 * The last window can therefore repeat the tail of the one before it.
 * The start always moves forward by at least one character, so the loop
 * terminates for every valid configuration.
 */
export function computeWindows(
  text: string,
  config: ChunkingConfig = DEFAULT_CHUNKING_CONFIG
): ChunkWindow[] {
  validateChunkingConfig(config);
  const { chunkSize, chunkOverlap } = config;

  const windows: ChunkWindow[] = [];
  let start = 0;

  while (start < text.length) {
    let end = start + chunkSize;

    if (end < text.length) {
      const boundary = lastBoundary(text.slice(start, end));
      if (boundary > chunkSize / 2) {
        end = start + boundary + 1;
      }
    }

    windows.push({ start, end: Math.min(end, text.length) });
    start = Math.max(end - chunkOverlap, start + 1);
  }

  return windows;
}

/**
 * Splits text into overlapping chunks: the trimmed text of every window,
 * skipping windows that hold only whitespace.
 */
export function splitIntoChunks(
  text: string,
  config: ChunkingConfig = DEFAULT_CHUNKING_CONFIG
): string[] {
  return computeWindows(text, config)
    .map(({ start, end }) => text.slice(start, end).trim())
    .filter((chunk) => chunk.length > 0);
}

/**
 * Chunker bound to one validated configuration.
 */
export class DocumentChunker {
  private readonly config: ChunkingConfig;

  constructor(config: Partial<ChunkingConfig> = {}) {
    this.config = { ...DEFAULT_CHUNKING_CONFIG, ...config };
    validateChunkingConfig(this.config);
  }

  chunk(text: string): string[] {
    return splitIntoChunks(text, this.config);
  }

  getConfig(): ChunkingConfig {
    return { ...this.config };
  }
}

/**
 * Factory function to create a DocumentChunker.
 */
export function createDocumentChunker(config?: Partial<ChunkingConfig>): DocumentChunker {
  return new DocumentChunker(config);
}
