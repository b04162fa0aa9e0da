/**
 * Vector Store Service
 *
 * Flat (exact) inner-product index over float32 vectors.
 *
 * HOW IT WORKS:
 * 1. Chunks are converted to embedding vectors and appended in order
 * 2. A query is converted to a vector the same way
 * 3. Every stored vector is scored by its dot product with the query
 * 4. The highest scores win
 *
 * The index knows nothing about chunks. Results are positions, and position
 * i is the i-th vector ever added since the index was built. There is no
 * update or delete: a caller that needs to drop vectors builds a new index.
 */

/**
 * One similarity match.
 */
export interface SearchResult {
  /** Inner product with the query (higher = closer) */
  score: number;
  /** Insertion position of the matched vector */
  position: number;
}

/**
 * Serialized form of an index, as written to the index artifact.
 */
export interface SerializedVectorIndex {
  dimension: number;
  count: number;
  /** Little-endian float32 values of all vectors, concatenated, base64 encoded */
  vectors: string;
}

/**
 * Append-only similarity index.
 */
export interface VectorIndex {
  readonly dimension: number;
  add(vectors: ReadonlyArray<ArrayLike<number>>): void;
  search(query: ArrayLike<number>, k: number): SearchResult[];
  vectorAt(position: number): number[] | undefined;
  size(): number;
  serialize(): SerializedVectorIndex;
}

/**
 * Raised when a vector's length differs from the index dimension.
 */
export class DimensionMismatchError extends Error {
  constructor(
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(`Vector dimension mismatch: index holds ${expected}-dimensional vectors, got ${actual}`);
    this.name = 'DimensionMismatchError';
  }
}

/**
 * Raised when an index was built for a different embedding model or
 * dimension than the one configured. Not recoverable by retrying.
 */
export class IndexCompatibilityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IndexCompatibilityError';
  }
}

/**
 * Dot product of two equal-length vectors.
 */
export function innerProduct(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length);
  }

  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}

/**
 * Brute-force O(n) index. Fine for the few thousand chunks a notes
 * collection produces.
 */
export class FlatInnerProductIndex implements VectorIndex {
  private vectors: Float32Array[] = [];

  constructor(public readonly dimension: number) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new Error(`Index dimension must be a positive integer, got ${dimension}`);
    }
  }

  /**
   * Append vectors at the end, in order.
   * All vectors are checked before any is stored.
   */
  add(vectors: ReadonlyArray<ArrayLike<number>>): void {
    for (const vector of vectors) {
      this.assertDimension(vector);
    }
    for (const vector of vectors) {
      this.vectors.push(Float32Array.from(vector));
    }
  }

  /**
   * Up to k matches, highest score first. Equal scores keep insertion order.
   */
  search(query: ArrayLike<number>, k: number): SearchResult[] {
    this.assertDimension(query);
    if (k <= 0 || this.vectors.length === 0) {
      return [];
    }

    const results: SearchResult[] = this.vectors.map((vector, position) => ({
      score: innerProduct(query, vector),
      position,
    }));

    results.sort((a, b) => b.score - a.score || a.position - b.position);
    return results.slice(0, k);
  }

  vectorAt(position: number): number[] | undefined {
    const vector = this.vectors[position];
    return vector ? Array.from(vector) : undefined;
  }

  size(): number {
    return this.vectors.length;
  }

  serialize(): SerializedVectorIndex {
    const bytes = Buffer.alloc(this.vectors.length * this.dimension * Float32Array.BYTES_PER_ELEMENT);
    let offset = 0;
    for (const vector of this.vectors) {
      for (const value of vector) {
        offset = bytes.writeFloatLE(value, offset);
      }
    }
    return {
      dimension: this.dimension,
      count: this.vectors.length,
      vectors: bytes.toString('base64'),
    };
  }

  /**
   * Rebuild an index from its serialized form.
   *
   * @throws Error if the payload length does not match count × dimension
   */
  static deserialize(data: SerializedVectorIndex): FlatInnerProductIndex {
    const index = new FlatInnerProductIndex(data.dimension);
    const bytes = Buffer.from(data.vectors, 'base64');
    const expectedBytes = data.count * data.dimension * Float32Array.BYTES_PER_ELEMENT;

    if (bytes.byteLength !== expectedBytes) {
      throw new Error(
        `Corrupt index payload: expected ${expectedBytes} bytes for ${data.count} vectors, got ${bytes.byteLength}`
      );
    }

    const flat = new Float32Array(data.count * data.dimension);
    for (let i = 0; i < flat.length; i++) {
      flat[i] = bytes.readFloatLE(i * Float32Array.BYTES_PER_ELEMENT);
    }
    for (let i = 0; i < data.count; i++) {
      index.vectors.push(flat.slice(i * data.dimension, (i + 1) * data.dimension));
    }
    return index;
  }

  private assertDimension(vector: ArrayLike<number>): void {
    if (vector.length !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, vector.length);
    }
  }
}

/**
 * Factory function to create an empty vector index.
 */
export function createVectorIndex(dimension: number): VectorIndex {
  return new FlatInnerProductIndex(dimension);
}
