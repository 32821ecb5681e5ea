// src/providers/in-memory-storage-provider.ts

/**
 * @file In-process vector storage with exact nearest-neighbour search.
 * Scores are `1 / (1 + L2 distance)`, so identical vectors score 1.
 */

import { v4 as uuidv4 } from 'uuid';
import { StorageError, ValidationError } from '../core/errors';
import { ILogger, NoopLogger } from '../core/logger';
import { IStorageProvider, Metadata, VectorEntry, VectorSearchResult } from './types';

export const DEFAULT_VECTOR_SEARCH_LIMIT = 5;

interface StoredVector {
  vector: number[];
  metadata: Metadata;
}

export class InMemoryStorageProvider implements IStorageProvider {
  readonly capability = 'storage';

  private readonly vectors = new Map<string, StoredVector>();
  private dimension?: number;
  private readonly logger: ILogger;

  constructor(options: { logger?: ILogger } = {}) {
    this.logger = options.logger ?? new NoopLogger();
  }

  async initialize(dimension: number): Promise<void> {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new ValidationError(`Vector dimension must be a positive integer, got ${dimension}.`, {
        dimension: 'must be a positive integer',
      });
    }
    if (this.dimension !== undefined && this.dimension !== dimension && this.vectors.size > 0) {
      throw new StorageError(
        `Storage already holds vectors of dimension ${this.dimension}; cannot reinitialize with ${dimension}.`
      );
    }
    this.dimension = dimension;
    this.logger.log('debug', 'InMemoryStorage', `Initialized with dimension ${dimension}.`);
  }

  async addVector(vector: number[], metadata: Metadata = {}): Promise<string> {
    if (this.dimension === undefined) {
      await this.initialize(vector.length);
    }
    this.assertDimension(vector);
    const id = uuidv4();
    this.vectors.set(id, { vector: [...vector], metadata: { ...metadata } });
    return id;
  }

  /**
   * Results are ordered by descending score; equal scores keep insertion order.
   */
  async searchVectors(queryVector: number[], limit: number = DEFAULT_VECTOR_SEARCH_LIMIT): Promise<VectorSearchResult[]> {
    if (this.vectors.size === 0 || limit <= 0) {
      return [];
    }
    this.assertDimension(queryVector);

    const scored: VectorSearchResult[] = [];
    for (const [id, stored] of this.vectors) {
      const score = 1 / (1 + euclideanDistance(queryVector, stored.vector));
      scored.push({ id, vector: [...stored.vector], metadata: { ...stored.metadata }, score });
    }
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, limit);
  }

  async getVector(id: string): Promise<VectorEntry | undefined> {
    const stored = this.vectors.get(id);
    if (stored === undefined) {
      return undefined;
    }
    return { id, vector: [...stored.vector], metadata: { ...stored.metadata } };
  }

  async deleteVector(id: string): Promise<boolean> {
    return this.vectors.delete(id);
  }

  public get size(): number {
    return this.vectors.size;
  }

  private assertDimension(vector: number[]): void {
    if (vector.length !== this.dimension) {
      throw new ValidationError(
        `Vector has dimension ${vector.length}, expected ${this.dimension ?? 'an initialized dimension'}.`,
        { vector: 'dimension mismatch' }
      );
    }
  }
}

function euclideanDistance(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = a[i] - b[i];
    sum += diff * diff;
  }
  return Math.sqrt(sum);
}
