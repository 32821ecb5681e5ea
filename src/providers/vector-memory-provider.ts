// src/providers/vector-memory-provider.ts

/**
 * @file Semantic text memory built from an embedding provider and a vector storage provider.
 * Each text owns exactly one vector. The provider keeps the text-id → vector-id and
 * vector-id → text-id maps in step and reports any disagreement as a MemoryIntegrityError.
 */

import { v4 as uuidv4 } from 'uuid';
import { MemoryIntegrityError } from '../core/errors';
import { ILogger, NoopLogger } from '../core/logger';
import {
  IEmbeddingProvider,
  IStorageProvider,
  ITextMemory,
  MemoryEntry,
  MemorySearchResult,
  Metadata,
  VectorSearchResult,
} from './types';

export const DEFAULT_MEMORY_SEARCH_LIMIT = 5;

interface StoredText {
  text: string;
  metadata: Metadata;
  vectorId: string;
}

export interface MemoryIntegrityReport {
  ok: boolean;
  /** Text ids whose vector is no longer in storage. */
  missingVectors: string[];
  /** Text ids whose vector id maps back to another text, or to none. */
  mismatchedIds: string[];
}

export class VectorMemoryProvider implements ITextMemory {
  readonly capability = 'memory';

  private readonly texts = new Map<string, StoredText>();
  private readonly textIdByVectorId = new Map<string, string>();
  private readonly logger: ILogger;
  /** Stamped on every vector this memory writes. */
  public readonly memoryId = uuidv4();

  constructor(
    private readonly embeddings: IEmbeddingProvider,
    private readonly storage: IStorageProvider,
    options: { logger?: ILogger } = {}
  ) {
    this.logger = options.logger ?? new NoopLogger();
  }

  async addText(text: string, metadata: Metadata = {}): Promise<string> {
    const vector = await this.embeddings.generateEmbedding(text);
    const textId = uuidv4();
    const vectorId = await this.storage.addVector(vector, { ...metadata, textId, memoryId: this.memoryId });
    this.texts.set(textId, { text, metadata: { ...metadata }, vectorId });
    this.textIdByVectorId.set(vectorId, textId);
    this.logger.log('debug', 'VectorMemory', `Stored text ${textId} as vector ${vectorId}.`);
    return textId;
  }

  /**
   * Only vectors this memory wrote are considered; other vectors in a shared storage are skipped.
   *
   * @throws MemoryIntegrityError when storage returns a vector of this memory with no matching text.
   */
  async searchSimilar(query: string, limit: number = DEFAULT_MEMORY_SEARCH_LIMIT): Promise<MemorySearchResult[]> {
    if (this.texts.size === 0 || limit <= 0) {
      return [];
    }
    const queryVector = await this.embeddings.generateEmbedding(query);

    let requested = limit;
    for (;;) {
      const hits = await this.storage.searchVectors(queryVector, requested);
      const owned = hits.filter((hit) => hit.metadata.memoryId === this.memoryId);
      if (owned.length >= limit || hits.length < requested) {
        return owned.slice(0, limit).map((hit) => this.toResult(hit));
      }
      // Foreign vectors crowded out owned ones; widen the search.
      requested *= 2;
    }
  }

  private toResult(hit: VectorSearchResult): MemorySearchResult {
    const textId = this.textIdByVectorId.get(hit.id);
    const stored = textId === undefined ? undefined : this.texts.get(textId);
    if (textId === undefined || stored === undefined || stored.vectorId !== hit.id) {
      throw new MemoryIntegrityError(`Vector ${hit.id} returned by storage has no matching text.`, {
        vectorId: hit.id,
        textId,
      });
    }
    return { id: textId, text: stored.text, metadata: { ...stored.metadata }, score: hit.score };
  }

  async getText(id: string): Promise<MemoryEntry | undefined> {
    const stored = this.texts.get(id);
    if (stored === undefined) {
      return undefined;
    }
    return { id, text: stored.text, metadata: { ...stored.metadata } };
  }

  async deleteText(id: string): Promise<boolean> {
    const stored = this.texts.get(id);
    if (stored === undefined) {
      return false;
    }
    const removed = await this.storage.deleteVector(stored.vectorId);
    if (!removed) {
      this.logger.log('warn', 'VectorMemory', `Vector ${stored.vectorId} of text ${id} was already missing.`);
    }
    this.texts.delete(id);
    this.textIdByVectorId.delete(stored.vectorId);
    return true;
  }

  public get size(): number {
    return this.texts.size;
  }

  /**
   * Checks every stored text against storage and the reverse id map.
   */
  async verifyIntegrity(): Promise<MemoryIntegrityReport> {
    const missingVectors: string[] = [];
    const mismatchedIds: string[] = [];
    for (const [textId, stored] of this.texts) {
      if (this.textIdByVectorId.get(stored.vectorId) !== textId) {
        mismatchedIds.push(textId);
      }
      if ((await this.storage.getVector(stored.vectorId)) === undefined) {
        missingVectors.push(textId);
      }
    }
    const ok = missingVectors.length === 0 && mismatchedIds.length === 0;
    if (!ok) {
      this.logger.log('warn', 'VectorMemory', 'Memory integrity check failed.', { missingVectors, mismatchedIds });
    }
    return { ok, missingVectors, mismatchedIds };
  }
}
