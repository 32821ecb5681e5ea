// src/providers/types.ts

/**
 * @file Capability contracts for the providers a Kernel dispatches to.
 * Every provider declares exactly one capability through its readonly `capability` tag,
 * which the Kernel reads once at registration time.
 */

import { ITool, IToolDefinition } from '../core/tool';
import { LLMMessage } from '../llm/types';

export type ProviderCapability = 'text' | 'embedding' | 'memory' | 'storage';

export const PROVIDER_CAPABILITIES: readonly ProviderCapability[] = ['text', 'embedding', 'memory', 'storage'];

/**
 * Sampling and context options of one text generation.
 */
export interface GenerationOptions {
  systemMessage?: string;
  /** Extra context injected as a user message ahead of the prompt. */
  context?: string;
  temperature?: number;
  maxTokens?: number;
  topP?: number;
  frequencyPenalty?: number;
  presencePenalty?: number;
}

export interface TextGenerationRequest extends GenerationOptions {
  prompt: string;
  /** Catalog forwarded to the model. An empty list disables tool calling. */
  tools?: IToolDefinition[];
  /** Name → tool used to execute the calls the model requests. */
  toolImplementations?: ReadonlyMap<string, ITool>;
  /** Prior conversation inserted between the system message and the prompt. */
  messages?: LLMMessage[];
}

export interface ITextProvider {
  readonly capability: 'text';
  generateText(request: TextGenerationRequest): Promise<string>;
}

export interface IEmbeddingProvider {
  readonly capability: 'embedding';
  generateEmbedding(text: string): Promise<number[]>;
}

export type Metadata = Record<string, unknown>;

export interface MemorySearchResult {
  id: string;
  text: string;
  metadata: Metadata;
  score: number;
}

export interface MemoryEntry {
  id: string;
  text: string;
  metadata: Metadata;
}

export interface ITextMemory {
  readonly capability: 'memory';
  addText(text: string, metadata?: Metadata): Promise<string>;
  searchSimilar(query: string, limit?: number): Promise<MemorySearchResult[]>;
  getText(id: string): Promise<MemoryEntry | undefined>;
  deleteText(id: string): Promise<boolean>;
}

export interface VectorEntry {
  id: string;
  vector: number[];
  metadata: Metadata;
}

export interface VectorSearchResult extends VectorEntry {
  score: number;
}

export interface IStorageProvider {
  readonly capability: 'storage';
  initialize(dimension: number): Promise<void>;
  addVector(vector: number[], metadata?: Metadata): Promise<string>;
  searchVectors(queryVector: number[], limit?: number): Promise<VectorSearchResult[]>;
  getVector(id: string): Promise<VectorEntry | undefined>;
  deleteVector(id: string): Promise<boolean>;
}

export type Provider = ITextProvider | IEmbeddingProvider | ITextMemory | IStorageProvider;

export interface ProviderByCapability {
  text: ITextProvider;
  embedding: IEmbeddingProvider;
  memory: ITextMemory;
  storage: IStorageProvider;
}
