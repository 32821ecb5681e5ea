// src/providers/openai-embedding-provider.ts

import { IEmbeddingClient } from '../llm/types';
import { OpenAIAdapter, OpenAIAdapterOptions } from '../llm/adapters/openai/openai-adapter';
import { IEmbeddingProvider } from './types';

/**
 * Embedding provider over any IEmbeddingClient; an OpenAIAdapter is built from the
 * options when no client is given.
 */
export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  readonly capability = 'embedding';

  private readonly client: IEmbeddingClient;
  private readonly model?: string;

  constructor(options: OpenAIAdapterOptions & { client?: IEmbeddingClient } = {}) {
    this.client = options.client ?? new OpenAIAdapter(options);
    this.model = options.defaultEmbeddingModel;
  }

  async generateEmbedding(text: string): Promise<number[]> {
    return this.client.createEmbedding(text, this.model);
  }
}
