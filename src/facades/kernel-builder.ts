// src/facades/kernel-builder.ts

/**
 * @file Builds a Kernel wired with the default providers described by Settings:
 * OpenAI text generation and embeddings, and a vector memory over in-process storage.
 */

import { ConfigurationError } from '../core/errors';
import { createLogger, ILogger } from '../core/logger';
import { Kernel } from '../kernel/kernel';
import { loadSettings, Settings } from '../config/settings';
import { IEmbeddingProvider, IStorageProvider, ITextProvider } from '../providers/types';
import { OpenAITextProvider } from '../providers/openai-text-provider';
import { OpenAIEmbeddingProvider } from '../providers/openai-embedding-provider';
import { InMemoryStorageProvider } from '../providers/in-memory-storage-provider';
import { VectorMemoryProvider } from '../providers/vector-memory-provider';

/**
 * Replacements for the providers the builder would create.
 */
export interface KernelOverrides {
  logger?: ILogger;
  textProvider?: ITextProvider;
  embeddingProvider?: IEmbeddingProvider;
  storage?: IStorageProvider;
}

/**
 * @throws ConfigurationError when an OpenAI provider is needed and no API key is configured.
 */
export function createKernel(settings: Settings = loadSettings(), overrides: KernelOverrides = {}): Kernel {
  const logger = overrides.logger ?? createLogger(settings.logging);
  const { openai } = settings;

  const needsOpenAI = overrides.textProvider === undefined || overrides.embeddingProvider === undefined;
  if (needsOpenAI && !openai.apiKey) {
    throw new ConfigurationError(
      'OpenAI API key is required. Set openai.apiKey in the settings file or the OPENAI_API_KEY environment variable.'
    );
  }
  const connection = { apiKey: openai.apiKey, baseURL: openai.baseURL, organizationId: openai.organizationId };

  const textProvider =
    overrides.textProvider ??
    new OpenAITextProvider({
      ...connection,
      defaultModel: openai.textModel,
      maxToolCallContinuations: settings.toolCalling.maxToolCallContinuations,
      logger,
    });
  const embeddingProvider =
    overrides.embeddingProvider ??
    new OpenAIEmbeddingProvider({ ...connection, defaultEmbeddingModel: openai.embeddingModel, logger });
  const storage = overrides.storage ?? new InMemoryStorageProvider({ logger });
  const memory = new VectorMemoryProvider(embeddingProvider, storage, { logger });

  logger.log('info', 'KernelBuilder', `Kernel configured with text model ${openai.textModel}.`);
  return new Kernel({
    logger,
    providers: [textProvider, embeddingProvider, memory, storage],
    generationDefaults: settings.generation,
    agentDefaults: settings.agents,
  });
}
