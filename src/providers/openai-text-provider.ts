// src/providers/openai-text-provider.ts

import { OpenAIAdapter, OpenAIAdapterOptions } from '../llm/adapters/openai/openai-adapter';
import { LLMTextProvider, LLMTextProviderOptions } from './llm-text-provider';

export type OpenAITextProviderOptions = OpenAIAdapterOptions & Omit<LLMTextProviderOptions, 'model'>;

/**
 * Text provider backed by OpenAI chat completions.
 */
export class OpenAITextProvider extends LLMTextProvider {
  constructor(options: OpenAITextProviderOptions = {}) {
    super(new OpenAIAdapter(options), {
      model: options.defaultModel,
      maxToolCallContinuations: options.maxToolCallContinuations,
      executor: options.executor,
      logger: options.logger,
    });
  }
}
