// src/providers/llm-text-provider.ts

/**
 * @file Text provider that runs the tool-calling round trip over any ILLMClient.
 */

import { ILogger, NoopLogger } from '../core/logger';
import { ILLMClient, LLMCompletionOptions, LLMMessage } from '../llm/types';
import { runToolCallingLoop, DEFAULT_MAX_TOOL_CALL_CONTINUATIONS } from '../llm/tool-calling-loop';
import { ToolExecutor } from '../agents/tool-executor';
import { ITextProvider, TextGenerationRequest } from './types';

export interface LLMTextProviderOptions {
  /** Model passed with every request; the client's default when omitted. */
  model?: string;
  maxToolCallContinuations?: number;
  executor?: ToolExecutor;
  logger?: ILogger;
}

export class LLMTextProvider implements ITextProvider {
  readonly capability = 'text';

  protected readonly client: ILLMClient;
  protected readonly logger: ILogger;
  private readonly model?: string;
  private readonly maxToolCallContinuations: number;
  private readonly executor: ToolExecutor;

  constructor(client: ILLMClient, options: LLMTextProviderOptions = {}) {
    this.client = client;
    this.model = options.model;
    this.logger = options.logger ?? new NoopLogger();
    this.maxToolCallContinuations = options.maxToolCallContinuations ?? DEFAULT_MAX_TOOL_CALL_CONTINUATIONS;
    this.executor = options.executor ?? new ToolExecutor({ logger: this.logger });
  }

  async generateText(request: TextGenerationRequest): Promise<string> {
    const messages = buildMessages(request);
    const completionOptions: LLMCompletionOptions = {
      model: this.model,
      tools: request.tools,
      temperature: request.temperature,
      max_tokens: request.maxTokens,
      top_p: request.topP,
      frequency_penalty: request.frequencyPenalty,
      presence_penalty: request.presencePenalty,
    };

    return runToolCallingLoop(this.client, messages, completionOptions, request.toolImplementations ?? new Map(), {
      maxToolCallContinuations: this.maxToolCallContinuations,
      executor: this.executor,
      logger: this.logger,
    });
  }
}

/**
 * System message first, then prior messages, then the context, then the prompt.
 */
export function buildMessages(request: TextGenerationRequest): LLMMessage[] {
  const messages: LLMMessage[] = [];
  if (request.systemMessage) {
    messages.push({ role: 'system', content: request.systemMessage });
  }
  if (request.messages) {
    messages.push(...request.messages);
  }
  if (request.context) {
    messages.push({ role: 'user', content: request.context });
  }
  messages.push({ role: 'user', content: request.prompt });
  return messages;
}
