// src/llm/adapters/openai/openai-adapter.ts

/**
 * @file Concrete implementation of ILLMClient using the OpenAI API.
 * This adapter handles chat completions (non-streaming) and embeddings.
 */

import OpenAI from 'openai'; // Official OpenAI SDK
import { IEmbeddingClient, ILLMClient, LLMCompletionOptions, LLMMessage, LLMToolCall } from '../../types';
import { IToolDefinition } from '../../../core/tool';
import { ConfigurationError, LLMError } from '../../../core/errors';
import { ILogger, NoopLogger } from '../../../core/logger';

/**
 * Configuration options for the OpenAIAdapter.
 */
export interface OpenAIAdapterOptions {
  apiKey?: string;
  organizationId?: string;
  baseURL?: string;
  defaultModel?: string;
  defaultEmbeddingModel?: string;
  logger?: ILogger;
}

export class OpenAIAdapter implements ILLMClient, IEmbeddingClient {
  private openai: OpenAI;
  private defaultModel: string;
  private defaultEmbeddingModel: string;
  private logger: ILogger;

  constructor(options: OpenAIAdapterOptions = {}) {
    const apiKey = options.apiKey || process.env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new ConfigurationError(
        'OpenAI API key is required. Provide it in options or set OPENAI_API_KEY environment variable.'
      );
    }

    this.openai = new OpenAI({
      apiKey: apiKey,
      organization: options.organizationId || process.env.OPENAI_ORG_ID,
      baseURL: options.baseURL,
    });

    this.defaultModel = options.defaultModel || 'gpt-4o';
    this.defaultEmbeddingModel = options.defaultEmbeddingModel || 'text-embedding-3-small';
    this.logger = options.logger ?? new NoopLogger();
    this.logger.log(
      'info',
      'OpenAIAdapter',
      `Initialized with default model: ${this.defaultModel}. BaseURL: ${options.baseURL || 'OpenAI Default'}`
    );
  }

  public get model(): string {
    return this.defaultModel;
  }

  /**
   * Implements ILLMClient.generateResponse using OpenAI's Chat Completions API.
   */
  async generateResponse(messages: LLMMessage[], options: LLMCompletionOptions): Promise<LLMMessage> {
    const modelToUse = options.model || this.defaultModel;
    this.logger.log('debug', 'OpenAIAdapter', `Sending request to OpenAI with model: ${modelToUse}`, {
      messages: messages.length,
      tools: options.tools ? options.tools.length : 0,
    });

    const requestPayload: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming = {
      model: modelToUse,
      messages: messages.map((msg) => this.mapToOpenAIMessageParam(msg)),
      temperature: options.temperature,
      max_tokens: options.max_tokens,
      top_p: options.top_p,
      frequency_penalty: options.frequency_penalty,
      presence_penalty: options.presence_penalty,
    };
    if (options.tools && options.tools.length > 0) {
      requestPayload.tools = this.formatToolsForProvider(options.tools);
      requestPayload.tool_choice = options.tool_choice ?? 'auto';
    }

    let completion: OpenAI.Chat.Completions.ChatCompletion;
    try {
      completion = await this.openai.chat.completions.create(requestPayload);
    } catch (error: unknown) {
      this.handleOpenAIError(error);
    }

    const choice = completion.choices[0];
    if (choice === undefined || !choice.message) {
      throw new LLMError('OpenAI response missing choices or message.', 'api_error', { response: completion });
    }
    return this.mapFromOpenAIChatCompletionMessage(choice.message);
  }

  /**
   * Implements IEmbeddingClient.createEmbedding with OpenAI's Embeddings API.
   */
  async createEmbedding(text: string, model?: string): Promise<number[]> {
    let response: OpenAI.Embeddings.CreateEmbeddingResponse;
    try {
      response = await this.openai.embeddings.create({ model: model || this.defaultEmbeddingModel, input: text });
    } catch (error: unknown) {
      this.handleOpenAIError(error);
    }
    const first = response.data[0];
    if (first === undefined) {
      throw new LLMError('OpenAI embedding response contained no data.', 'api_error');
    }
    return first.embedding;
  }

  /**
   * Maps our generic LLMMessage to OpenAI's ChatCompletionMessageParam union type.
   */
  private mapToOpenAIMessageParam(message: LLMMessage): OpenAI.Chat.Completions.ChatCompletionMessageParam {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content ?? '' };
      case 'user':
        return { role: 'user', content: message.content ?? '' };
      case 'assistant': {
        const assistantParam: OpenAI.Chat.Completions.ChatCompletionAssistantMessageParam = {
          role: 'assistant',
          content: message.content,
        };
        if (message.tool_calls && message.tool_calls.length > 0) {
          assistantParam.tool_calls = message.tool_calls.map((tc) => ({
            id: tc.id,
            type: tc.type,
            function: { name: tc.function.name, arguments: tc.function.arguments },
          }));
        }
        return assistantParam;
      }
      case 'tool':
        if (!message.tool_call_id) {
          throw new ConfigurationError("Message with role 'tool' must have a 'tool_call_id'.");
        }
        return { role: 'tool', content: message.content ?? '', tool_call_id: message.tool_call_id };
    }
  }

  /**
   * Maps OpenAI's ChatCompletionMessage back to our generic LLMMessage.
   */
  private mapFromOpenAIChatCompletionMessage(openAIMessage: OpenAI.Chat.Completions.ChatCompletionMessage): LLMMessage {
    const message: LLMMessage = {
      role: 'assistant',
      content: openAIMessage.content,
    };
    if (openAIMessage.tool_calls && openAIMessage.tool_calls.length > 0) {
      message.tool_calls = openAIMessage.tool_calls.map(
        (tc): LLMToolCall => ({
          id: tc.id,
          type: 'function',
          function: {
            name: tc.function.name || '',
            arguments: tc.function.arguments || '',
          },
        })
      );
    }
    return message;
  }

  /**
   * Converts IToolDefinition[] to OpenAI's tool format.
   */
  public formatToolsForProvider(toolDefinitions: IToolDefinition[]): OpenAI.Chat.Completions.ChatCompletionTool[] {
    return toolDefinitions.map((definition) => ({
      type: 'function',
      function: {
        name: definition.function.name,
        description: definition.function.description,
        parameters: definition.function.parameters,
      },
    }));
  }

  /**
   * Standardized error handling for OpenAI API calls.
   */
  private handleOpenAIError(error: unknown): never {
    if (error instanceof OpenAI.APIError) {
      const statusCode = error.status;
      const errorType = error.type || error.code || 'openai_api_error';
      this.logger.log(
        'error',
        'OpenAIAdapter',
        `OpenAI API Error (Status: ${statusCode}, Type: ${errorType}): ${error.message}`
      );
      throw new LLMError(error.message, errorType, {
        statusCode,
        provider: 'openai',
        errorBody: error.error,
      });
    } else if (error instanceof Error) {
      this.logger.log('error', 'OpenAIAdapter', `Unexpected SDK or network error: ${error.message}`);
      throw new LLMError(error.message || 'An unexpected error occurred while interacting with OpenAI.', 'sdk_error', {
        provider: 'openai',
        originalErrorName: error.name,
      });
    }
    this.logger.log('error', 'OpenAIAdapter', 'Unknown error type during OpenAI interaction.');
    throw new LLMError('An unknown error occurred with OpenAI.', 'unknown_sdk_error', {
      provider: 'openai',
      originalError: String(error),
    });
  }
}
