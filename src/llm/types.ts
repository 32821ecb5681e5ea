// src/llm/types.ts

/**
 * @file Generic chat-completion types shared by the round trip and backend adapters.
 */

import { IToolDefinition } from '../core/tool';

export type LLMMessageRole = 'system' | 'user' | 'assistant' | 'tool';

/**
 * A tool call requested by the model. `arguments` is the serialized JSON payload.
 */
export interface LLMToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string;
  };
}

export interface LLMMessage {
  role: LLMMessageRole;
  content: string | null;
  /** Tool name on `tool` messages. */
  name?: string;
  /** Present on assistant messages that request tools. */
  tool_calls?: LLMToolCall[];
  /** Correlates a `tool` message with the call it answers. */
  tool_call_id?: string;
}

export type LLMToolChoice = 'auto' | 'none' | 'required' | { type: 'function'; function: { name: string } };

/**
 * Options of a single backend completion request.
 */
export interface LLMCompletionOptions {
  model?: string;
  tools?: IToolDefinition[];
  tool_choice?: LLMToolChoice;
  temperature?: number;
  max_tokens?: number;
  top_p?: number;
  frequency_penalty?: number;
  presence_penalty?: number;
}

/**
 * A chat-completion backend. Implementations send one request and return the
 * assistant message, which either carries final text or requests tool calls.
 */
export interface ILLMClient {
  generateResponse(messages: LLMMessage[], options: LLMCompletionOptions): Promise<LLMMessage>;
}

/**
 * An embedding backend.
 */
export interface IEmbeddingClient {
  createEmbedding(text: string, model?: string): Promise<number[]>;
}
