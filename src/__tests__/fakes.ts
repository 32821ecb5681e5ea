// src/__tests__/fakes.ts

/**
 * @file In-process stand-ins for model backends, providers and agents used across the test suites.
 */

import { ILLMClient, LLMCompletionOptions, LLMMessage } from '../llm/types';
import { IEmbeddingProvider, ITextProvider, TextGenerationRequest } from '../providers/types';
import { AgentRunOptions, IAgent } from '../agents/types';

/**
 * Returns the scripted assistant messages in order and records every request.
 */
export class ScriptedLLMClient implements ILLMClient {
  public readonly calls: Array<{ messages: LLMMessage[]; options: LLMCompletionOptions }> = [];

  constructor(private readonly responses: LLMMessage[]) {}

  async generateResponse(messages: LLMMessage[], options: LLMCompletionOptions): Promise<LLMMessage> {
    this.calls.push({ messages, options });
    const next = this.responses.shift();
    if (next === undefined) {
      throw new Error('ScriptedLLMClient ran out of responses.');
    }
    return next;
  }
}

export function toolCallMessage(id: string, name: string, args: Record<string, unknown> = {}): LLMMessage {
  return {
    role: 'assistant',
    content: null,
    tool_calls: [{ id, type: 'function', function: { name, arguments: JSON.stringify(args) } }],
  };
}

export function textMessage(content: string): LLMMessage {
  return { role: 'assistant', content };
}

/**
 * Text provider that answers with scripted replies and records the requests.
 */
export class ScriptedTextProvider implements ITextProvider {
  readonly capability = 'text';
  public readonly requests: TextGenerationRequest[] = [];

  constructor(private readonly replies: string[]) {}

  get prompts(): string[] {
    return this.requests.map((request) => request.prompt);
  }

  async generateText(request: TextGenerationRequest): Promise<string> {
    this.requests.push(request);
    const next = this.replies.shift();
    if (next === undefined) {
      throw new Error('ScriptedTextProvider ran out of replies.');
    }
    return next;
  }
}

/**
 * Agent that answers with scripted replies and records the tasks it receives.
 */
export class ScriptedAgent implements IAgent {
  public readonly tasks: string[] = [];
  public readonly iterationCount = 0;

  constructor(
    public name: string,
    private readonly replies: string[]
  ) {}

  async run(task: string, _options?: AgentRunOptions): Promise<string> {
    this.tasks.push(task);
    const next = this.replies.shift();
    if (next === undefined) {
      throw new Error(`ScriptedAgent ${this.name} ran out of replies.`);
    }
    return next;
  }
}

/**
 * Deterministic bag-of-words embedding: each lower-cased word adds 1 to one of 16 buckets.
 */
export class BagOfWordsEmbeddingProvider implements IEmbeddingProvider {
  readonly capability = 'embedding';
  public static readonly DIMENSION = 16;

  async generateEmbedding(text: string): Promise<number[]> {
    const vector = new Array<number>(BagOfWordsEmbeddingProvider.DIMENSION).fill(0);
    for (const word of text.toLowerCase().split(/\W+/).filter(Boolean)) {
      let hash = 0;
      for (const ch of word) {
        hash = (hash * 31 + ch.charCodeAt(0)) % 9973;
      }
      vector[hash % BagOfWordsEmbeddingProvider.DIMENSION] += 1;
    }
    return vector;
  }
}
