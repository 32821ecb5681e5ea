// src/agents/memory-agent.ts

/**
 * @file MemoryAgent - Adds similar prior tasks from a text memory to the prompt of an inner agent,
 * and records each task it receives.
 */

import { describeError } from '../core/utils';
import { NoProviderError } from '../core/errors';
import { Kernel } from '../kernel/kernel';
import { ITextMemory, MemorySearchResult } from '../providers/types';
import { Agent } from './agent';
import { BaseAgent, BaseAgentOptions, requirePositiveInteger } from './base-agent';
import { AgentRunOptions, IAgent } from './types';

export interface MemoryAgentOptions extends BaseAgentOptions {
  /** Defaults to the kernel's first memory provider. */
  memory?: ITextMemory;
  /** Answers the augmented prompt. Defaults to a single-shot Agent on the same kernel. */
  agent?: IAgent;
  /** @default 5 */
  searchLimit?: number;
}

export class MemoryAgent extends BaseAgent {
  public readonly agent: IAgent;
  public readonly searchLimit: number;
  private readonly memoryOverride?: ITextMemory;

  constructor(kernel: Kernel, options: MemoryAgentOptions = {}) {
    super(kernel, 'MemoryAgent', options);
    this.agent = options.agent ?? new Agent(kernel, { logger: this.logger });
    this.memoryOverride = options.memory;
    this.searchLimit = requirePositiveInteger('searchLimit', options.searchLimit ?? kernel.agentDefaults.memorySearchLimit);
  }

  /**
   * @throws NoProviderError when no memory was given and the kernel has none.
   */
  public get memory(): ITextMemory {
    const memory = this.memoryOverride ?? this.kernel.getProvider('memory');
    if (memory === undefined) {
      throw new NoProviderError('memory');
    }
    return memory;
  }

  async run(task: string, options: AgentRunOptions = {}): Promise<string> {
    this.iterations = 0;
    const memory = this.memory;

    const similar = await this.recall(memory, task);
    const prompt = similar.length > 0 ? buildContextualPrompt(similar, task) : task;

    try {
      await memory.addText(task, { source: this.name });
    } catch (error: unknown) {
      this.log('error', `Failed to store task in memory: ${describeError(error)}`);
    }

    const result = await this.agent.run(prompt, options);
    this.iterations = 1;
    return result;
  }

  private async recall(memory: ITextMemory, task: string): Promise<MemorySearchResult[]> {
    try {
      return await memory.searchSimilar(task, this.searchLimit);
    } catch (error: unknown) {
      this.log('warn', `Memory search failed; continuing without context: ${describeError(error)}`);
      return [];
    }
  }
}

export function buildContextualPrompt(similar: MemorySearchResult[], task: string): string {
  const context = similar.map((entry) => `- ${entry.text}`).join('\n');
  return `Use the following prior context if useful:\n${context}\n\nNow answer:\n${task}`;
}
