// src/agents/collaborative-agent.ts

/**
 * @file CollaborativeAgent - Alternates two agents, e.g. an editor (first) and a writer (second).
 *
 * Every iteration the first agent works on the shared result, then the second answers it and its
 * answer becomes the new shared result. When the first agent's answer contains the stop phrase the
 * loop ends before the second runs, returning the shared result from the second agent's previous
 * turn. The second agent's own stop phrase does not end the loop.
 */

import { containsIgnoreCase } from '../core/utils';
import { Kernel } from '../kernel/kernel';
import { BaseAgent, BaseAgentOptions, requirePositiveInteger } from './base-agent';
import { AgentRunOptions, IAgent } from './types';

export interface CollaborationTurn {
  task: string;
  iteration: number;
  stopPhrase: string;
  firstRole: string;
  secondRole: string;
}

/** Builds the first agent's prompt from the shared result. */
export type FirstPromptBuilder = (currentResult: string, turn: CollaborationTurn) => string;
/** Builds the second agent's prompt from the shared result and the first agent's latest answer. */
export type SecondPromptBuilder = (currentResult: string, firstResult: string, turn: CollaborationTurn) => string;

export interface CollaborativeAgentOptions extends BaseAgentOptions {
  /** @default 10 */
  maxIterations?: number;
  /** @default 'Final version' */
  stopPhrase?: string;
  /** @default 'Agent A' */
  firstRole?: string;
  /** @default 'Agent B' */
  secondRole?: string;
  /** Shared result before the first iteration. @default '' */
  initialResult?: string;
  buildFirstPrompt?: FirstPromptBuilder;
  buildSecondPrompt?: SecondPromptBuilder;
}

export const defaultFirstPrompt: FirstPromptBuilder = (currentResult, turn) =>
  turn.iteration === 0
    ? `Original task: ${turn.task}\n\nPlease start working on this task.`
    : `Original task: ${turn.task}\n\nCurrent result:\n${currentResult}\n\n` +
      `Please review and provide feedback or improvements. If you're satisfied, end your response with '${turn.stopPhrase}'.`;

export const defaultSecondPrompt: SecondPromptBuilder = (_currentResult, firstResult, turn) =>
  turn.iteration === 0
    ? `Original task: ${turn.task}\n\n${turn.firstRole}'s work:\n${firstResult}\n\nPlease continue or improve upon this work.`
    : `Original task: ${turn.task}\n\n${turn.firstRole}'s feedback:\n${firstResult}\n\n` +
      `Please implement the feedback and improve the work. If you're satisfied with the result, end your response with '${turn.stopPhrase}'.`;

export class CollaborativeAgent extends BaseAgent {
  public readonly firstAgent: IAgent;
  public readonly secondAgent: IAgent;
  public readonly maxIterations: number;
  public readonly stopPhrase: string;
  public readonly firstRole: string;
  public readonly secondRole: string;
  private readonly initialResult: string;
  private readonly buildFirstPrompt: FirstPromptBuilder;
  private readonly buildSecondPrompt: SecondPromptBuilder;

  constructor(kernel: Kernel, firstAgent: IAgent, secondAgent: IAgent, options: CollaborativeAgentOptions = {}) {
    super(kernel, 'CollaborativeAgent', options);
    this.firstAgent = firstAgent;
    this.secondAgent = secondAgent;
    this.maxIterations = requirePositiveInteger(
      'maxIterations',
      options.maxIterations ?? kernel.agentDefaults.collaborativeMaxIterations
    );
    this.stopPhrase = options.stopPhrase ?? kernel.agentDefaults.stopPhrase;
    this.firstRole = options.firstRole ?? 'Agent A';
    this.secondRole = options.secondRole ?? 'Agent B';
    this.initialResult = options.initialResult ?? '';
    this.buildFirstPrompt = options.buildFirstPrompt ?? defaultFirstPrompt;
    this.buildSecondPrompt = options.buildSecondPrompt ?? defaultSecondPrompt;
  }

  async run(task: string, options: AgentRunOptions = {}): Promise<string> {
    return this.collaborate(task, options);
  }

  async collaborate(task: string, options: AgentRunOptions = {}): Promise<string> {
    this.iterations = 0;
    let currentResult = this.initialResult;

    for (let iteration = 0; iteration < this.maxIterations; iteration++) {
      this.iterations = iteration + 1;
      const turn: CollaborationTurn = {
        task,
        iteration,
        stopPhrase: this.stopPhrase,
        firstRole: this.firstRole,
        secondRole: this.secondRole,
      };

      this.log('info', `${this.firstRole} turn (iteration ${iteration + 1}).`);
      const firstResult = await this.firstAgent.run(this.buildFirstPrompt(currentResult, turn), options);
      if (containsIgnoreCase(firstResult, this.stopPhrase)) {
        this.log('info', `${this.firstRole} decided to stop.`);
        return currentResult;
      }

      this.log('info', `${this.secondRole} turn (iteration ${iteration + 1}).`);
      currentResult = await this.secondAgent.run(this.buildSecondPrompt(currentResult, firstResult, turn), options);
    }

    this.log('info', `Maximum iterations (${this.maxIterations}) reached.`);
    return currentResult;
  }

  public reset(): void {
    this.iterations = 0;
  }
}
