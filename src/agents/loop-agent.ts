// src/agents/loop-agent.ts

/**
 * @file LoopAgent - Reruns an inner agent on its own output until a stop condition holds
 * or the iteration cap is reached. Reaching the cap returns the last result.
 */

import { containsIgnoreCase } from '../core/utils';
import { Kernel } from '../kernel/kernel';
import { Agent } from './agent';
import { BaseAgent, BaseAgentOptions, requirePositiveInteger } from './base-agent';
import { AgentRunOptions, IAgent, StopCondition } from './types';

export interface LoopAgentOptions extends BaseAgentOptions {
  /** Agent run on every iteration. Defaults to a single-shot Agent on the same kernel. */
  agent?: IAgent;
  maxIterations?: number;
  /** Predicate or phrase. Defaults to `stopPhrase`. */
  stopCondition?: StopCondition;
  stopPhrase?: string;
}

export class LoopAgent extends BaseAgent {
  public readonly agent: IAgent;
  public readonly maxIterations: number;
  private readonly stopCondition: StopCondition;

  constructor(kernel: Kernel, options: LoopAgentOptions = {}) {
    super(kernel, 'LoopAgent', options);
    this.agent = options.agent ?? new Agent(kernel, { logger: this.logger });
    this.maxIterations = requirePositiveInteger(
      'maxIterations',
      options.maxIterations ?? kernel.agentDefaults.maxIterations
    );
    this.stopCondition = options.stopCondition ?? options.stopPhrase ?? kernel.agentDefaults.stopPhrase;
  }

  async run(task: string, options: AgentRunOptions = {}): Promise<string> {
    this.iterations = 0;
    let currentTask = task;
    let result = '';

    while (this.iterations < this.maxIterations) {
      this.iterations++;
      this.log('info', `Step ${this.iterations}/${this.maxIterations}.`);
      result = await this.agent.run(currentTask, options);

      if (this.shouldStop(result)) {
        this.log('info', `Stop condition met at step ${this.iterations}.`);
        return result;
      }
      currentTask = `Improve the previous output.\n\n${result}`;
    }

    this.log('info', `Reached the limit of ${this.maxIterations} steps.`);
    return result;
  }

  private shouldStop(result: string): boolean {
    if (typeof this.stopCondition === 'function') {
      return this.stopCondition(result);
    }
    return containsIgnoreCase(result, this.stopCondition);
  }
}
