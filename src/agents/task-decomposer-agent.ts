// src/agents/task-decomposer-agent.ts

/**
 * @file TaskDecomposerAgent - Plans a task as 3–5 numbered subtasks, runs them in order on
 * one executor agent and concatenates the labelled results.
 */

import { Kernel } from '../kernel/kernel';
import { Agent } from './agent';
import { BaseAgent, BaseAgentOptions } from './base-agent';
import { AgentRunOptions, IAgent } from './types';

export interface TaskDecomposerAgentOptions extends BaseAgentOptions {
  /** Runs every subtask. Defaults to a single-shot Agent on the same kernel. */
  executor?: IAgent;
}

export class TaskDecomposerAgent extends BaseAgent {
  public readonly executor: IAgent;

  constructor(kernel: Kernel, options: TaskDecomposerAgentOptions = {}) {
    super(kernel, 'TaskDecomposerAgent', options);
    this.executor = options.executor ?? new Agent(kernel, { logger: this.logger });
  }

  async run(task: string, options: AgentRunOptions = {}): Promise<string> {
    return this.coordinateExecution(task, options);
  }

  async decomposeTask(task: string): Promise<string[]> {
    const plan = await this.kernel.generateText(buildPlanPrompt(task));
    this.log('debug', `Plan generated:\n${plan}`);
    return TaskDecomposerAgent.parseSubtasks(plan);
  }

  async executeTask(task: string, options: AgentRunOptions = {}): Promise<string> {
    return this.executor.run(task, options);
  }

  /**
   * Subtasks run strictly in plan order; none sees another's result.
   */
  async coordinateExecution(task: string, options: AgentRunOptions = {}): Promise<string> {
    this.iterations = 0;
    const subtasks = await this.decomposeTask(task);
    if (subtasks.length === 0) {
      this.log('warn', 'The plan contained no subtasks.');
      return '';
    }

    const results: string[] = [];
    for (const [index, subtask] of subtasks.entries()) {
      this.iterations = index + 1;
      this.log('info', `Executing Subtask ${index + 1}: ${subtask}`);
      const result = await this.executeTask(subtask, options);
      results.push(`Subtask ${index + 1} Result:\n${result}\n`);
    }
    return results.join('\n');
  }

  /**
   * Keeps the text after the first `.` of each line, or after the first `-` when the line has
   * no `.`. Lines with neither delimiter and empty remainders are dropped.
   */
  static parseSubtasks(planText: string): string[] {
    const subtasks: string[] = [];
    for (const line of planText.trim().split(/\r?\n/)) {
      const delimiter = line.includes('.') ? '.' : line.includes('-') ? '-' : undefined;
      if (delimiter === undefined) {
        continue;
      }
      const subtask = line.slice(line.indexOf(delimiter) + 1).trim();
      if (subtask !== '') {
        subtasks.push(subtask);
      }
    }
    return subtasks;
  }
}

function buildPlanPrompt(task: string): string {
  return (
    'You are a planning agent.\n' +
    'Decompose the following task into 3–5 concrete, sequential subtasks:\n\n' +
    `Task: ${task}\n\n` +
    'Return the list of subtasks as plain numbered steps.'
  );
}
