// src/agents/agent.ts

/**
 * @file Agent - Single-shot agent: one kernel text generation per run.
 */

import { ITool, toToolDefinition } from '../core/tool';
import { Kernel } from '../kernel/kernel';
import { FunctionToolOptions, ToolFunction, toolFromFunction } from '../tools/function-tool';
import { isTool } from '../tools/tool-registry';
import { BaseAgent, BaseAgentOptions } from './base-agent';
import { AgentRunOptions } from './types';

export interface AgentOptions extends BaseAgentOptions {
  /** Prepended to every task as `<persona>\n<task>`. */
  persona?: string;
  /** Private tools. When set, the kernel's tools are not offered to the model. */
  tools?: ITool[];
}

export class Agent extends BaseAgent {
  public persona: string;
  private readonly tools = new Map<string, ITool>();

  constructor(kernel: Kernel, options: AgentOptions = {}) {
    super(kernel, 'Agent', options);
    this.persona = options.persona ?? '';
    for (const tool of options.tools ?? []) {
      this.tools.set(tool.name, tool);
    }
  }

  public addTool(toolOrFunction: ITool | ToolFunction, options?: FunctionToolOptions): ITool {
    const tool = isTool(toolOrFunction) ? toolOrFunction : toolFromFunction(toolOrFunction, options);
    this.tools.set(tool.name, tool);
    return tool;
  }

  async run(task: string, options: AgentRunOptions = {}): Promise<string> {
    this.iterations = 0;
    const prompt = this.persona ? `${this.persona}\n${task}` : task;
    this.log('debug', 'Generating response.', { tools: this.tools.size });

    const ownTools =
      this.tools.size > 0
        ? { tools: Array.from(this.tools.values()).map(toToolDefinition), toolImplementations: new Map(this.tools) }
        : {};
    const result = await this.kernel.generateText(prompt, { ...options, ...ownTools });
    this.iterations = 1;
    return result;
  }
}
