// src/agents/router-agent.ts

/**
 * @file RouterAgent - Asks the model which specialist should take a task and hands the task over.
 * An unrecognized answer falls back to the first registered specialist.
 */

import { NotFoundError, ValidationError } from '../core/errors';
import { Kernel } from '../kernel/kernel';
import { BaseAgent, BaseAgentOptions } from './base-agent';
import { AgentRunOptions, IAgent } from './types';

export interface RoutingAgentOptions extends BaseAgentOptions {
  /** Specialists keyed by the name the model is asked to answer with. */
  specialists?: Record<string, IAgent>;
  /** Instruction placed before the task. Defaults to one listing the specialists. */
  routerPrompt?: string;
}

/**
 * Specialist bookkeeping shared by the routers.
 */
export abstract class RoutingAgent extends BaseAgent {
  private readonly registry = new Map<string, IAgent>();
  private readonly customPrompt?: string;

  protected constructor(kernel: Kernel, defaultName: string, options: RoutingAgentOptions = {}) {
    super(kernel, defaultName, options);
    this.customPrompt = options.routerPrompt;
    for (const [name, agent] of Object.entries(options.specialists ?? {})) {
      this.registerSpecialist(name, agent);
    }
  }

  public registerSpecialist(name: string, agent: IAgent): void {
    const key = name.trim();
    if (key === '') {
      throw new ValidationError('Specialist name must not be empty.', { name: 'must not be empty' });
    }
    this.registry.set(key, agent);
  }

  public get specialists(): ReadonlyMap<string, IAgent> {
    return new Map(this.registry);
  }

  protected get specialistNames(): string[] {
    return Array.from(this.registry.keys());
  }

  protected findSpecialist(name: string): IAgent | undefined {
    return this.registry.get(name);
  }

  protected get routerPrompt(): string {
    return this.customPrompt ?? this.defaultRouterPrompt();
  }

  protected abstract defaultRouterPrompt(): string;

  protected assertHasSpecialists(): void {
    if (this.registry.size === 0) {
      throw new NotFoundError('agent', 'specialist', `Router "${this.name}" has no specialists registered.`);
    }
  }
}

export class RouterAgent extends RoutingAgent {
  constructor(kernel: Kernel, options: RoutingAgentOptions = {}) {
    super(kernel, 'RouterAgent', options);
  }

  protected defaultRouterPrompt(): string {
    return `Choose the agent best suited to the task.\nAvailable agents: ${this.specialistNames.join(', ')}`;
  }

  /**
   * @throws NotFoundError when no specialist is registered.
   */
  async run(task: string, options: AgentRunOptions = {}): Promise<string> {
    this.iterations = 0;
    this.assertHasSpecialists();

    const decisionPrompt = `${this.routerPrompt}\nTask: ${task}\nRespond ONLY with the name of the best agent.`;
    const chosen = (await this.kernel.generateText(decisionPrompt)).trim();
    this.iterations = 1;

    let target = chosen;
    let specialist = this.findSpecialist(chosen);
    if (specialist === undefined) {
      target = this.specialistNames[0];
      specialist = this.findSpecialist(target);
      this.log('warn', `Unknown agent "${chosen}"; falling back to "${target}".`);
    }
    if (specialist === undefined) {
      throw new NotFoundError('agent', target);
    }

    this.log('info', `Routing to agent: ${target}`);
    return specialist.run(task, options);
  }
}
