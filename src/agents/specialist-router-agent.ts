// src/agents/specialist-router-agent.ts

/**
 * @file SpecialistRouterAgent - Routes a subtask to a specialist, optionally validates the
 * result and retries with a corrective prompt. Running out of attempts is an error.
 */

import { RoutingExhaustedError } from '../core/errors';
import { Kernel } from '../kernel/kernel';
import { requirePositiveInteger } from './base-agent';
import { RoutingAgent, RoutingAgentOptions } from './router-agent';
import { AgentRunOptions, ResultValidator } from './types';

export interface SpecialistRouterAgentOptions extends RoutingAgentOptions {
  /** @default 3 */
  maxRetries?: number;
  /** Validator used by `run`. */
  validator?: ResultValidator;
}

export class SpecialistRouterAgent extends RoutingAgent {
  public readonly maxRetries: number;
  private readonly validator?: ResultValidator;

  constructor(kernel: Kernel, options: SpecialistRouterAgentOptions = {}) {
    super(kernel, 'SpecialistRouterAgent', options);
    this.maxRetries = requirePositiveInteger('maxRetries', options.maxRetries ?? kernel.agentDefaults.maxRetries);
    this.validator = options.validator;
  }

  protected defaultRouterPrompt(): string {
    return (
      'Given a subtask, choose the most appropriate specialist agent to handle it.\n' +
      `Available agents: ${this.specialistNames.join(', ')}\n` +
      'Respond with the name only.'
    );
  }

  async run(task: string, options: AgentRunOptions = {}): Promise<string> {
    return this.routeWithValidation(task, this.validator, options);
  }

  /**
   * Each attempt asks for a specialist name and, when it resolves, runs the specialist.
   * An unknown name or a rejected result consumes the attempt.
   *
   * @throws RoutingExhaustedError after `maxRetries` attempts without an accepted result.
   */
  async routeWithValidation(task: string, validator?: ResultValidator, options: AgentRunOptions = {}): Promise<string> {
    this.iterations = 0;
    let routingPrompt = `${this.routerPrompt}\nSubtask: ${task}`;

    while (this.iterations < this.maxRetries) {
      this.iterations++;
      const agentName = (await this.kernel.generateText(routingPrompt)).trim();
      const names = this.specialistNames.join(', ');
      const specialist = this.findSpecialist(agentName);

      if (specialist === undefined) {
        this.log('warn', `Attempt ${this.iterations}: invalid agent name "${agentName}".`);
        routingPrompt = `The previous agent name was invalid. Please choose from the following list: ${names}\nSubtask: ${task}`;
        continue;
      }

      this.log('info', `Routing to agent: ${agentName}`);
      const result = await specialist.run(task, options);
      if (validator === undefined || (await validator(result))) {
        return result;
      }

      this.log('warn', `Attempt ${this.iterations}: result from "${agentName}" failed validation.`);
      routingPrompt = `Previous result failed validation. Please choose a different agent from: ${names}\nSubtask: ${task}`;
    }

    throw new RoutingExhaustedError(this.maxRetries, task);
  }

  async routeWithRetries(task: string, options: AgentRunOptions = {}): Promise<string> {
    return this.routeWithValidation(task, undefined, options);
  }
}
