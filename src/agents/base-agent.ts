// src/agents/base-agent.ts

/**
 * @file BaseAgent - Shared state of every agent: its name, the kernel it was built with,
 * a logger and the per-run iteration counter.
 */

import { ILogger, LogLevel } from '../core/logger';
import { ValidationError } from '../core/errors';
import { Kernel } from '../kernel/kernel';
import { AgentRunOptions, IAgent } from './types';

export interface BaseAgentOptions {
  name?: string;
  /** Defaults to the kernel's logger. */
  logger?: ILogger;
}

export abstract class BaseAgent implements IAgent {
  public name: string;
  protected readonly kernel: Kernel;
  protected readonly logger: ILogger;
  protected iterations = 0;

  protected constructor(kernel: Kernel, defaultName: string, options: BaseAgentOptions = {}) {
    this.kernel = kernel;
    this.name = options.name ?? defaultName;
    this.logger = options.logger ?? kernel.logger;
  }

  public get iterationCount(): number {
    return this.iterations;
  }

  public abstract run(task: string, options?: AgentRunOptions): Promise<string>;

  protected log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    this.logger.log(level, this.name, message, meta);
  }
}

/**
 * @throws ValidationError unless `value` is an integer of at least 1.
 */
export function requirePositiveInteger(field: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationError(`${field} must be a positive integer, got ${value}.`, {
      [field]: 'must be a positive integer',
    });
  }
  return value;
}
