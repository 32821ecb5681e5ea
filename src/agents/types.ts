// src/agents/types.ts

/**
 * @file Defines the agent contract shared by every control-flow variant.
 */

import { GenerationOptions } from '../providers/types';

/**
 * Generation options an agent forwards to the kernel or to the agents it delegates to.
 */
export type AgentRunOptions = GenerationOptions;

/**
 * A composable unit that turns a task into text, possibly by delegating to other agents.
 */
export interface IAgent {
  name: string;
  /** Steps taken by the current or most recent run. Reset to 0 when a run starts. */
  readonly iterationCount: number;
  run(task: string, options?: AgentRunOptions): Promise<string>;
}

/**
 * Stops an iterative loop: a predicate over the latest result, or a phrase matched
 * case-insensitively as a substring.
 */
export type StopCondition = string | ((result: string) => boolean);

/**
 * Accepts or rejects a specialist's result. May be asynchronous.
 */
export type ResultValidator = (result: string) => boolean | Promise<boolean>;
