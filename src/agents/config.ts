// src/agents/config.ts

/**
 * @file Default settings for the agent variants.
 */

export interface AgentDefaults {
  /**
   * Iteration cap of the loop agent.
   * @default 3
   */
  maxIterations: number;

  /**
   * Phrase that ends loop and collaborative runs, matched case-insensitively.
   * @default 'Final version'
   */
  stopPhrase: string;

  /**
   * Routing attempts of the specialist router before it gives up.
   * @default 3
   */
  maxRetries: number;

  /**
   * Number of prior entries the memory agent retrieves.
   * @default 5
   */
  memorySearchLimit: number;

  /**
   * Iteration cap of the collaborative agent.
   * @default 10
   */
  collaborativeMaxIterations: number;
}

export const DEFAULT_AGENT_DEFAULTS: Readonly<AgentDefaults> = {
  maxIterations: 3,
  stopPhrase: 'Final version',
  maxRetries: 3,
  memorySearchLimit: 5,
  collaborativeMaxIterations: 10,
};
