// src/agents/index.ts

export * from './types';
export * from './config';
export { BaseAgent, requirePositiveInteger } from './base-agent';
export type { BaseAgentOptions } from './base-agent';
export * from './agent';
export * from './loop-agent';
export * from './router-agent';
export * from './specialist-router-agent';
export * from './task-decomposer-agent';
export * from './collaborative-agent';
export * from './memory-agent';
export * from './tool-executor';
