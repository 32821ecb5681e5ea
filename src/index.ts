/**
 * @file Entry point of the agent kernel.
 * Exports the kernel, its providers, the tool layer, the agent variants and configuration helpers.
 */

// --- Core Abstractions ---
export type {
  ITool,
  IToolDefinition,
  IToolParameter,
  IToolResult,
  ToolParameters,
  ToolParameterType,
  ToolSpec,
} from './core/tool';
export { defineTool, toToolDefinition, parameterToSchema } from './core/tool';
export { sanitizeIdForLLM } from './core/utils';
export {
  ApplicationError,
  ConfigurationError,
  ValidationError,
  NotFoundError,
  ToolNotFoundError,
  NoProviderError,
  RoutingExhaustedError,
  ToolExecutionError,
  ToolRoundLimitError,
  LLMError,
  StorageError,
  MemoryIntegrityError,
} from './core/errors';
export type { ILogger, LogLevel } from './core/logger';
export { ConsoleLogger, NoopLogger, createLogger } from './core/logger';

// --- Tools ---
export { ToolRegistry } from './tools/tool-registry';
export { toolFromFunction } from './tools/function-tool';
export type { FunctionToolOptions, ToolFunction } from './tools/function-tool';
export { ToolArgumentValidator } from './tools/argument-validator';

// --- LLM ---
export type { ILLMClient, IEmbeddingClient, LLMMessage, LLMToolCall, LLMToolChoice, LLMCompletionOptions } from './llm/types';
export { OpenAIAdapter } from './llm/adapters/openai/openai-adapter';
export type { OpenAIAdapterOptions } from './llm/adapters/openai/openai-adapter';
export { runToolCallingLoop } from './llm/tool-calling-loop';

// --- Providers ---
export * from './providers/types';
export { LLMTextProvider } from './providers/llm-text-provider';
export { OpenAITextProvider } from './providers/openai-text-provider';
export { OpenAIEmbeddingProvider } from './providers/openai-embedding-provider';
export { InMemoryStorageProvider } from './providers/in-memory-storage-provider';
export { VectorMemoryProvider } from './providers/vector-memory-provider';
export type { MemoryIntegrityReport } from './providers/vector-memory-provider';

// --- Kernel ---
export { Kernel } from './kernel/kernel';
export type { KernelOptions, GenerateTextOptions } from './kernel/kernel';

// --- Agents ---
export * from './agents';

// --- Configuration ---
export { loadSettings, parseSettingsFile, DEFAULT_SETTINGS } from './config/settings';
export type { Settings, SettingsFile } from './config/settings';
export { createKernel } from './facades/kernel-builder';
export type { KernelOverrides } from './facades/kernel-builder';
