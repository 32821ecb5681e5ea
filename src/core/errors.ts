// src/core/errors.ts

/**
 * @file Defines custom error classes for the kernel and its agents.
 * Structural errors (missing providers, bad registrations, unknown names) are thrown
 * to the caller; tool failures inside a round trip are turned into model-visible messages.
 */

import type { ProviderCapability } from '../providers/types';

/**
 * Base class for custom application errors.
 * This allows catching all kernel errors with `instanceof ApplicationError`.
 */
export class ApplicationError extends Error {
  /**
   * Optional additional data associated with the error.
   */
  public readonly metadata?: Record<string, unknown>;

  constructor(message: string, metadata?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.metadata = metadata;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Error thrown during configuration validation or when configuration is missing.
 */
export class ConfigurationError extends ApplicationError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(message, metadata);
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when an input validation fails, e.g. an empty tool name at registration
 * or tool arguments that do not match the tool's parameter schema.
 */
export class ValidationError extends ApplicationError {
  public readonly validationDetails?: Record<string, string | string[]>;

  constructor(
    message: string,
    validationDetails?: Record<string, string | string[]>,
    metadata?: Record<string, unknown>
  ) {
    super(message, metadata);
    this.name = 'ValidationError';
    this.validationDetails = validationDetails;
  }
}

export type NotFoundKind = 'tool' | 'agent' | 'provider' | 'memory';

/**
 * Error thrown when a named tool, agent or memory entry does not resolve.
 */
export class NotFoundError extends ApplicationError {
  public readonly kind: NotFoundKind;
  public readonly itemName: string;

  constructor(kind: NotFoundKind, itemName: string, message?: string) {
    const label = kind.charAt(0).toUpperCase() + kind.slice(1);
    super(message ?? `${label} "${itemName}" not found.`, { kind, name: itemName });
    this.name = 'NotFoundError';
    this.kind = kind;
    this.itemName = itemName;
  }
}

/**
 * Error thrown when a specified tool cannot be found.
 */
export class ToolNotFoundError extends NotFoundError {
  constructor(toolName: string, message?: string) {
    super('tool', toolName, message);
    this.name = 'ToolNotFoundError';
  }
}

/**
 * Error thrown when an operation needs a provider capability that has no registrations.
 */
export class NoProviderError extends ApplicationError {
  public readonly capability: ProviderCapability;

  constructor(capability: ProviderCapability, message?: string) {
    super(message ?? `No ${capability} provider registered with the kernel.`, { capability });
    this.name = 'NoProviderError';
    this.capability = capability;
  }
}

/**
 * Error thrown when the specialist router runs out of attempts without a valid result.
 */
export class RoutingExhaustedError extends ApplicationError {
  public readonly attempts: number;

  constructor(attempts: number, task: string) {
    super(`Failed to route task after ${attempts} attempts.`, { attempts, task });
    this.name = 'RoutingExhaustedError';
    this.attempts = attempts;
  }
}

/**
 * A tool invocation that failed during a tool-calling round trip.
 * It is rendered into the conversation for the model and never thrown out of `generateText`.
 */
export class ToolExecutionError extends ApplicationError {
  public readonly toolName: string;

  constructor(toolName: string, cause: unknown) {
    const causeMessage = cause instanceof Error ? cause.message : String(cause);
    super(`Error executing tool ${toolName}: ${causeMessage}`, {
      toolName,
      causeName: cause instanceof Error ? cause.name : undefined,
    });
    this.name = 'ToolExecutionError';
    this.toolName = toolName;
  }
}

/**
 * Error thrown when a model keeps requesting tool calls past the configured continuation cap.
 */
export class ToolRoundLimitError extends ApplicationError {
  public readonly limit: number;

  constructor(limit: number) {
    super(`Model requested tool calls for more than ${limit} consecutive rounds.`, { limit });
    this.name = 'ToolRoundLimitError';
    this.limit = limit;
  }
}

/**
 * Error thrown when an LLM interaction fails or returns an unexpected response.
 */
export class LLMError extends ApplicationError {
  /**
   * The type of LLM error (e.g., 'api_error', 'rate_limit', 'sdk_error').
   */
  public readonly errorType?: string;

  constructor(message: string, errorType?: string, metadata?: Record<string, unknown>) {
    super(message, metadata);
    this.name = 'LLMError';
    this.errorType = errorType;
  }
}

/**
 * Error related to vector storage operations.
 */
export class StorageError extends ApplicationError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(message, metadata);
    this.name = 'StorageError';
  }
}

/**
 * Error thrown when the text-id to vector-id mapping of a text memory is inconsistent.
 */
export class MemoryIntegrityError extends StorageError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(message, metadata);
    this.name = 'MemoryIntegrityError';
  }
}
