// src/core/tool.ts

/**
 * @file Defines the tool value type, its parameter schema and the wire-format
 * definition a text provider forwards to a model backend.
 */

import type { JSONSchema7, JSONSchema7Type } from 'json-schema';
import { ValidationError } from './errors';

/**
 * The primitive JSON-schema types a tool parameter can declare.
 */
export type ToolParameterType = 'string' | 'integer' | 'number' | 'boolean' | 'array' | 'object';

export const TOOL_PARAMETER_TYPES: readonly ToolParameterType[] = [
  'string',
  'integer',
  'number',
  'boolean',
  'array',
  'object',
];

/**
 * Represents a single parameter of a tool.
 */
export interface IToolParameter {
  type: ToolParameterType;
  required: boolean;
  /** Value applied when the caller omits an optional parameter. */
  default?: unknown;
  /** Human-readable description; defaults to `Parameter: <name>` in the definition. */
  description?: string;
  /**
   * Optional JSON schema fragment with extra constraints (enum, format, items...).
   * It is merged into the parameter's property schema.
   */
  schema?: JSONSchema7;
  /**
   * The type is a placeholder for an undeclared one. The definition still advertises `type`,
   * but argument validation accepts a value of any JSON type.
   */
  untyped?: boolean;
}

/**
 * Parameter name → parameter description, in declaration order.
 */
export type ToolParameters = Record<string, IToolParameter>;

/**
 * How the underlying callable receives its arguments.
 * - 'object': a single argument object keyed by parameter name.
 * - 'positional': one argument per parameter, in declaration order.
 */
export type ToolArgumentStyle = 'object' | 'positional';

/**
 * The callable behind a tool. It may return a value or a promise of one;
 * callers always await the result.
 */
export type ToolInvoke = (args: Record<string, unknown>) => unknown;

/**
 * An invocable, schema-described unit a model may request mid-generation.
 * Tools are built once with `defineTool` and never mutated afterwards.
 */
export interface ITool {
  readonly name: string;
  readonly description: string;
  readonly parameters: Readonly<ToolParameters>;
  invoke: ToolInvoke;
}

/**
 * The wire shape of a tool catalog entry.
 */
export interface IToolDefinition {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: {
      type: 'object';
      properties: Record<string, JSONSchema7>;
      required: string[];
    };
  };
}

/**
 * Represents the standardized result of one tool execution inside a round trip.
 */
export interface IToolResult<TData = unknown> {
  success: boolean;
  data: TData;
  error?: string;
  metadata?: Record<string, unknown>;
}

export interface ToolSpec {
  name: string;
  description: string;
  parameters?: ToolParameters;
  invoke: ToolInvoke;
}

/**
 * Builds a tool value. Name and description must be non-empty after trimming.
 */
export function defineTool(spec: ToolSpec): ITool {
  const name = spec.name.trim();
  const description = spec.description.trim();
  if (name === '') {
    throw new ValidationError('Tool name must not be empty.', { name: 'must not be empty' });
  }
  if (description === '') {
    throw new ValidationError(`Tool "${name}" must have a non-empty description.`, {
      description: 'must not be empty',
    });
  }

  const parameters: ToolParameters = {};
  for (const [paramName, param] of Object.entries(spec.parameters ?? {})) {
    if (!TOOL_PARAMETER_TYPES.includes(param.type)) {
      throw new ValidationError(`Parameter "${paramName}" of tool "${name}" has unsupported type "${param.type}".`, {
        [paramName]: `unsupported type ${param.type}`,
      });
    }
    parameters[paramName] = Object.freeze({ ...param });
  }

  return Object.freeze({
    name,
    description,
    parameters: Object.freeze(parameters),
    invoke: spec.invoke,
  });
}

/**
 * Renders the JSON-schema property for a single parameter.
 */
export function parameterToSchema(name: string, param: IToolParameter): JSONSchema7 {
  const property: JSONSchema7 = {
    ...(param.schema ?? {}),
    type: param.type,
    description: param.description ?? `Parameter: ${name}`,
  };
  if (param.default !== undefined) {
    property.default = toJsonValue(param.default);
  }
  return property;
}

/**
 * Renders a tool as the `{ type: 'function', function: {...} }` catalog entry.
 */
export function toToolDefinition(tool: ITool): IToolDefinition {
  const properties: Record<string, JSONSchema7> = {};
  const required: string[] = [];
  for (const [name, param] of Object.entries(tool.parameters)) {
    properties[name] = parameterToSchema(name, param);
    if (param.required) {
      required.push(name);
    }
  }
  return {
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: { type: 'object', properties, required },
    },
  };
}

function toJsonValue(value: unknown): JSONSchema7Type {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value;
  }
  const serialized = JSON.stringify(value);
  if (serialized === undefined) {
    return null;
  }
  const parsed: JSONSchema7Type = JSON.parse(serialized);
  return parsed;
}
