// src/tools/function-tool.ts

/**
 * @file Builds a tool from a plain function by introspecting its parameter list once.
 */

import { defineTool, IToolParameter, ITool, ToolParameters } from '../core/tool';
import { ValidationError } from '../core/errors';
import { sanitizeIdForLLM } from '../core/utils';
import { introspectFunction } from './function-introspection';

/**
 * Any function; its argument types are checked by the tool's parameter schema at call time.
 */
export type ToolFunction = (...args: never[]) => unknown;

export interface FunctionToolOptions {
  /** Tool name. Defaults to the function's identifier. */
  name?: string;
  /** Tool description. Defaults to `Calls <name>.` */
  description?: string;
  /**
   * Per-parameter overrides (type, description, default, extra schema) layered on
   * top of what introspection finds.
   */
  parameters?: Record<string, Partial<IToolParameter>>;
}

export function toolFromFunction(fn: ToolFunction, options: FunctionToolOptions = {}): ITool {
  const name = options.name ?? deriveName(fn);
  const signature = introspectFunction(fn);
  const hints = options.parameters ?? {};

  const known = new Set(signature.parameters.map((p) => p.name));
  const unknownHints = Object.keys(hints).filter((hintName) => !known.has(hintName));
  if (unknownHints.length > 0) {
    throw new ValidationError(
      `Parameter hints for "${name}" name parameters the function does not declare: ${unknownHints.join(', ')}.`,
      { parameters: unknownHints }
    );
  }

  const parameters: ToolParameters = {};
  for (const introspected of signature.parameters) {
    const hint = hints[introspected.name] ?? {};
    const parameter: IToolParameter = {
      type: hint.type ?? introspected.type,
      required: hint.required ?? introspected.required,
    };
    const defaultValue = hint.default ?? introspected.default;
    if (defaultValue !== undefined) parameter.default = defaultValue;
    if (hint.description !== undefined) parameter.description = hint.description;
    if (hint.schema !== undefined) parameter.schema = hint.schema;
    if (hint.type === undefined && introspected.untyped) parameter.untyped = true;
    parameters[introspected.name] = parameter;
  }

  const order = signature.parameters.map((p) => p.name);
  const invoke =
    signature.style === 'object'
      ? (args: Record<string, unknown>): unknown => Reflect.apply(fn, undefined, [args])
      : (args: Record<string, unknown>): unknown =>
          Reflect.apply(
            fn,
            undefined,
            order.map((paramName) => args[paramName])
          );

  return defineTool({
    name,
    description: options.description ?? `Calls ${name}.`,
    parameters,
    invoke,
  });
}

function deriveName(fn: ToolFunction): string {
  if (fn.name.trim() === '') {
    throw new ValidationError('Anonymous functions need an explicit tool name.', { name: 'missing' });
  }
  return sanitizeIdForLLM(fn.name);
}
