// src/tools/argument-validator.ts

/**
 * @file Validates tool arguments against the tool's parameter schema with AJV.
 * Declared defaults are filled in and unknown arguments are rejected. Parameters marked
 * `untyped` are checked for presence only.
 */

import Ajv, { ErrorObject, ValidateFunction } from 'ajv';
import type { JSONSchema7 } from 'json-schema';
import addFormats from 'ajv-formats';
import { ITool, toToolDefinition } from '../core/tool';
import { ValidationError } from '../core/errors';

export class ToolArgumentValidator {
  private readonly ajv: Ajv;
  private readonly compiled = new WeakMap<ITool, ValidateFunction>();

  constructor() {
    this.ajv = new Ajv({
      allErrors: true,
      strict: false,
      useDefaults: true,
      allowUnionTypes: true,
    });
    addFormats(this.ajv);
  }

  /**
   * Returns a validated copy of `args` with declared defaults applied.
   *
   * @throws ValidationError when the arguments do not satisfy the schema.
   */
  public validate(tool: ITool, args: unknown): Record<string, unknown> {
    if (!isPlainRecord(args)) {
      throw new ValidationError(`Arguments for tool "${tool.name}" must be an object.`, {
        arguments: 'must be an object',
      });
    }

    const data: Record<string, unknown> = { ...args };
    const validate = this.getValidator(tool);
    if (!validate(data)) {
      const errors = validate.errors ?? [];
      throw new ValidationError(
        `Invalid arguments for tool "${tool.name}": ${this.ajv.errorsText(errors, { dataVar: 'arguments' })}`,
        { errors: errors.map(formatError) },
        { toolName: tool.name }
      );
    }
    return data;
  }

  private getValidator(tool: ITool): ValidateFunction {
    const cached = this.compiled.get(tool);
    if (cached !== undefined) {
      return cached;
    }
    const { parameters } = toToolDefinition(tool).function;
    const properties: Record<string, JSONSchema7> = {};
    for (const [name, property] of Object.entries(parameters.properties)) {
      properties[name] = tool.parameters[name]?.untyped ? withoutType(property) : property;
    }
    const validate = this.ajv.compile({ ...parameters, properties, additionalProperties: false });
    this.compiled.set(tool, validate);
    return validate;
  }
}

function withoutType(schema: JSONSchema7): JSONSchema7 {
  const { type: _type, ...rest } = schema;
  return rest;
}

function formatError(error: ErrorObject): string {
  return `${error.instancePath || 'root'} ${error.message ?? 'is invalid'}`;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
