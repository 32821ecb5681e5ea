// src/tools/tool-registry.ts

/**
 * @file ToolRegistry - Holds named tools, renders their catalog definitions and invokes them.
 * Registering a tool under a name that already exists replaces the earlier tool.
 */

import { ITool, IToolDefinition, toToolDefinition } from '../core/tool';
import { ToolNotFoundError } from '../core/errors';
import { ILogger, NoopLogger } from '../core/logger';
import { FunctionToolOptions, ToolFunction, toolFromFunction } from './function-tool';
import { ToolArgumentValidator } from './argument-validator';

export function isTool(value: ITool | ToolFunction): value is ITool {
  return typeof value !== 'function';
}

/**
 * Validates arguments against the tool's schema, then calls it and awaits the result,
 * whether the tool body is synchronous or returns a promise.
 */
export async function invokeTool(
  tool: ITool,
  args: unknown,
  validator: ToolArgumentValidator
): Promise<unknown> {
  const validated = validator.validate(tool, args);
  return await tool.invoke(validated);
}

export class ToolRegistry {
  private readonly tools = new Map<string, ITool>();
  private readonly validator: ToolArgumentValidator;
  private readonly logger: ILogger;

  constructor(options: { logger?: ILogger; validator?: ToolArgumentValidator } = {}) {
    this.logger = options.logger ?? new NoopLogger();
    this.validator = options.validator ?? new ToolArgumentValidator();
  }

  /**
   * Registers a tool, or builds one from a plain function first.
   * A tool with the same name as an existing one replaces it.
   *
   * @throws ValidationError if an explicit name or description is empty after trimming.
   */
  public register(toolOrFunction: ITool | ToolFunction, options?: FunctionToolOptions): ITool {
    const tool = isTool(toolOrFunction) ? toolOrFunction : toolFromFunction(toolOrFunction, options);
    if (this.tools.has(tool.name)) {
      this.logger.log('warn', 'ToolRegistry', `Tool "${tool.name}" replaced.`);
    }
    this.tools.set(tool.name, tool);
    this.logger.log('debug', 'ToolRegistry', `Registered tool "${tool.name}". Total: ${this.tools.size}`);
    return tool;
  }

  public get(name: string): ITool | undefined {
    return this.tools.get(name);
  }

  public has(name: string): boolean {
    return this.tools.has(name);
  }

  public get size(): number {
    return this.tools.size;
  }

  /**
   * Tools in registration order.
   */
  public list(): ITool[] {
    return Array.from(this.tools.values());
  }

  /**
   * Name → tool view handed to text providers as their tool implementations.
   */
  public implementations(): ReadonlyMap<string, ITool> {
    return new Map(this.tools);
  }

  public definitions(): IToolDefinition[] {
    return this.list().map(toToolDefinition);
  }

  /**
   * Resolves the tool and invokes it with the given arguments.
   *
   * @throws ToolNotFoundError if the name is not registered.
   * @throws ValidationError if the arguments do not match the tool's parameters.
   */
  public async invoke(toolOrName: ITool | string, args: Record<string, unknown> = {}): Promise<unknown> {
    const tool = typeof toolOrName === 'string' ? this.tools.get(toolOrName) : toolOrName;
    if (tool === undefined) {
      throw new ToolNotFoundError(String(toolOrName));
    }
    return invokeTool(tool, args, this.validator);
  }

  public get argumentValidator(): ToolArgumentValidator {
    return this.validator;
  }

  public clear(): void {
    this.tools.clear();
  }
}
