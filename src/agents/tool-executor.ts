// src/agents/tool-executor.ts

/**
 * @file ToolExecutor - Executes the tool calls a model requested during a round trip.
 * Calls run one after another in the order the model returned them. A failing call never
 * throws; it yields an unsuccessful IToolResult whose error text is fed back to the model.
 */

import { ITool, IToolResult } from '../core/tool';
import { ToolExecutionError, ValidationError } from '../core/errors';
import { ILogger, NoopLogger } from '../core/logger';
import { LLMToolCall } from '../llm/types';
import { ToolArgumentValidator } from '../tools/argument-validator';
import { invokeTool } from '../tools/tool-registry';

export interface ToolCallOutcome {
  toolCallId: string;
  toolName: string;
  result: IToolResult;
}

export class ToolExecutor {
  private readonly validator: ToolArgumentValidator;
  private readonly logger: ILogger;

  constructor(options: { validator?: ToolArgumentValidator; logger?: ILogger } = {}) {
    this.validator = options.validator ?? new ToolArgumentValidator();
    this.logger = options.logger ?? new NoopLogger();
  }

  public async executeToolCalls(
    toolCalls: LLMToolCall[],
    tools: ReadonlyMap<string, ITool>
  ): Promise<ToolCallOutcome[]> {
    const outcomes: ToolCallOutcome[] = [];
    for (const toolCall of toolCalls) {
      outcomes.push(await this.executeSingleToolCall(toolCall, tools));
    }
    return outcomes;
  }

  private async executeSingleToolCall(
    toolCall: LLMToolCall,
    tools: ReadonlyMap<string, ITool>
  ): Promise<ToolCallOutcome> {
    const toolName = toolCall.function.name;
    const toolCallId = toolCall.id;

    const tool = tools.get(toolName);
    if (tool === undefined) {
      this.logger.log('warn', 'ToolExecutor', `Model requested unknown tool "${toolName}".`);
      return {
        toolCallId,
        toolName,
        result: { success: false, data: null, error: `Tool ${toolName} not found` },
      };
    }

    try {
      const args = parseArguments(toolName, toolCall.function.arguments);
      this.logger.log('debug', 'ToolExecutor', `Executing tool "${toolName}".`, { toolCallId });
      const data = await invokeTool(tool, args, this.validator);
      return { toolCallId, toolName, result: { success: true, data } };
    } catch (error: unknown) {
      const failure = new ToolExecutionError(toolName, error);
      this.logger.log('warn', 'ToolExecutor', failure.message, { toolCallId });
      return {
        toolCallId,
        toolName,
        result: { success: false, data: null, error: failure.message, metadata: failure.metadata },
      };
    }
  }
}

function parseArguments(toolName: string, serialized: string): unknown {
  if (serialized.trim() === '') {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(serialized);
    return parsed;
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Invalid JSON arguments: ${reason}`, { arguments: serialized }, { toolName });
  }
}

/**
 * Renders a tool result as the content of a `tool` message.
 */
export function formatToolResultContent(result: IToolResult): string {
  if (!result.success) {
    return result.error ?? 'Tool execution failed.';
  }
  if (typeof result.data === 'string') {
    return result.data;
  }
  if (result.data === undefined) {
    return '';
  }
  try {
    return JSON.stringify(result.data) ?? String(result.data);
  } catch {
    // BigInt values and cyclic objects do not serialize.
    return String(result.data);
  }
}
