// src/llm/tool-calling-loop.ts

/**
 * @file Drives the tool-calling round trip of one text generation.
 *
 * The backend is asked for a completion. While it answers with tool calls, the assistant
 * message and one `tool` message per call are appended to the conversation and the backend
 * is asked again. The conversation only grows. The first answer without tool calls ends the
 * loop and its text is returned.
 */

import { ITool } from '../core/tool';
import { ToolRoundLimitError } from '../core/errors';
import { ILogger, NoopLogger } from '../core/logger';
import { ToolExecutor, formatToolResultContent } from '../agents/tool-executor';
import { ILLMClient, LLMCompletionOptions, LLMMessage } from './types';

export const DEFAULT_MAX_TOOL_CALL_CONTINUATIONS = 10;

export interface ToolCallingLoopOptions {
  /**
   * Number of follow-up requests allowed after tool results. The backend is called at
   * most `maxToolCallContinuations + 1` times.
   * @default 10
   */
  maxToolCallContinuations?: number;
  executor?: ToolExecutor;
  logger?: ILogger;
}

/**
 * Runs the round trip and returns the final text.
 *
 * @param messages The initial conversation. It is extended in place with the
 * assistant tool-call messages and tool results.
 * @throws ToolRoundLimitError when the model still requests tools after the last continuation.
 * @throws LLMError when the backend fails.
 */
export async function runToolCallingLoop(
  client: ILLMClient,
  messages: LLMMessage[],
  completionOptions: LLMCompletionOptions,
  tools: ReadonlyMap<string, ITool>,
  options: ToolCallingLoopOptions = {}
): Promise<string> {
  const limit = options.maxToolCallContinuations ?? DEFAULT_MAX_TOOL_CALL_CONTINUATIONS;
  const logger = options.logger ?? new NoopLogger();
  const executor = options.executor ?? new ToolExecutor({ logger });

  const requestOptions: LLMCompletionOptions = { ...completionOptions };
  if (requestOptions.tools !== undefined && requestOptions.tools.length === 0) {
    delete requestOptions.tools;
  }
  if (requestOptions.tools !== undefined && requestOptions.tool_choice === undefined) {
    requestOptions.tool_choice = 'auto';
  }

  for (let round = 0; ; round++) {
    const response = await client.generateResponse([...messages], requestOptions);
    const toolCalls = response.tool_calls ?? [];

    if (toolCalls.length === 0) {
      logger.log('debug', 'ToolCallingLoop', `Final answer after ${round} tool round(s).`);
      return response.content ?? '';
    }
    if (round >= limit) {
      logger.log('error', 'ToolCallingLoop', `Tool round limit of ${limit} exceeded.`);
      throw new ToolRoundLimitError(limit);
    }

    logger.log('info', 'ToolCallingLoop', `Model requested ${toolCalls.length} tool call(s).`, {
      tools: toolCalls.map((call) => call.function.name),
    });
    messages.push({ role: 'assistant', content: response.content, tool_calls: toolCalls });

    const outcomes = await executor.executeToolCalls(toolCalls, tools);
    for (const outcome of outcomes) {
      messages.push({
        role: 'tool',
        tool_call_id: outcome.toolCallId,
        name: outcome.toolName,
        content: formatToolResultContent(outcome.result),
      });
    }
  }
}
