// src/agents/__tests__/tool-executor.test.ts

import { formatToolResultContent, ToolExecutor } from '../tool-executor';
import { defineTool, ITool } from '../../core/tool';
import { LLMToolCall } from '../../llm/types';

const call = (id: string, name: string, args: string): LLMToolCall => ({
  id,
  type: 'function',
  function: { name, arguments: args },
});

describe('ToolExecutor', () => {
  let divide: jest.Mock;
  let tools: Map<string, ITool>;
  let executor: ToolExecutor;

  beforeEach(() => {
    divide = jest.fn(({ a, b }: { a: number; b: number }) => {
      if (b === 0) throw new Error('division by zero');
      return a / b;
    });
    const tool = defineTool({
      name: 'divide',
      description: 'Divides a by b.',
      parameters: { a: { type: 'number', required: true }, b: { type: 'number', required: true } },
      invoke: divide,
    });
    tools = new Map([[tool.name, tool]]);
    executor = new ToolExecutor();
  });

  it('should execute calls in order and keep their ids', async () => {
    const outcomes = await executor.executeToolCalls(
      [call('c1', 'divide', '{"a":6,"b":3}'), call('c2', 'divide', '{"a":1,"b":4}')],
      tools
    );

    expect(outcomes).toEqual([
      { toolCallId: 'c1', toolName: 'divide', result: { success: true, data: 2 } },
      { toolCallId: 'c2', toolName: 'divide', result: { success: true, data: 0.25 } },
    ]);
  });

  it('should turn a throwing tool into a failed result', async () => {
    const [outcome] = await executor.executeToolCalls([call('c1', 'divide', '{"a":1,"b":0}')], tools);

    expect(outcome.result).toEqual({
      success: false,
      data: null,
      error: 'Error executing tool divide: division by zero',
      metadata: { toolName: 'divide', causeName: 'Error' },
    });
  });

  it('should report unknown tools', async () => {
    const [outcome] = await executor.executeToolCalls([call('c1', 'multiply', '{}')], tools);
    expect(outcome.result).toEqual({ success: false, data: null, error: 'Tool multiply not found' });
  });

  it('should reject arguments that fail the schema without invoking the tool', async () => {
    const [outcome] = await executor.executeToolCalls([call('c1', 'divide', '{"a":1}')], tools);

    expect(outcome.result.success).toBe(false);
    expect(outcome.result.error).toMatch(/^Error executing tool divide: /);
    expect(divide).not.toHaveBeenCalled();
  });

  it('should treat empty argument text as no arguments', async () => {
    const noop = defineTool({ name: 'noop', description: 'Does nothing.', invoke: () => 'done' });
    const [outcome] = await executor.executeToolCalls([call('c1', 'noop', '')], new Map([[noop.name, noop]]));
    expect(outcome.result).toEqual({ success: true, data: 'done' });
  });
});

describe('formatToolResultContent', () => {
  it('should render each kind of result as message text', () => {
    expect(formatToolResultContent({ success: false, data: null, error: 'nope' })).toBe('nope');
    expect(formatToolResultContent({ success: false, data: null })).toBe('Tool execution failed.');
    expect(formatToolResultContent({ success: true, data: 'plain' })).toBe('plain');
    expect(formatToolResultContent({ success: true, data: undefined })).toBe('');
    expect(formatToolResultContent({ success: true, data: [1, 2] })).toBe('[1,2]');
    expect(formatToolResultContent({ success: true, data: BigInt(3) })).toBe('3');
  });
});
