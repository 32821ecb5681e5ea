// src/providers/__tests__/llm-text-provider.test.ts

import { buildMessages, LLMTextProvider } from '../llm-text-provider';
import { defineTool } from '../../core/tool';
import { ToolRoundLimitError } from '../../core/errors';
import { ScriptedLLMClient, textMessage, toolCallMessage } from '../../__tests__/fakes';

describe('buildMessages', () => {
  it('should order system message, history, context and prompt', () => {
    expect(
      buildMessages({
        prompt: 'Now answer.',
        systemMessage: 'Be brief.',
        context: 'Earlier notes.',
        messages: [{ role: 'assistant', content: 'Hello.' }],
      })
    ).toEqual([
      { role: 'system', content: 'Be brief.' },
      { role: 'assistant', content: 'Hello.' },
      { role: 'user', content: 'Earlier notes.' },
      { role: 'user', content: 'Now answer.' },
    ]);
  });

  it('should send just the prompt when nothing else is given', () => {
    expect(buildMessages({ prompt: 'Hi' })).toEqual([{ role: 'user', content: 'Hi' }]);
  });
});

describe('LLMTextProvider', () => {
  it('should map generation options onto the completion request', async () => {
    const client = new ScriptedLLMClient([textMessage('answer')]);
    const provider = new LLMTextProvider(client, { model: 'test-model' });

    const result = await provider.generateText({ prompt: 'Hi', temperature: 0.3, maxTokens: 20, topP: 0.5 });

    expect(result).toBe('answer');
    expect(client.calls[0].options).toEqual(
      expect.objectContaining({ model: 'test-model', temperature: 0.3, max_tokens: 20, top_p: 0.5 })
    );
  });

  it('should run the tools it is given', async () => {
    const invoke = jest.fn().mockReturnValue('sunny');
    const weather = defineTool({
      name: 'weather',
      description: 'Weather for a city.',
      parameters: { city: { type: 'string', required: true } },
      invoke,
    });
    const client = new ScriptedLLMClient([toolCallMessage('call_1', 'weather', { city: 'Austin' }), textMessage('It is sunny.')]);
    const provider = new LLMTextProvider(client);

    const result = await provider.generateText({
      prompt: 'Weather in Austin?',
      toolImplementations: new Map([[weather.name, weather]]),
    });

    expect(result).toBe('It is sunny.');
    expect(invoke).toHaveBeenCalledWith({ city: 'Austin' });
  });

  it('should stop after the configured number of continuations', async () => {
    const client = new ScriptedLLMClient([toolCallMessage('c1', 'missing'), toolCallMessage('c2', 'missing')]);
    const provider = new LLMTextProvider(client, { maxToolCallContinuations: 1 });

    await expect(provider.generateText({ prompt: 'loop' })).rejects.toThrow(ToolRoundLimitError);
    expect(client.calls).toHaveLength(2);
  });
});
