// src/agents/__tests__/task-decomposer-agent.test.ts

import { TaskDecomposerAgent } from '../task-decomposer-agent';
import { Kernel } from '../../kernel/kernel';
import { ScriptedAgent, ScriptedTextProvider } from '../../__tests__/fakes';

describe('TaskDecomposerAgent', () => {
  describe('parseSubtasks', () => {
    it('should keep the text after the step number', () => {
      expect(TaskDecomposerAgent.parseSubtasks('1. Fetch data\n2. Analyze data\n3. Write report')).toEqual([
        'Fetch data',
        'Analyze data',
        'Write report',
      ]);
    });

    it('should accept dash bullets and drop lines without a delimiter', () => {
      expect(TaskDecomposerAgent.parseSubtasks('Plan\n- Collect inputs\r\n\n-   \n- Summarize')).toEqual([
        'Collect inputs',
        'Summarize',
      ]);
    });

    it('should split on the first period only', () => {
      expect(TaskDecomposerAgent.parseSubtasks('1. Read v1.2 notes.')).toEqual(['Read v1.2 notes.']);
    });
  });

  it('should run every subtask in order and label the results', async () => {
    const provider = new ScriptedTextProvider(['1. Fetch data\n2. Analyze data']);
    const executor = new ScriptedAgent('executor', ['rows', 'trend']);
    const agent = new TaskDecomposerAgent(new Kernel({ providers: [provider] }), { executor });

    const result = await agent.run('Build a sales report');

    expect(result).toBe('Subtask 1 Result:\nrows\n\nSubtask 2 Result:\ntrend\n');
    expect(executor.tasks).toEqual(['Fetch data', 'Analyze data']);
    expect(agent.iterationCount).toBe(2);
    expect(provider.prompts[0]).toBe(
      'You are a planning agent.\n' +
        'Decompose the following task into 3–5 concrete, sequential subtasks:\n\n' +
        'Task: Build a sales report\n\n' +
        'Return the list of subtasks as plain numbered steps.'
    );
  });

  it('should return an empty result when the plan has no subtasks', async () => {
    const log = jest.fn();
    const provider = new ScriptedTextProvider(['No plan available']);
    const executor = new ScriptedAgent('executor', []);
    const agent = new TaskDecomposerAgent(new Kernel({ providers: [provider], logger: { log } }), { executor });

    expect(await agent.coordinateExecution('Anything')).toBe('');
    expect(executor.tasks).toEqual([]);
    expect(log).toHaveBeenCalledWith('warn', 'TaskDecomposerAgent', 'The plan contained no subtasks.', undefined);
  });
});
