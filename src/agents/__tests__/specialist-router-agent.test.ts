// src/agents/__tests__/specialist-router-agent.test.ts

import { SpecialistRouterAgent } from '../specialist-router-agent';
import { Kernel } from '../../kernel/kernel';
import { RoutingExhaustedError } from '../../core/errors';
import { ScriptedAgent, ScriptedTextProvider } from '../../__tests__/fakes';

describe('SpecialistRouterAgent', () => {
  const setup = (decisions: string[], replies: string[]) => {
    const provider = new ScriptedTextProvider(decisions);
    const analyst = new ScriptedAgent('analyst', replies);
    const kernel = new Kernel({ providers: [provider] });
    return { provider, analyst, kernel };
  };

  it('should give up after exactly maxRetries rejected attempts', async () => {
    const { provider, analyst, kernel } = setup(['analyst', 'analyst', 'analyst'], ['r1', 'r2', 'r3']);
    const router = new SpecialistRouterAgent(kernel, { maxRetries: 2, specialists: { analyst } });

    await expect(router.routeWithValidation('Check totals', () => false)).rejects.toThrow(RoutingExhaustedError);
    expect(router.iterationCount).toBe(2);
    expect(analyst.tasks).toHaveLength(2);
    expect(provider.prompts[1]).toBe(
      'Previous result failed validation. Please choose a different agent from: analyst\nSubtask: Check totals'
    );
  });

  it('should correct an invalid agent name on the next attempt', async () => {
    const { provider, analyst, kernel } = setup(['nobody', 'analyst'], ['r1']);
    const router = new SpecialistRouterAgent(kernel, { specialists: { analyst } });

    expect(await router.routeWithRetries('Check totals')).toBe('r1');
    expect(provider.prompts).toEqual([
      'Given a subtask, choose the most appropriate specialist agent to handle it.\n' +
        'Available agents: analyst\nRespond with the name only.\nSubtask: Check totals',
      'The previous agent name was invalid. Please choose from the following list: analyst\nSubtask: Check totals',
    ]);
    expect(router.iterationCount).toBe(2);
  });

  it('should apply the configured validator when run', async () => {
    const { analyst, kernel } = setup(['analyst', 'analyst'], ['bad', 'ok now']);
    const router = new SpecialistRouterAgent(kernel, {
      specialists: { analyst },
      validator: async (result) => result.startsWith('ok'),
    });

    expect(await router.run('Check totals')).toBe('ok now');
    expect(router.iterationCount).toBe(2);
  });

  it('should report the attempts and task when exhausted', async () => {
    const { kernel } = setup(['nobody'], []);
    const router = new SpecialistRouterAgent(kernel, {
      maxRetries: 1,
      specialists: { analyst: new ScriptedAgent('analyst', []) },
    });

    await expect(router.run('Check totals')).rejects.toMatchObject({
      attempts: 1,
      metadata: { attempts: 1, task: 'Check totals' },
    });
  });
});
