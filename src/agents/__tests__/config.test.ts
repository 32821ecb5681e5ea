// src/agents/__tests__/config.test.ts

import { DEFAULT_AGENT_DEFAULTS } from '../config';

describe('DEFAULT_AGENT_DEFAULTS', () => {
  it('should hold the documented defaults', () => {
    expect(DEFAULT_AGENT_DEFAULTS).toEqual({
      maxIterations: 3,
      stopPhrase: 'Final version',
      maxRetries: 3,
      memorySearchLimit: 5,
      collaborativeMaxIterations: 10,
    });
  });
});
