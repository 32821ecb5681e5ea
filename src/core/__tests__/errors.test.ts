// src/core/__tests__/errors.test.ts

import {
  ApplicationError,
  ConfigurationError,
  LLMError,
  MemoryIntegrityError,
  NoProviderError,
  NotFoundError,
  RoutingExhaustedError,
  StorageError,
  ToolExecutionError,
  ToolNotFoundError,
  ToolRoundLimitError,
  ValidationError,
} from '../errors';

describe('Core Errors', () => {
  describe('ApplicationError', () => {
    it('should create an instance with message and name', () => {
      const error = new ApplicationError('Test app error');
      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(ApplicationError);
      expect(error.message).toBe('Test app error');
      expect(error.name).toBe('ApplicationError');
      expect(error.metadata).toBeUndefined();
    });

    it('should keep metadata', () => {
      const meta = { code: 123, details: 'some details' };
      const error = new ApplicationError('Test app error with meta', meta);
      expect(error.metadata).toEqual(meta);
    });
  });

  describe('NotFoundError', () => {
    it('should name the kind and the item', () => {
      const error = new NotFoundError('agent', 'writer');
      expect(error).toBeInstanceOf(ApplicationError);
      expect(error.message).toBe('Agent "writer" not found.');
      expect(error.kind).toBe('agent');
      expect(error.itemName).toBe('writer');
      expect(error.metadata).toEqual({ kind: 'agent', name: 'writer' });
    });
  });

  describe('ToolNotFoundError', () => {
    it('should create an instance with default message', () => {
      const error = new ToolNotFoundError('myTool');
      expect(error).toBeInstanceOf(NotFoundError);
      expect(error.message).toBe('Tool "myTool" not found.');
      expect(error.name).toBe('ToolNotFoundError');
      expect(error.kind).toBe('tool');
    });

    it('should create an instance with custom message', () => {
      const error = new ToolNotFoundError('myTool', 'Custom: Tool not available');
      expect(error.message).toBe('Custom: Tool not available');
      expect(error.itemName).toBe('myTool');
    });
  });

  describe('NoProviderError', () => {
    it('should name the missing capability', () => {
      const error = new NoProviderError('embedding');
      expect(error.message).toBe('No embedding provider registered with the kernel.');
      expect(error.capability).toBe('embedding');
      expect(error.name).toBe('NoProviderError');
    });
  });

  describe('RoutingExhaustedError', () => {
    it('should expose the attempt count', () => {
      const error = new RoutingExhaustedError(2, 'summarize');
      expect(error.message).toBe('Failed to route task after 2 attempts.');
      expect(error.attempts).toBe(2);
      expect(error.metadata).toEqual({ attempts: 2, task: 'summarize' });
    });
  });

  describe('ToolExecutionError', () => {
    it('should render the cause message', () => {
      const error = new ToolExecutionError('weather', new TypeError('bad city'));
      expect(error.message).toBe('Error executing tool weather: bad city');
      expect(error.toolName).toBe('weather');
      expect(error.metadata).toEqual({ toolName: 'weather', causeName: 'TypeError' });
    });

    it('should accept non-error causes', () => {
      const error = new ToolExecutionError('weather', 'timeout');
      expect(error.message).toBe('Error executing tool weather: timeout');
    });
  });

  describe('ToolRoundLimitError', () => {
    it('should mention the limit', () => {
      const error = new ToolRoundLimitError(4);
      expect(error.message).toBe('Model requested tool calls for more than 4 consecutive rounds.');
      expect(error.limit).toBe(4);
    });
  });

  describe('LLMError', () => {
    it('should create an instance with message, errorType, and metadata', () => {
      const meta = { provider: 'openai', attempt: 1 };
      const error = new LLMError('LLM API failed', 'api_error', meta);
      expect(error).toBeInstanceOf(ApplicationError);
      expect(error.name).toBe('LLMError');
      expect(error.errorType).toBe('api_error');
      expect(error.metadata).toEqual(meta);
    });
  });

  describe('ConfigurationError', () => {
    it('should create an instance correctly', () => {
      const error = new ConfigurationError('Missing API key');
      expect(error).toBeInstanceOf(ApplicationError);
      expect(error.name).toBe('ConfigurationError');
    });
  });

  describe('ValidationError', () => {
    it('should carry validation details', () => {
      const error = new ValidationError('Invalid input', { name: 'must not be empty' }, { tool: 'x' });
      expect(error.validationDetails).toEqual({ name: 'must not be empty' });
      expect(error.metadata).toEqual({ tool: 'x' });
      expect(error.name).toBe('ValidationError');
    });
  });

  describe('MemoryIntegrityError', () => {
    it('should be a StorageError', () => {
      const error = new MemoryIntegrityError('orphaned vector');
      expect(error).toBeInstanceOf(StorageError);
      expect(error.name).toBe('MemoryIntegrityError');
    });
  });
});
