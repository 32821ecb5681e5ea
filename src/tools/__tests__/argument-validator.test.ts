// src/tools/__tests__/argument-validator.test.ts

import { ToolArgumentValidator } from '../argument-validator';
import { defineTool } from '../../core/tool';
import { ValidationError } from '../../core/errors';

const weatherTool = defineTool({
  name: 'weather',
  description: 'Current weather for a city.',
  parameters: {
    city: { type: 'string', required: true },
    days: { type: 'integer', required: false, default: 1 },
  },
  invoke: jest.fn(),
});

describe('ToolArgumentValidator', () => {
  const validator = new ToolArgumentValidator();

  it('should apply declared defaults without touching the input', () => {
    const args = { city: 'Oslo' };
    expect(validator.validate(weatherTool, args)).toEqual({ city: 'Oslo', days: 1 });
    expect(args).toEqual({ city: 'Oslo' });
  });

  it('should report missing required arguments', () => {
    expect(() => validator.validate(weatherTool, {})).toThrow("must have required property 'city'");
  });

  it('should reject unknown arguments', () => {
    expect(() => validator.validate(weatherTool, { city: 'Oslo', country: 'NO' })).toThrow(
      'must NOT have additional properties'
    );
  });

  it('should reject arguments of the wrong type', () => {
    expect(() => validator.validate(weatherTool, { city: 'Oslo', days: 'two' })).toThrow(ValidationError);
  });

  it('should accept any JSON type for parameters without a declared type', () => {
    const echo = defineTool({
      name: 'echo',
      description: 'Echoes a value.',
      parameters: { value: { type: 'object', required: true, untyped: true } },
      invoke: jest.fn(),
    });
    expect(validator.validate(echo, { value: 'Austin' })).toEqual({ value: 'Austin' });
    expect(validator.validate(echo, { value: 3 })).toEqual({ value: 3 });
    expect(() => validator.validate(echo, {})).toThrow("must have required property 'value'");
  });

  it('should reject payloads that are not objects', () => {
    expect(() => validator.validate(weatherTool, ['Oslo'])).toThrow('Arguments for tool "weather" must be an object.');
  });
});
