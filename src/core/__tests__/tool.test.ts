// src/core/__tests__/tool.test.ts

import { defineTool, parameterToSchema, toToolDefinition } from '../tool';
import { ValidationError } from '../errors';

describe('defineTool', () => {
  const invoke = jest.fn();

  it('should trim name and description and freeze the result', () => {
    const tool = defineTool({ name: '  weather ', description: ' Current weather. ', invoke });
    expect(tool.name).toBe('weather');
    expect(tool.description).toBe('Current weather.');
    expect(Object.isFrozen(tool)).toBe(true);
  });

  it('should reject an empty name', () => {
    expect(() => defineTool({ name: '   ', description: 'x', invoke })).toThrow(ValidationError);
  });

  it('should reject an empty description', () => {
    expect(() => defineTool({ name: 'weather', description: '', invoke })).toThrow(
      'Tool "weather" must have a non-empty description.'
    );
  });
});

describe('toToolDefinition', () => {
  it('should render the function catalog entry', () => {
    const tool = defineTool({
      name: 'weather',
      description: 'Current weather.',
      parameters: {
        city: { type: 'string', required: true, description: 'City name' },
        days: { type: 'integer', required: false, default: 1 },
        units: { type: 'string', required: false, schema: { enum: ['metric', 'imperial'] } },
      },
      invoke: jest.fn(),
    });

    expect(toToolDefinition(tool)).toEqual({
      type: 'function',
      function: {
        name: 'weather',
        description: 'Current weather.',
        parameters: {
          type: 'object',
          properties: {
            city: { type: 'string', description: 'City name' },
            days: { type: 'integer', description: 'Parameter: days', default: 1 },
            units: { type: 'string', description: 'Parameter: units', enum: ['metric', 'imperial'] },
          },
          required: ['city'],
        },
      },
    });
  });
});

describe('parameterToSchema', () => {
  it('should serialize structured defaults', () => {
    expect(parameterToSchema('tags', { type: 'array', required: false, default: ['a', 'b'] })).toEqual({
      type: 'array',
      description: 'Parameter: tags',
      default: ['a', 'b'],
    });
  });
});
