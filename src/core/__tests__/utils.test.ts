// src/core/__tests__/utils.test.ts

import { containsIgnoreCase, describeError, sanitizeIdForLLM } from '../utils';

describe('Core Utils: sanitizeIdForLLM', () => {
  it('should return an unchanged string for valid IDs', () => {
    expect(sanitizeIdForLLM('valid-id_123')).toBe('valid-id_123');
    expect(sanitizeIdForLLM('another_VALID_name')).toBe('another_VALID_name');
  });

  it('should replace spaces and special characters with underscores', () => {
    expect(sanitizeIdForLLM('id with spaces')).toBe('id_with_spaces');
    expect(sanitizeIdForLLM('id!@#special$char%')).toBe('id___special_char_');
    expect(sanitizeIdForLLM('test@example.com')).toBe('test_example_com');
  });

  it('should truncate strings longer than 64 characters', () => {
    const sanitized = sanitizeIdForLLM('a'.repeat(70));
    expect(sanitized).toBe('a'.repeat(64));
  });

  it('should drop a trailing underscore produced by the cut', () => {
    const sanitized = sanitizeIdForLLM('!@#$%^&*()'.repeat(10));
    expect(sanitized).toBe('_'.repeat(63));
  });

  it('should keep trailing underscores or hyphens within 64 characters', () => {
    const endingWithUnderscore = 'a'.repeat(63) + '_';
    expect(sanitizeIdForLLM(endingWithUnderscore)).toBe(endingWithUnderscore);
    const endingWithHyphen = 'a'.repeat(63) + '-';
    expect(sanitizeIdForLLM(endingWithHyphen)).toBe(endingWithHyphen);
  });

  it('should handle empty and blank input', () => {
    expect(sanitizeIdForLLM('')).toBe('unnamed_id');
    expect(sanitizeIdForLLM('   ')).toBe('unnamed_id');
  });
});

describe('Core Utils: containsIgnoreCase', () => {
  it('should match regardless of case', () => {
    expect(containsIgnoreCase('This is the FINAL VERSION.', 'Final version')).toBe(true);
    expect(containsIgnoreCase('draft', 'Final version')).toBe(false);
  });
});

describe('Core Utils: describeError', () => {
  it('should use the message of errors and stringify anything else', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError(42)).toBe('42');
  });
});
