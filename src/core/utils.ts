// src/core/utils.ts

/**
 * @file Core utility functions shared across the kernel, tools and agents.
 */

/**
 * Sanitizes an identifier (e.g. a function name) so it can be used as an LLM tool name.
 * Allowed characters are a-z, A-Z, 0-9, underscores and hyphens; at most 64 characters.
 *
 * @param id The original identifier string.
 * @returns A sanitized string.
 */
export function sanitizeIdForLLM(id: string): string {
  if (id.trim() === '') {
    return 'unnamed_id';
  }

  let sanitized = id.replace(/[^a-zA-Z0-9_-]/g, '_');

  if (sanitized.length > 64) {
    sanitized = sanitized.substring(0, 64);
    // Do not leave a trailing underscore that only exists because of the cut.
    if (sanitized.endsWith('_') && id.charAt(63) !== '_') {
      sanitized = sanitized.substring(0, 63);
    }
  }

  return sanitized;
}

/**
 * Case-insensitive substring test used by stop phrases.
 */
export function containsIgnoreCase(text: string, phrase: string): boolean {
  return text.toLowerCase().includes(phrase.toLowerCase());
}

/**
 * Extracts a readable message from anything thrown.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
