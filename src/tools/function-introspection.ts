// src/tools/function-introspection.ts

/**
 * @file Reads a function's parameter list from its source text so a plain callable can
 * be registered as a tool. Type annotations are erased at run time, so parameter types are
 * inferred from literal defaults and otherwise fall back to `object`; callers can supply hints.
 */

import { ToolArgumentStyle, ToolParameterType } from '../core/tool';
import { ValidationError } from '../core/errors';

export interface IntrospectedParameter {
  name: string;
  required: boolean;
  type: ToolParameterType;
  default?: string | number | boolean | null;
  /** Set when nothing in the source reveals the type; `type` is then the `object` placeholder. */
  untyped?: true;
}

export interface FunctionSignature {
  style: ToolArgumentStyle;
  parameters: IntrospectedParameter[];
}

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;
const SINGLE_PARAM_ARROW = /^(?:async\s+)?([A-Za-z_$][\w$]*)\s*=>/;

/**
 * Introspects the parameters of `fn`.
 *
 * @throws ValidationError for classes, rest parameters, or parameter lists that cannot be read.
 */
export function introspectFunction(fn: (...args: never[]) => unknown): FunctionSignature {
  const source = Function.prototype.toString.call(fn).trim();

  if (source.startsWith('class ')) {
    throw new ValidationError(`Cannot register class "${fn.name}" as a tool; pass a function.`);
  }

  const paramList = extractParameterList(source);
  if (paramList === null) {
    // Native and bound functions do not expose their source.
    if (fn.length > 0) {
      throw new ValidationError(
        `Cannot read the parameters of "${fn.name || 'anonymous'}"; provide explicit parameters.`
      );
    }
    return { style: 'positional', parameters: [] };
  }

  const rawParams = splitTopLevel(paramList).map((p) => p.trim()).filter((p) => p !== '');

  if (rawParams.length === 1 && rawParams[0].startsWith('{')) {
    const { pattern } = splitDefault(rawParams[0]);
    const body = pattern.slice(1, findClosing(pattern, 0));
    const keys = splitTopLevel(body)
      .map((p) => p.trim())
      .filter((p) => p !== '');
    return { style: 'object', parameters: keys.map(parseParameter) };
  }

  return { style: 'positional', parameters: rawParams.map(parseParameter) };
}

function parseParameter(raw: string): IntrospectedParameter {
  if (raw.startsWith('...')) {
    throw new ValidationError(`Rest parameter "${raw}" cannot be described as a tool parameter.`);
  }
  const { pattern, defaultSource } = splitDefault(raw);

  // Inside an object pattern `key: alias` renames the binding; the argument key is `key`.
  const colon = findTopLevel(pattern, ':');
  const name = (colon === -1 ? pattern : pattern.slice(0, colon)).trim();
  if (!IDENTIFIER.test(name)) {
    throw new ValidationError(`Parameter "${raw}" cannot be described as a tool parameter.`);
  }

  if (defaultSource === undefined) {
    return { name, required: true, type: 'object', untyped: true };
  }
  const literal = parseLiteral(defaultSource);
  const parameter: IntrospectedParameter = { name, required: false, type: literal.type };
  if (literal.value !== undefined) {
    parameter.default = literal.value;
  }
  return parameter;
}

function parseLiteral(source: string): { type: ToolParameterType; value?: string | number | boolean | null } {
  const text = source.trim();
  if (/^(['"`]).*\1$/s.test(text)) {
    const quote = text[0];
    const inner = text.slice(1, -1);
    return { type: 'string', value: quote === '`' && inner.includes('${') ? undefined : unescapeString(inner) };
  }
  if (/^-?\d+$/.test(text)) {
    return { type: 'integer', value: Number(text) };
  }
  if (/^-?(\d+\.\d*|\.\d+|\d+(\.\d*)?[eE][+-]?\d+)$/.test(text)) {
    return { type: 'number', value: Number(text) };
  }
  if (text === 'true' || text === 'false') {
    return { type: 'boolean', value: text === 'true' };
  }
  if (text.startsWith('[')) {
    return { type: 'array' };
  }
  return { type: 'object' };
}

function unescapeString(inner: string): string {
  return inner.replace(/\\(.)/g, (_match, ch: string) => {
    switch (ch) {
      case 'n':
        return '\n';
      case 't':
        return '\t';
      default:
        return ch;
    }
  });
}

/**
 * Returns the text between the parentheses of the parameter list, or null when the
 * source is not readable.
 */
function extractParameterList(source: string): string | null {
  const single = SINGLE_PARAM_ARROW.exec(source);
  if (single !== null) {
    return single[1];
  }
  if (source.includes('[native code]')) {
    return null;
  }
  const open = source.indexOf('(');
  if (open === -1) {
    return null;
  }
  const close = findClosing(source, open);
  if (close === -1) {
    return null;
  }
  return source.slice(open + 1, close);
}

function splitDefault(raw: string): { pattern: string; defaultSource?: string } {
  const eq = findTopLevel(raw, '=');
  if (eq === -1) {
    return { pattern: raw.trim() };
  }
  return { pattern: raw.slice(0, eq).trim(), defaultSource: raw.slice(eq + 1).trim() };
}

const OPENERS: Record<string, string> = { '(': ')', '[': ']', '{': '}' };

/**
 * Walks `text` tracking brackets and string literals. `visit` is called for every
 * character outside strings with the current nesting depth; returning true stops the walk.
 */
function scan(text: string, start: number, visit: (ch: string, index: number, depth: number) => boolean): void {
  let depth = 0;
  let quote: string | null = null;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (quote !== null) {
      if (ch === '\\') {
        i++;
      } else if (ch === quote) {
        quote = null;
      }
      continue;
    }
    if (ch === '"' || ch === "'" || ch === '`') {
      quote = ch;
      continue;
    }
    if (ch in OPENERS) {
      if (visit(ch, i, depth)) return;
      depth++;
      continue;
    }
    if (ch === ')' || ch === ']' || ch === '}') {
      depth--;
      if (visit(ch, i, depth)) return;
      continue;
    }
    if (visit(ch, i, depth)) return;
  }
}

function findClosing(text: string, openIndex: number): number {
  let result = -1;
  scan(text, openIndex, (ch, index, depth) => {
    if (depth === 0 && index > openIndex && (ch === ')' || ch === ']' || ch === '}')) {
      result = index;
      return true;
    }
    return false;
  });
  return result;
}

function findTopLevel(text: string, target: string): number {
  let result = -1;
  scan(text, 0, (ch, index, depth) => {
    // `=>` inside a default value is not an assignment.
    if (depth === 0 && ch === target && !(target === '=' && (text[index + 1] === '>' || text[index + 1] === '='))) {
      result = index;
      return true;
    }
    return false;
  });
  return result;
}

function splitTopLevel(text: string): string[] {
  const parts: string[] = [];
  let last = 0;
  scan(text, 0, (ch, index, depth) => {
    if (depth === 0 && ch === ',') {
      parts.push(text.slice(last, index));
      last = index + 1;
    }
    return false;
  });
  parts.push(text.slice(last));
  return parts;
}
