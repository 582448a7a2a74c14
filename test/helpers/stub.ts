import { expect } from 'vitest';
import { parse, print, Module, ParseError, ParseOptions } from '../../src';

/** Removes the common leading whitespace of all non-blank lines. */
export function dedent(text: string): string {
  const lines = text.split('\n');
  const margins = lines
    .filter(line => line.trim().length > 0)
    .map(line => line.length - line.trimStart().length);
  const margin = margins.length > 0 ? Math.min(...margins) : 0;
  return lines.map(line => (line.trim().length === 0 ? '' : line.slice(margin))).join('\n');
}

export function parseModule(source: string, options: Partial<ParseOptions> = {}): Module {
  const result = parse(source, options);
  if (!result.ok) {
    throw new Error(`unexpected parse error: ${result.error.format()}`);
  }
  return result.value;
}

export function parseError(source: string, options: Partial<ParseOptions> = {}): ParseError {
  const result = parse(source, options);
  if (result.ok) {
    throw new Error('expected a parse error');
  }
  return result.error;
}

/**
 * Parses `source` and checks the printed module against `expected`
 * (`source` itself when omitted), optionally preceded by a prologue.
 */
export function check(
  source: string,
  expected?: string,
  options: Partial<ParseOptions> & { prologue?: string } = {},
): Module {
  const { prologue, ...parseOptions } = options;
  const src = dedent(source);
  const module = parseModule(src, parseOptions);
  let text = expected === undefined ? src : dedent(expected);
  if (prologue !== undefined) {
    text = `${dedent(prologue)}\n\n${text}`;
  }
  expect(print(module)).toBe(text);
  return module;
}

/** Expects a parse error with the given message and line (undefined for none). */
export function checkError(source: string, line: number | undefined, message: string | RegExp): ParseError {
  const error = parseError(dedent(source));
  if (typeof message === 'string') {
    expect(error.message).toBe(message);
  } else {
    expect(error.message).toMatch(message);
  }
  expect(error.line).toBe(line);
  return error;
}

export function lines(...parts: string[]): string {
  return parts.join('\n');
}
