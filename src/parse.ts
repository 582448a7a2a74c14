// Entry points: stub text in, declaration module out

import { createHash } from 'node:crypto';
import { Lexer } from './parser/lexer';
import { Parser } from './parser/parser';
import { ParseError } from './types';
import { Module } from './model';
import { Result, error, flatMap } from './result';
import { logger } from './logger';
import { ParseOptions, resolveParseOptions } from './options';
import { buildModule } from './semantic/module-builder';

/** Name given to a module parsed without an explicit name. */
export function defaultModuleName(source: string): string {
  return createHash('md5').update(source).digest('hex');
}

/**
 * Parses stub source against the target version and platform. The first
 * error aborts the parse; errors with a line carry the offending source line.
 */
export function parse(source: string, options: Partial<ParseOptions> = {}): Result<Module, ParseError> {
  const resolved = resolveParseOptions(options);
  const moduleName = resolved.name ?? defaultModuleName(source);
  logger.debug('Parsing stub', {
    module: moduleName,
    filename: resolved.filename,
    targetVersion: resolved.targetVersion.join('.'),
    targetPlatform: resolved.targetPlatform,
  });

  const tokens = new Lexer(source, resolved.filename).tokenize();
  const file = flatMap(tokens, value => new Parser(value, resolved.filename).parse());
  const module = flatMap(file, value => buildModule(value, {
    moduleName,
    prefixNames: resolved.name !== undefined,
    target: { version: resolved.targetVersion, platform: resolved.targetPlatform },
  }));

  if (!module.ok) {
    logger.debug('Parse failed', { message: module.error.message, line: module.error.line });
    return error(module.error.withSource(source, resolved.filename));
  }
  return module;
}

/** Like parse(), but throws the ParseError. */
export function parseOrThrow(source: string, options: Partial<ParseOptions> = {}): Module {
  const result = parse(source, options);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
