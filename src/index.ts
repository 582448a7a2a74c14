// Main exports for stubdecl

export { Lexer, TokenType } from './parser/lexer';
export type { Token } from './parser/lexer';
export { Parser } from './parser/parser';
export { parse, parseOrThrow, defaultModuleName } from './parse';
export { DEFAULT_PARSE_OPTIONS } from './options';
export type { ParseOptions } from './options';
export { Formatter, print, formatStub, DEFAULT_FORMATTER_OPTIONS } from './formatter';
export type { FormatterOptions } from './formatter';
export { buildModule } from './semantic/module-builder';
export type { BuildOptions } from './semantic/module-builder';
export { evaluateCondition, selectLiveBranch } from './semantic/condition-evaluator';
export type { Target } from './semantic/condition-evaluator';
export { makeUnion, makeOptional } from './semantic/type-normalizer';
export { recognizeDecorator } from './semantic/signature-merger';
export type { DecoratorTag } from './semantic/signature-merger';
export { logger, Logger, LogLevel } from './logger';
export * from './result';
export * from './model';
export * from './types';
