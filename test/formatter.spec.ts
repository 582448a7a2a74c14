import { describe, it, expect } from 'vitest';
import { Formatter, ParseError, formatStub, print, DEFAULT_FORMATTER_OPTIONS } from '../src';
import { Printer } from '../src/formatter/printer';
import { lines, parseModule } from './helpers/stub';

const source = lines(
  'import os',
  'from typing import List',
  'from foo import Bar',
  '',
  "T = TypeVar('T')",
  'X = ...  # type: int',
  '',
  'class A(Bar):',
  '    x = ...  # type: List[T]',
  '    def f(self, y: T = ...) -> Optional[T]: ...',
  '',
  'def g(*args, **kwargs) -> None: ...',
);

const canonical = lines(
  'import foo',
  'from typing import List, Optional, TypeVar',
  '',
  'from foo import Bar',
  '',
  'X = ...  # type: int',
  '',
  "T = TypeVar('T')",
  '',
  'class A(foo.Bar):',
  '    x = ...  # type: List[T]',
  '    def f(self, y: T = ...) -> Optional[T]: ...',
  '',
  '',
  'def g(*args, **kwargs) -> None: ...',
);

describe('Formatter', () => {
  it('prints sections in canonical order', () => {
    expect(print(parseModule(source))).toBe(canonical);
  });

  it('is idempotent', () => {
    expect(print(parseModule(canonical))).toBe(canonical);
  });

  it('prints an empty module as an empty string', () => {
    expect(print(parseModule(''))).toBe('');
    expect(print(parseModule(''), { insertFinalNewline: true })).toBe('');
  });

  it('honours the indent size', () => {
    const module = parseModule(lines('class A:', '    def f(self) -> int:', '        raise E'));
    expect(new Formatter({ indentSize: 2 }).format(module)).toBe(lines(
      'class A:',
      '  def f(self) -> int:',
      '    raise E()',
      '',
    ));
  });

  it('adds a final newline when asked', () => {
    const module = parseModule('def f() -> int: ...');
    expect(print(module, { insertFinalNewline: true })).toBe('def f() -> int: ...\n');
    expect(print(parseModule('class A: ...'), { insertFinalNewline: true })).toBe('class A:\n    pass\n');
  });

  it('can be reused across modules', () => {
    const formatter = new Formatter();
    expect(formatter.format(parseModule('x = ...  # type: int'))).toBe('x = ...  # type: int');
    expect(formatter.format(parseModule('y = ...  # type: str'))).toBe('y = ...  # type: str');
  });

  it('defaults to four spaces and no final newline', () => {
    expect(DEFAULT_FORMATTER_OPTIONS).toEqual({ indentSize: 4, trimTrailingWhitespace: true, insertFinalNewline: false });
  });
});

describe('formatStub', () => {
  it('parses and prints in one step', () => {
    expect(formatStub('x = ...', { format: { insertFinalNewline: true } })).toBe('from typing import Any\n\nx = ...  # type: Any\n');
    expect(formatStub('def f(x) -> int: ...', { parse: { name: 'm' } })).toBe('def m.f(x) -> int: ...');
  });

  it('throws the parse error', () => {
    expect(() => formatStub('x = 1')).toThrow(ParseError);
  });
});

describe('Printer', () => {
  it('indents nested writes', () => {
    const printer = new Printer(3);
    expect(printer.isEmpty()).toBe(true);
    printer.writeLine('a:');
    printer.indented(() => printer.writeLine('b'));
    printer.decreaseIndent();
    printer.writeLine('c  ');
    expect(printer.isEmpty()).toBe(false);
    expect(printer.getResult({ trimTrailingWhitespace: false, insertFinalNewline: false })).toBe('a:\n   b\nc  ');
    expect(printer.getResult({ trimTrailingWhitespace: true, insertFinalNewline: true })).toBe('a:\n   b\nc\n');
  });

  it('forgets everything on reset', () => {
    const printer = new Printer(2);
    printer.increaseIndent();
    printer.writeLine('x');
    printer.reset();
    printer.writeLine('y');
    expect(printer.getResult({ trimTrailingWhitespace: true, insertFinalNewline: false })).toBe('y');
  });
});
