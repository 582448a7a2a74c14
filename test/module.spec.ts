import { describe, it, expect } from 'vitest';
import { createHash } from 'node:crypto';
import { namedType } from '../src';
import { check, checkError, lines, parseError, parseModule } from './helpers/stub';

describe('constants', () => {
  it('defaults an unannotated constant to Any', () => {
    check('x = ...', 'x = ...  # type: Any', { prologue: 'from typing import Any' });
  });

  it('keeps an annotated constant', () => {
    check('x = ...  # type: str');
  });

  it('infers int and float from zero literals', () => {
    check('x = 0', 'x = ...  # type: int');
    check('x = 0.0', 'x = ...  # type: float');
  });

  it('rejects other numeric literals', () => {
    checkError('\nx = 123', 2, "Only '0' allowed as int literal");
    checkError('x = 1.5', 1, "Only '0.0' allowed as float literal");
  });

  it('accepts variable annotations', () => {
    check('x : str', 'x = ...  # type: str');
    check('x : str = ...', 'x = ...  # type: str');
  });

  it('treats True and False as bool constants', () => {
    check('x = True', 'x = ...  # type: bool');
    check('x = False', 'x = ...  # type: bool');
  });

  it('attaches a type comment on the next line to the constant above', () => {
    check(lines('a = ...', '# type: int'), 'a = ...  # type: int');
  });

  it('maps None to NoneType', () => {
    const module = check('x = ...  # type: None');
    expect(module.constants[0].type).toEqual(namedType('NoneType'));
  });
});

describe('type expressions', () => {
  it('drops parentheses', () => {
    check('x = ...  # type: (str)', 'x = ...  # type: str');
  });

  it('imports the module of a dotted name', () => {
    check('x = ...  # type: foo.bar.Baz', undefined, { prologue: 'import foo.bar' });
  });

  it('prints ? as Any', () => {
    check('x = ...  # type: ?', 'x = ...  # type: Any', { prologue: 'from typing import Any' });
  });

  it('keeps nothing', () => {
    check('x = ...  # type: nothing');
  });

  it('turns or into a union', () => {
    check(
      'x = ...  # type: int or str or float',
      lines('from typing import Union', '', 'x = ...  # type: Union[int, str, float]'),
    );
  });

  it('collapses repeated union members', () => {
    check('x = ...  # type: int or int', 'x = ...  # type: int');
  });

  it('requires options to Union and Optional', () => {
    checkError('def f(x: typing.Union): ...', 1, 'Missing options to typing.Union');
    checkError('def f(x: typing.Optional): ...', 1, 'Missing options to typing.Optional');
  });
});

describe('imports and aliases', () => {
  it('drops plain imports', () => {
    check('import foo.bar.baz', '');
  });

  it('rejects renamed modules', () => {
    checkError('\n\nimport a as b', 3, 'Renaming of modules not supported');
  });

  it('records from-imports as aliases', () => {
    check('from foo.bar import baz');
    check('from foo.bar import baz as abc');
    check('from foo import a, b', lines('from foo import a', 'from foo import b'));
    check('from foo import (a, b)', lines('from foo import a', 'from foo import b'));
    check('from foo import (a, b, )', lines('from foo import a', 'from foo import b'));
  });

  it('ignores typing imports and wildcards', () => {
    check('from typing import NamedTuple, TypeVar', '');
    check('from foo.bar import *', '');
  });

  it('resolves names bound by a from-import', () => {
    check(
      lines('from somewhere import Foo', 'x = ...  # type: Foo'),
      lines('import somewhere', '', 'from somewhere import Foo', '', 'x = ...  # type: somewhere.Foo'),
    );
  });

  it('keeps a module-level alias', () => {
    check('x = Foo');
  });

  it('resolves typing names unless parsing the typing module', () => {
    check('x = ...  # type: List[int]', 'x = ...  # type: List[int]', { prologue: 'from typing import List' });
    check('x = ... # type: Hashable', 'typing.x = ...  # type: Hashable', { name: 'typing' });
  });
});

describe('type variables', () => {
  it('turns references into type parameters', () => {
    const module = check(lines(
      'from typing import TypeVar',
      '',
      "T = TypeVar('T')",
      '',
      'def func(x: T) -> T: ...',
    ));
    const signature = module.functions[0].signatures[0];
    expect(signature.params[0].type).toEqual({ kind: 'typeParameter', name: 'T' });
    expect(signature.returnType).toEqual({ kind: 'typeParameter', name: 'T' });
  });

  it('checks the declared name', () => {
    checkError("T = TypeVar('Q')", 1, "TypeVar name needs to be 'Q' (not 'T')");
  });

  it('rejects malformed arguments', () => {
    checkError('T = TypeVar()', 1, /^syntax error/);
    checkError('T = TypeVar(*args)', 1, /^syntax error/);
    checkError('T = TypeVar(...)', 1, /^syntax error/);
    checkError("T = TypeVar('T', covariant=True, int, float)", 1, /^syntax error/);
  });

  it('keeps constraints and drops keyword arguments', () => {
    check(lines('from typing import List, TypeVar', '', "T = TypeVar('T', List[int], List[str])"));
    check(
      lines('from typing import TypeVar', '', "T = TypeVar('T', bound=List[str])"),
      lines('from typing import TypeVar', '', "T = TypeVar('T')"),
    );
    check(
      lines('from typing import TypeVar', '', "T = TypeVar('T', str, unicode, covariant=True)"),
      lines('from typing import TypeVar', '', "T = TypeVar('T', str, unicode)"),
    );
    check(lines('import other_mod', 'from typing import TypeVar', '', "T = TypeVar('T', other_mod.A, other_mod.B)"));
  });
});

describe('duplicate names', () => {
  it('rejects clashing top-level names', () => {
    checkError(lines('def foo() -> int: ...', 'foo = ... # type: int'), undefined, 'Duplicate top-level identifier(s): foo');
    checkError(lines('from x import foo', 'def foo() -> int: ...'), undefined, 'Duplicate top-level identifier(s): foo');
    checkError(lines('X = ... # type: int', 'class X: ...'), undefined, 'Duplicate top-level identifier(s): X');
    checkError(lines('X = ... # type: int', "X = TypeVar('X')"), undefined, 'Duplicate top-level identifier(s): X');
  });

  it('lists each duplicate once, sorted', () => {
    checkError(
      lines('b = ... # type: int', 'b = ... # type: int', 'b = ... # type: int', 'a = ... # type: int', 'a = ... # type: str'),
      undefined,
      'Duplicate top-level identifier(s): a, b',
    );
  });

  it('allows a function to be defined more than once', () => {
    check(lines('def foo(x: int) -> int: ...', 'def foo(x: str) -> str: ...'));
  });
});

describe('module name', () => {
  it('prefixes top-level names with an explicit name', () => {
    const module = check('x = ...  # type: int', 'foo.x = ...  # type: int', { name: 'foo' });
    expect(module.name).toBe('foo');
  });

  it('prefixes references to local classes without importing them', () => {
    check(
      lines('class A: ...', 'def f() -> A: ...'),
      lines('class foo.A:', '    pass', '', '', 'def foo.f() -> foo.A: ...'),
      { name: 'foo' },
    );
  });

  it('defaults to the md5 digest of the source', () => {
    expect(parseModule('').name).toBe('d41d8cd98f00b204e9800998ecf8427e');
    const source = 'x = ...  # type: int';
    expect(parseModule(source).name).toBe(createHash('md5').update(source).digest('hex'));
  });

  it('gives the same source the same name on every parse', () => {
    const source = lines('def f(x: int) -> str: ...', 'y = ...  # type: NamedTuple(foo, [(a, int)])');
    expect(parseModule(source)).toEqual(parseModule(source));
  });
});

describe('repeated parses', () => {
  it('restarts NamedTuple numbering on every parse', () => {
    const source = 'x = ...  # type: NamedTuple(foo, [(a, int)])';
    for (let i = 0; i < 3; i++) {
      expect(parseModule(source).classes.map(cls => cls.name)).toEqual(['`foo`']);
    }
  });

  it('does not carry classes over to the next parse', () => {
    check(lines('class Dict: ...', 'x = ...  # type: Dict[str, int]'), lines(
      'x = ...  # type: Dict[str, int]',
      '',
      'class Dict:',
      '    pass',
      '',
    ));
    check('x = ...  # type: Dict[str, int]', undefined, { prologue: 'from typing import Dict' });
  });

  it('does not carry bindings over to the next parse', () => {
    check(lines('from foo import Bar', 'x = ...  # type: Bar'), lines('import foo', '', 'from foo import Bar', '', 'x = ...  # type: foo.Bar'));
    check('x = ...  # type: Bar');
  });

  it.each([
    ['a class', lines('class Foo:', '  this is not valid'), 2],
    ['a function', lines('def foo(x) -> None:', '    y := int'), 1],
    ['an if statement', lines('if foo.bar == 1:', '  x = ...  # type: int'), 1],
  ])('reports the same error for %s every time', (_where, source, line) => {
    const first = parseError(source);
    const second = parseError(source);
    expect(first.line).toBe(line);
    expect([second.message, second.line, second.column]).toEqual([first.message, first.line, first.column]);
    check('x = ...  # type: int');
  });
});
