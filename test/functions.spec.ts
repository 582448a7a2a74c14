import { describe, it, expect } from 'vitest';
import { recognizeDecorator } from '../src';
import { check, checkError, lines, parseModule } from './helpers/stub';

describe('parameters', () => {
  it('prints untyped parameters', () => {
    check('def foo(a, b) -> int: ...');
  });

  it('defaults the return type to Any', () => {
    check('def foo()', 'def foo() -> Any: ...', { prologue: 'from typing import Any' });
  });

  it('infers types from default values', () => {
    check(
      'def foo(a: int = 3, b = 0, c = 1.5, d = True, e = ..., f = -1) -> None: ...',
      'def foo(a: int = ..., b: int = ..., c: float = ..., d: bool = ..., e = ..., f: int = ...) -> None: ...',
    );
  });

  it('makes a typed parameter with a None default optional', () => {
    check(
      'def foo(x: int = None, y = None) -> str: ...',
      lines('from typing import Optional', '', 'def foo(x: Optional[int] = ..., y = ...) -> str: ...'),
    );
  });

  it('keeps star parameters', () => {
    check('def foo(*args, **kwargs) -> int: ...');
    check('def foo(x, *args: int, **kwargs: str) -> int: ...');
  });

  it('marks parameters after a bare star as keyword-only', () => {
    const module = check('def foo(a, *, b: int, c = ...) -> int: ...', 'def foo(a, *, b: int, c = ...) -> int: ...');
    expect(module.functions[0].signatures[0].params.map(param => param.kwOnly)).toEqual([false, true, true]);
  });

  it('expands an ellipsis parameter to *args and **kwargs', () => {
    check('def foo(...) -> int: ...', 'def foo(*args, **kwargs) -> int: ...');
    check('def foo(a, ...) -> int: ...', 'def foo(a, *args, **kwargs) -> int: ...');
  });

  it('checks parameter order', () => {
    checkError('\ndef foo(..., a) -> int: ...', 2, 'ellipsis (...) must be last parameter');
    checkError('def foo(**kw, a) -> int: ...', 1, '**kw must be last parameter');
    checkError('def foo(*, ...) -> int: ...', 1, 'ellipsis (...) not compatible with bare *');
    checkError('def foo(*a, *b) -> int: ...', 1, 'Unexpected second *');
    checkError('def foo(a, *) -> int: ...', 1, 'Named arguments must follow bare *');
  });
});

describe('bodies', () => {
  it('treats pass and docstrings as empty', () => {
    check(lines('def foo() -> int:', '    """Docs."""', '    pass'), 'def foo() -> int: ...');
  });

  it('prints mutated parameter types', () => {
    check(
      lines('def foo(x: list) -> None:', '    x := List[int]'),
      lines('from typing import List', '', 'def foo(x: list) -> None:', '    x := List[int]'),
    );
  });

  it('rejects mutators of unknown parameters', () => {
    checkError(lines('def foo(x) -> None:', '    y := int'), 1, 'No parameter named y');
  });

  it('records raised exceptions', () => {
    check(lines('def foo() -> int:', '    raise ValueError()'));
    check(lines('def foo() -> int:', '    raise ValueError'), lines('def foo() -> int:', '    raise ValueError()'));
  });

  it('prints mutators before exceptions', () => {
    check(lines(
      'def foo(x: list) -> int:',
      '    x := dict',
      '    raise KeyError()',
      '    raise IndexError()',
    ));
  });
});

describe('external definitions', () => {
  it('keeps PYTHONCODE functions', () => {
    const module = check('def foo PYTHONCODE');
    expect(module.functions[0].signatures).toEqual([]);
  });

  it('rejects repeated or mixed PYTHONCODE definitions', () => {
    checkError(lines('def foo PYTHONCODE', 'def foo PYTHONCODE'), undefined, 'Multiple PYTHONCODEs for foo');
    checkError(lines('def foo PYTHONCODE', 'def foo() -> int: ...'), undefined, 'Mixed pytd and PYTHONCODEs for foo');
  });
});

describe('overloads and decorators', () => {
  it('merges same-named definitions in order', () => {
    const module = check(
      lines('@overload', 'def foo(x: int) -> int: ...', '@overload', 'def foo(x: str) -> str: ...', 'def bar() -> int: ...'),
      lines('def foo(x: int) -> int: ...', 'def foo(x: str) -> str: ...', 'def bar() -> int: ...'),
    );
    expect(module.functions.map(fn => fn.name)).toEqual(['foo', 'bar']);
    expect(module.functions[0].signatures).toHaveLength(2);
  });

  it('accepts typing.overload', () => {
    check(lines('@typing.overload', 'def foo() -> int: ...'), 'def foo() -> int: ...');
  });

  it('prints static methods with their decorator', () => {
    check(lines('@staticmethod', 'def foo() -> int: ...'));
  });

  it('allows one decorator per definition', () => {
    checkError(lines('@overload', '@staticmethod', 'def foo() -> int: ...'), 3, 'Too many decorators for foo');
  });

  it('rejects unknown decorators', () => {
    checkError(lines('@foo.bar', 'def f() -> int: ...'), undefined, 'Unhandled decorator: foo.bar');
  });

  it('requires overloads to agree on their kind', () => {
    checkError(
      lines('@classmethod', 'def f(cls) -> int: ...', 'def f(x) -> int: ...'),
      undefined,
      'Overloaded signatures for f disagree on decorators',
    );
  });

  it('rejects properties outside classes', () => {
    checkError(lines('@property', 'def f(self) -> int: ...'), undefined, 'Module-level functions with property decorators: f');
  });
});

describe('signature model', () => {
  it('stores parameters and return types', () => {
    const [fn] = parseModule('def foo(a: int, b = ...) -> str: ...').functions;
    expect(fn.kind).toBe('method');
    expect(fn.signatures[0]).toEqual({
      params: [
        { name: 'a', type: { kind: 'named', name: 'int' }, optional: false, kwOnly: false },
        { name: 'b', type: undefined, optional: true, kwOnly: false },
      ],
      starArgs: undefined,
      starStarArgs: undefined,
      returnType: { kind: 'named', name: 'str' },
      exceptions: [],
    });
  });
});

describe('recognizeDecorator', () => {
  it('maps decorator text to tags', () => {
    expect(recognizeDecorator('abc.abstractmethod')).toEqual({ kind: 'abstractmethod' });
    expect(recognizeDecorator('foo.setter')).toEqual({ kind: 'setter', name: 'foo' });
    expect(recognizeDecorator('foo.deleter')).toEqual({ kind: 'deleter', name: 'foo' });
    expect(recognizeDecorator('a.b.setter')).toEqual({ kind: 'unrecognized', text: 'a.b.setter' });
  });
});
