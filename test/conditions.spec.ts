import { describe, it, expect } from 'vitest';
import { normalizeVersion, sliceVersion } from '../src/semantic/condition-evaluator';
import { check, checkError, lines, parseModule } from './helpers/stub';

/** The name of the constant declared by the live branch, or undefined when no branch is taken. */
function liveBranch(condition: string, options: { targetVersion?: number[]; targetPlatform?: string } = {}) {
  const module = parseModule(lines(
    `if ${condition}:`,
    '  taken = ...  # type: int',
    'else:',
    '  skipped = ...  # type: int',
  ), options);
  return module.constants.map(constant => constant.name);
}

describe('version conditions', () => {
  it('compares whole tuples', () => {
    expect(liveBranch('sys.version_info == (2, 7, 6)')).toEqual(['taken']);
    expect(liveBranch('sys.version_info >= (3,)')).toEqual(['skipped']);
    expect(liveBranch('sys.version_info < (3,)')).toEqual(['taken']);
    expect(liveBranch('sys.version_info > (2, 7)')).toEqual(['taken']);
    expect(liveBranch('sys.version_info == (2, 7)')).toEqual(['skipped']);
    expect(liveBranch('sys.version_info != (2, 7, 6)')).toEqual(['skipped']);
    expect(liveBranch('sys.version_info <= (2, 7, 6)')).toEqual(['taken']);
  });

  it('uses the given target version', () => {
    expect(liveBranch('sys.version_info >= (3,)', { targetVersion: [3, 7, 0] })).toEqual(['taken']);
    expect(liveBranch('sys.version_info >= (3, 8)', { targetVersion: [3, 7] })).toEqual(['skipped']);
  });

  it('compares single elements to integers', () => {
    expect(liveBranch('sys.version_info[0] == 2')).toEqual(['taken']);
    expect(liveBranch('sys.version_info[0] >= 3')).toEqual(['skipped']);
    expect(liveBranch('sys.version_info[-1] == 6')).toEqual(['taken']);
  });

  it('compares slices', () => {
    expect(liveBranch('sys.version_info[:2] == (2, 7)')).toEqual(['taken']);
    expect(liveBranch('sys.version_info[1:] == (7, 6)')).toEqual(['taken']);
    expect(liveBranch('sys.version_info[::-1] == (6, 7, 2)')).toEqual(['taken']);
    expect(liveBranch('sys.version_info[:1] > (2,)')).toEqual(['skipped']);
  });

  it('combines comparisons with and, or and parentheses', () => {
    expect(liveBranch('sys.version_info >= (3,) or sys.platform == "linux"')).toEqual(['taken']);
    expect(liveBranch('sys.version_info < (3,) and sys.platform == "win32"')).toEqual(['skipped']);
    expect(liveBranch('(sys.platform == "win32" or sys.platform == "linux") and sys.version_info[0] == 2'))
      .toEqual(['taken']);
  });

  it('rejects ill-typed comparisons', () => {
    checkError(lines('if sys.version_info == "x":', '  pass'), 1, 'sys.version_info must be compared to a tuple of integers');
    checkError(lines('if sys.version_info == (2, 7.5):', '  pass'), 1, 'sys.version_info must be compared to a tuple of integers');
    checkError(lines('if sys.version_info[0] == (2,):', '  pass'), 1, 'an element of sys.version_info must be compared to an integer');
    checkError(lines('if sys.version_info[5] == 2:', '  pass'), 1, 'tuple index out of range');
    checkError(lines('if sys.version_info[::0] == (2,):', '  pass'), 1, 'slice step cannot be zero');
  });
});

describe('platform conditions', () => {
  it('compares the platform for equality', () => {
    expect(liveBranch('sys.platform == "linux"')).toEqual(['taken']);
    expect(liveBranch('sys.platform != "linux"')).toEqual(['skipped']);
    expect(liveBranch('sys.platform == "win32"', { targetPlatform: 'win32' })).toEqual(['taken']);
  });

  it('rejects other comparisons', () => {
    checkError(lines('if sys.platform == 1:', '  pass'), 1, 'sys.platform must be compared to a string');
    checkError(lines('if sys.platform < "linux":', '  pass'), 1, 'sys.platform must be compared using == or !=');
  });
});

describe('logical conditions', () => {
  it('binds and tighter than or', () => {
    expect(liveBranch('sys.platform == "x" or sys.platform == "linux" and sys.version_info[0] == 2')).toEqual(['taken']);
    expect(liveBranch('sys.platform == "linux" and sys.version_info[0] == 3 or sys.platform == "x"')).toEqual(['skipped']);
  });

  it('stops at the first deciding operand', () => {
    expect(liveBranch('sys.platform == "linux" or foo == 1')).toEqual(['taken']);
    expect(liveBranch('sys.platform == "x" and foo == 1')).toEqual(['skipped']);
    checkError(lines('if sys.platform == "x" or foo == 1:', '  pass'), 1, "Unsupported condition: 'foo'.");
  });

  it('evaluates very long chains', () => {
    const terms = Array<string>(40000).fill('sys.platform == "x"');
    expect(liveBranch(terms.join(' or '))).toEqual(['skipped']);
    expect(liveBranch([...terms, 'sys.platform == "linux"'].join(' or '))).toEqual(['taken']);
    expect(liveBranch(Array<string>(40000).fill('sys.platform == "linux"').join(' and '))).toEqual(['taken']);
  });

  it('rejects deeply parenthesized conditions', () => {
    const deep = `${'('.repeat(150)}sys.platform == "x"${')'.repeat(150)}`;
    checkError(lines(`if ${deep}:`, '  pass'), 1, 'Maximum nesting depth exceeded');
  });
});

describe('unsupported conditions', () => {
  it('names the subject', () => {
    checkError(lines('if foo.bar == 1:', '  pass'), 1, "Unsupported condition: 'foo.bar'.");
    checkError(lines('if sys.platform[0] == "l":', '  pass'), 1, "Unsupported condition: 'sys.platform'.");
  });

  it('reports the line of the failing elif even after a taken branch', () => {
    checkError(
      lines('if sys.version_info >= (2,):', '  x = ...  # type: int', 'elif foo == 1:', '  y = ...  # type: int'),
      3,
      "Unsupported condition: 'foo'.",
    );
  });
});

describe('if chains', () => {
  const chain = lines(
    'if sys.version_info >= (3,):',
    '  x = ...  # type: int',
    'elif sys.platform == "win32":',
    '  x = ...  # type: str',
    'else:',
    '  x = ...  # type: float',
  );

  it('keeps the first branch that holds', () => {
    check(chain, 'x = ...  # type: int', { targetVersion: [3, 6] });
    check(chain, 'x = ...  # type: str', { targetPlatform: 'win32' });
    check(chain, 'x = ...  # type: float');
  });

  it('drops everything when no branch holds and there is no else', () => {
    check(lines('if sys.platform == "win32":', '  x = ...  # type: int'), '');
  });

  it('accepts a body on the same line', () => {
    check('if sys.platform == "linux": x = ...  # type: int', 'x = ...  # type: int');
  });

  it('flattens nested chains', () => {
    check(
      lines(
        'if sys.version_info[0] == 2:',
        '  if sys.platform == "linux":',
        '    def f() -> int: ...',
        '  else:',
        '    def f() -> str: ...',
      ),
      'def f() -> int: ...',
    );
  });

  it('selects class members', () => {
    const source = lines(
      'class A:',
      '  if sys.platform == "win32":',
      '    x = ...  # type: int',
      '  else:',
      '    x = ...  # type: str',
    );
    check(source, lines('class A:', '    x = ...  # type: str', ''));
    check(source, lines('class A:', '    x = ...  # type: int', ''), { targetPlatform: 'win32' });
  });

  it('only registers classes declared in live code', () => {
    const source = lines(
      'if sys.version_info >= (3,):',
      '  class Dict: ...',
      'x = ...  # type: Dict[str, int]',
    );
    check(source, lines('from typing import Dict', '', 'x = ...  # type: Dict[str, int]'));
    check(
      source,
      lines('x = ...  # type: Dict[str, int]', '', 'class Dict:', '    pass', ''),
      { targetVersion: [3, 7, 0] },
    );
  });
});

describe('version helpers', () => {
  it('pads and truncates to three elements', () => {
    expect(normalizeVersion([3])).toEqual([3, 0, 0]);
    expect(normalizeVersion([3, 7, 1, 5])).toEqual([3, 7, 1]);
  });

  it('slices like the stub language', () => {
    expect(sliceVersion([2, 7, 6], { kind: 'slice', start: -2 })).toEqual({ ok: true, value: [7, 6] });
    expect(sliceVersion([2, 7, 6], { kind: 'slice', step: 2 })).toEqual({ ok: true, value: [2, 6] });
    expect(sliceVersion([2, 7, 6], { kind: 'slice', start: 5, stop: 0, step: -1 })).toEqual({ ok: true, value: [6, 7] });
  });
});
