import { describe, it, expect } from 'vitest';
import { ok, error, map, flatMap, mapAll, Result } from '../src';

const half = (n: number): Result<number, string> => (n % 2 === 0 ? ok(n / 2) : error(`${n} is odd`));

describe('Result helpers', () => {
  it('maps and chains successful values', () => {
    expect(map(ok(2), n => n + 1)).toEqual({ ok: true, value: 3 });
    expect(flatMap(ok(8), half)).toEqual({ ok: true, value: 4 });
    expect(flatMap(error('no'), half)).toEqual({ ok: false, error: 'no' });
  });

  it('stops mapAll at the first failure', () => {
    expect(mapAll([2, 4], half)).toEqual({ ok: true, value: [1, 2] });
    expect(mapAll([2, 3, 5], half)).toEqual({ ok: false, error: '3 is odd' });
  });
});
