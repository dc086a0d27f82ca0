import { describe, it, expect } from 'vitest';
import { ok, err, isOk, isErr, unwrap, map, flatMap, optionToResult, isSome } from '../result.js';

describe('Result', () => {
  it('creates ok and err values', () => {
    expect(ok(42)).toEqual({ ok: true, value: 42 });
    expect(err('bad')).toEqual({ ok: false, error: 'bad' });
  });

  it('narrows with isOk/isErr', () => {
    const good = ok(1);
    const bad = err(new Error('x'));
    expect(isOk(good)).toBe(true);
    expect(isErr(good)).toBe(false);
    expect(isErr(bad)).toBe(true);
  });

  it('unwraps or throws the carried error', () => {
    expect(unwrap(ok('v'))).toBe('v');
    const failure = new Error('boom');
    expect(() => unwrap(err(failure))).toThrow(failure);
  });

  it('maps only the success value', () => {
    expect(map(ok(2), (n) => n * 3)).toEqual(ok(6));
    expect(map(err<string>('e'), (n: number) => n * 3)).toEqual(err('e'));
  });

  it('short-circuits flatMap on the first error', () => {
    const half = (n: number) => (n % 2 === 0 ? ok(n / 2) : err(`odd: ${n}`));
    expect(flatMap(ok(8), half)).toEqual(ok(4));
    expect(flatMap(flatMap(ok(6), half), half)).toEqual(err('odd: 3'));
  });
});

describe('Option', () => {
  it('converts to Result', () => {
    expect(isSome(null)).toBe(false);
    expect(optionToResult('a', 'missing')).toEqual(ok('a'));
    expect(optionToResult(null, 'missing')).toEqual(err('missing'));
  });
});
