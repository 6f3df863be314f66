import { describe, it, expect } from 'vitest';
import { EvalError } from '@core/errors';
import { Evaluator } from '@interpreter/eval/Evaluator';
import { intType, strType } from './types';

describe('builtin functions', () => {
  const evaluator = new Evaluator();
  const run = (source: string): unknown => evaluator.evaluate(source);

  it('measures lengths', () => {
    expect(run("[len('abc'), len([1, 2]), len({1}), len({'a': 1})]")).toEqual([3, 2, 1, 1]);
    expect(() => run('len(3)')).toThrow('Object of type int has no len()');
  });

  it('builds ranges', () => {
    expect(run('range(3)')).toEqual([0, 1, 2]);
    expect(run('range(5, 0, -2)')).toEqual([5, 3, 1]);
    expect(() => run('range(0, 3, 0)')).toThrow('range() arg 3 must not be zero');
  });

  it('aggregates', () => {
    expect(run('[min(3, 1, 2), max([3, 1, 2]), sum([1, 2, 3], 10)]')).toEqual([1, 3, 16]);
    expect(run('[any([0, 1]), all([1, 0])]')).toEqual([true, false]);
    expect(() => run('min([])')).toThrow('min() arg is an empty sequence');
  });

  it('rounds numbers', () => {
    expect(run('[round(2.567, 2), floor(-1.5), ceil(1.2), abs(-3)]')).toEqual([2.57, -2, 2, 3]);
  });

  it('works with mappings', () => {
    expect(run("keys({'a': 1, 'b': 2})")).toEqual(['a', 'b']);
    expect(run("values({'a': 1, 'b': 2})")).toEqual([1, 2]);
    expect(run("items({'a': 1})")).toEqual([['a', 1]]);
  });

  it('zips, enumerates, sorts and reverses', () => {
    expect(run("zip([1, 2, 3], 'ab')")).toEqual([[1, 'a'], [2, 'b']]);
    expect(run("enumerate(['x', 'y'], 1)")).toEqual([[1, 'x'], [2, 'y']]);
    expect(run('sorted([3, 1, 2], reverse=true)')).toEqual([3, 2, 1]);
    expect(run("reversed('abc')")).toEqual(['c', 'b', 'a']);
  });

  it('handles text', () => {
    expect(run("join(['a', 1, true], '-')")).toBe('a-1-true');
    expect(run("[upper('ab'), lower('CD')]")).toEqual(['AB', 'cd']);
  });

  it('reads environment variables with a default', () => {
    process.env.SOLCONF_BUILTIN_TEST = 'on';
    try {
      expect(run("env('SOLCONF_BUILTIN_TEST')")).toBe('on');
      expect(run("env('SOLCONF_BUILTIN_UNSET_TEST', 'off')")).toBe('off');
      expect(run("env('SOLCONF_BUILTIN_UNSET_TEST')")).toBeNull();
    } finally {
      delete process.env.SOLCONF_BUILTIN_TEST;
    }
  });
});

describe('builtin types', () => {
  const evaluator = new Evaluator();

  it('converts values when called', () => {
    expect(evaluator.evaluate("[int('42'), int(3.9), float('1.5'), str(12), bool([])]")).toEqual([
      42, 3, 1.5, '12', false
    ]);
    expect(evaluator.evaluate("list('ab')")).toEqual(['a', 'b']);
    expect(evaluator.evaluate('set([1, 1, 2])')).toEqual(new Set([1, 2]));
    expect(evaluator.evaluate("dict([['a', 1]], b=2)")).toEqual({ a: 1, b: 2 });
  });

  it('refuses lossy conversions', () => {
    expect(() => evaluator.evaluate("int('4.5')")).toThrow('Cannot convert str "4.5" to int');
    expect(() => evaluator.evaluate("float('x')")).toThrow(EvalError);
  });

  it('checks membership as constraints', () => {
    expect(intType.accepts(3)).toBe(true);
    expect(intType.accepts(1.5)).toBe(false);
    expect(strType.accepts('x')).toBe(true);
    expect(strType.accepts(null)).toBe(false);
  });
});
