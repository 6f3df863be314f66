import { describe, it, expect, vi } from 'vitest';
import { SolConf } from '@api/SolConf';
import {
  AddressError,
  CyclicDependencyError,
  EvalError,
  OverrideConflictError,
  RequirementError,
  SolconfError,
  TypeConstraintError
} from '@core/errors';
import { ExpressionFunction } from '@core/types/callable';

function failure(run: () => unknown): SolconfError {
  try {
    run();
  } catch (error) {
    if (error instanceof SolconfError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a failure');
}

describe('resolution', () => {
  describe('resolve-once identity', () => {
    it('returns the same value for one node reached by two addresses', () => {
      const conf = new SolConf({ a: { b: { v: 1 }, c: 2 } });
      const direct = conf.get('a.b');
      const roundabout = conf.get('a.c..b');
      expect(roundabout).toBe(direct);
      expect(roundabout.resolve()).toBe(direct.resolve());
      const whole = conf.resolve();
      expect(whole).toEqual({ a: { b: { v: 1 }, c: 2 } });
      expect(conf.get('a').resolve()).toEqual({ b: { v: 1 }, c: 2 });
    });

    it('gives nodes derived from one base their own values', () => {
      const conf = new SolConf({
        'base::hidden': { x: { y: 1 } },
        'first::extends("base")': {},
        'second::extends("base")': {}
      });
      const first = conf.get('first.x').resolve();
      const second = conf.get('second.x').resolve();
      expect(first).toEqual({ y: 1 });
      expect(second).toEqual(first);
      expect(second).not.toBe(first);
    });
  });

  describe('cycle detection', () => {
    it('reports a cycle through siblings', () => {
      const conf = new SolConf({ a: "$:ref('b')", b: "$:ref('a')" });
      const error = failure(() => conf.resolve());
      expect(error).toBeInstanceOf(CyclicDependencyError);
      expect(error instanceof CyclicDependencyError && error.chain).toEqual(['a', 'b', 'a']);
      expect(error.message).toBe("scalar 'a': Cyclic dependency: a -> b -> a");
    });

    it('reports a node that refers to itself', () => {
      const conf = new SolConf({ a: '$:self() + 1' });
      expect(() => conf.resolve()).toThrow(CyclicDependencyError);
    });

    it('reports a mapping that refers to its own value', () => {
      const conf = new SolConf({ a: { b: "$:ref('..a')" } });
      const error = failure(() => conf.resolve());
      expect(error).toBeInstanceOf(CyclicDependencyError);
      expect(error instanceof CyclicDependencyError && error.chain).toEqual(['a', 'a.b', 'a']);
    });
  });

  describe('overrides', () => {
    it('replaces values at their definition point', () => {
      const conf = new SolConf({ a: 1, b: { c: 2 } }, { overrides: [{ 'b.c': 5 }] });
      expect(conf.resolve()).toEqual({ a: 1, b: { c: 5 } });
    });

    it('evaluates assignment text', () => {
      const conf = new SolConf(
        { lr: 0.1, layers: [1, 2, 3], name: 'x' },
        { overrides: ["lr = 0.1 * 2; layers[1] = 20\nname = upper('y')"] }
      );
      expect(conf.resolve()).toEqual({ lr: 0.2, layers: [1, 20, 3], name: 'Y' });
    });

    it('swaps in structured content', () => {
      const conf = new SolConf({ a: 1, b: { c: 2 } }, { overrides: [{ a: { d: [1] }, b: 7 }] });
      expect(conf.resolve()).toEqual({ a: { d: [1] }, b: 7 });
    });

    it('rejects two sources setting the same target before building', () => {
      expect(() => new SolConf({ a: 1 }, { overrides: [{ a: 1 }, 'a = 2'] })).toThrow(OverrideConflictError);
      expect(() => new SolConf({ a: 1 }, { overrides: [{ 'a[0]': 1, 'a.0': 2 }] })).toThrow(
        "Conflicting overrides for 'a.0'"
      );
    });

    it('reports overrides that matched nothing', () => {
      const conf = new SolConf({ a: 1 }, { overrides: [{ b: 2 }] });
      expect(conf.resolve()).toEqual({ a: 1 });
      expect(conf.unusedOverrides()).toEqual(['b']);
    });

    it('can fail on overrides that matched nothing', () => {
      const conf = new SolConf(
        { a: 1 },
        { overrides: [{ b: 2 }], config: { failOnUnusedOverrides: true } }
      );
      expect(() => conf.resolve()).toThrow(new AddressError('Overrides matched no node: b'));
    });

    it('applies overrides inside hidden subtrees nothing references', () => {
      const conf = new SolConf(
        { 'base::hidden': { lr: 0.1 }, x: 1 },
        { overrides: ['base.lr = 0.5'], config: { failOnUnusedOverrides: true } }
      );
      expect(conf.resolve()).toEqual({ x: 1 });
      expect(conf.unusedOverrides()).toEqual([]);
      expect(conf.get('base.lr').resolve()).toBe(0.5);
    });

    it('satisfies required values', () => {
      const conf = new SolConf({ 'steps::required': null }, { overrides: ['steps = 100'] });
      expect(conf.resolve()).toEqual({ steps: 100 });
    });
  });

  describe('hidden entries', () => {
    it('take part in evaluation but not in the output', () => {
      const conf = new SolConf({ a: "$:ref('b')+1", 'b::hidden': 2 });
      expect(conf.resolve()).toEqual({ a: 3 });
    });

    it('stay hidden inside sequences', () => {
      const conf = new SolConf({ xs: [1, { 'v::hidden': 2 }] });
      expect(conf.resolve()).toEqual({ xs: [1, {}] });
    });
  });

  describe('reference strings', () => {
    it('ascend with runs of dots', () => {
      const conf = new SolConf({ var2: [2, 3, '$:1+3'] });
      expect(conf.get('var2.2..0')).toBe(conf.get('var2.0'));
      expect(conf.get('var2.2..0').resolve()).toBe(2);
      expect(conf.get('var2.2').resolve()).toBe(4);
    });

    it('resolve ref() relative to the enclosing mapping', () => {
      const conf = new SolConf({ a: 2, b: { c: "$:ref('..a') * 10", d: "$:ref('c') + 1" } });
      expect(conf.resolve()).toEqual({ a: 2, b: { c: 20, d: 21 } });
    });

    it('resolve ref() relative to the enclosing sequence', () => {
      expect(new SolConf({ xs: [10, "$:ref('0') + 1"] }).resolve()).toEqual({ xs: [10, 11] });
      expect(() => new SolConf({ xs: ["$:ref('-1')"] }).resolve()).toThrow(
        "scalar 'xs.0': Invalid reference string '-1'"
      );
    });

    it('select the entry itself with the sigil', () => {
      const conf = new SolConf({ a: { b: 1 } });
      expect(conf.get('a.*b').kind).toBe('entry');
      expect(conf.get('a.*b').resolve()).toEqual(['b', 1]);
      expect(conf.get('a.*b').qualifiedName).toBe('a.*b');
    });

    it('name the missing step', () => {
      const conf = new SolConf({ a: { b: [1] } });
      expect(() => conf.get('a.c')).toThrow("No key 'c' in mapping 'a'");
      expect(() => conf.get('a.b.3')).toThrow("Index 3 out of range for sequence 'a.b' of length 1");
      expect(() => conf.get('a.b.0.x')).toThrow("Cannot select 'x' from scalar 'a.b.0'");
      expect(() => conf.get('...a')).toThrow("Reference '...a' ascends past the root");
    });

    it('select children one by one', () => {
      const conf = new SolConf({ a: [{ b: 'x' }] });
      expect(conf.node('a', 0, 'b').resolve()).toBe('x');
      expect(conf.node('a', -1).qualifiedName).toBe('a.0');
    });
  });

  describe('expressions', () => {
    it('see root, self and the node helpers', () => {
      const conf = new SolConf({
        a: 3,
        b: "$:root['a']",
        c: "$:root['a']() * 2",
        d: "$:node('a')",
        e: '$:len(str(self))'
      });
      expect(conf.resolve()).toEqual({ a: 3, b: 3, c: 6, d: 3, e: 10 });
    });

    it('walk the tree with parent and child', () => {
      const conf = new SolConf({
        lr: 3,
        model: { opt: { scaled: "$:parent(self, 3)['lr']() * 10", local: "$:parent(self)['scaled']() + 1" } },
        wrap: { only: 5 },
        pair: [7],
        x: "$:child(node('wrap'))()",
        y: "$:child(node('pair'))()"
      });
      expect(conf.resolve()).toEqual({
        lr: 3,
        model: { opt: { scaled: 30, local: 31 } },
        wrap: { only: 5 },
        pair: [7],
        x: 5,
        y: 7
      });
      expect(() => new SolConf({ a: '$:parent(self, 2)' }).resolve()).toThrow(
        "Reference '...' ascends past the root"
      );
      expect(() => new SolConf({ two: { a: 1, b: 2 }, z: "$:child(node('two'))" }).resolve()).toThrow(
        'child() expects exactly one child, mapping has 2'
      );
    });

    it('read declared values with raw_value', () => {
      const raw = { a: '$:1 + 1', b: "$:raw_value(node('a'))" };
      expect(new SolConf(raw).resolve()).toEqual({ a: 2, b: '$:1 + 1' });
      expect(new SolConf(raw, { overrides: ['a = 5'] }).resolve()).toEqual({ a: 5, b: 5 });
      expect(() => new SolConf({ a: '$:raw_value(root)' }).resolve()).toThrow(
        'raw_value() expects a scalar node, got mapping node'
      );
    });

    it('leave escaped prefixes as literal text', () => {
      const conf = new SolConf({ a: '\\$:not an expression', b: 'plain $: text' });
      expect(conf.resolve()).toEqual({ a: '$:not an expression', b: 'plain $: text' });
    });

    it('honour a configured prefix', () => {
      const conf = new SolConf({ a: '= 1 + 1', b: '$:1' }, { config: { interpolationPrefix: '=' } });
      expect(conf.resolve()).toEqual({ a: 2, b: '$:1' });
    });

    it('use names from the instance context', () => {
      const conf = new SolConf({ a: '$:scale * 2' }, { context: { scale: 21 } });
      expect(conf.resolve()).toEqual({ a: 42 });
      expect(() => new SolConf({ a: '$:scale' }).resolve()).toThrow("Name 'scale' is not defined");
    });

    it('locate evaluation failures and record the containers', () => {
      const conf = new SolConf({ a: { b: '$:1 / 0' } });
      const first = failure(() => conf.resolve());
      expect(first).toBeInstanceOf(EvalError);
      expect(first.message).toBe("scalar 'a.b': Division by zero");
      expect(first.location).toEqual({ address: 'a.b', kind: 'scalar' });
      expect(first.trail).toEqual(['a', '']);
      expect(failure(() => conf.resolve())).toBe(first);
    });
  });

  describe('type constraints', () => {
    it('reject values outside the declared types', () => {
      const error = failure(() => new SolConf({ 'val:int': 1.5 }).resolve());
      expect(error).toBeInstanceOf(TypeConstraintError);
      expect(error.message).toBe("scalar 'val': Expected a value of type int but got float");
      expect(new SolConf({ 'val:int': 1 }).resolve()).toEqual({ val: 1 });
    });

    it('accept any of several types, including null', () => {
      const conf = new SolConf({ 'a:int, null': null, 'b:str, list': [1] });
      expect(conf.resolve()).toEqual({ a: null, b: [1] });
    });

    it('check overridden and computed values', () => {
      expect(() => new SolConf({ 'a:int': 1 }, { overrides: ["a = 'x'"] }).resolve()).toThrow(TypeConstraintError);
      expect(() => new SolConf({ 'a:str': '$:1 + 1' }).resolve()).toThrow(
        "scalar 'a': Expected a value of type str but got int"
      );
    });

    it('reject declarations that are not types', () => {
      expect(() => new SolConf({ 'a:1': 1 }).resolve()).toThrow(
        "entry '*a': Type declaration '1' contains a int, not a type"
      );
    });
  });

  describe('required values', () => {
    it('fail when left at null', () => {
      const error = failure(() => new SolConf({ 'n::required': null }).resolve());
      expect(error).toBeInstanceOf(RequirementError);
      expect(error.message).toBe("scalar 'n': Required value was not provided");
    });

    it('pass with a non-null default', () => {
      expect(new SolConf({ 'n::required': 4 }).resolve()).toEqual({ n: 4 });
    });
  });

  describe('re-resolution', () => {
    it('returns the cached value without evaluating again', () => {
      const tick = vi.fn(() => 7);
      const conf = new SolConf(
        { a: '$:tick()', b: "$:ref('a')" },
        { context: { tick: new ExpressionFunction('tick', tick) } }
      );
      const first = conf.resolve();
      const second = conf.resolve();
      expect(second).toBe(first);
      expect(first).toEqual({ a: 7, b: 7 });
      expect(tick).toHaveBeenCalledTimes(1);
    });
  });
});
