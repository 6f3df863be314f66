import { describe, it, expect } from 'vitest';
import { SolConf } from '@api/SolConf';
import {
  ChoiceConstraintError,
  ConstructionError,
  CyclicDependencyError,
  TypeConstraintError,
  UnitNotFoundError
} from '@core/errors';
import { MappingNode } from '@core/tree';
import { createDefaultRegistry } from '@interpreter/env/defaults';
import { MemoryUnitLoader } from '@interpreter/loader/UnitLoader';
import { defineModifier } from './custom';

function resolve(raw: unknown, overrides: string[] = []): unknown {
  return new SolConf(raw, { overrides }).resolve();
}

describe('modifiers', () => {
  describe('hidden and visible', () => {
    it('apply in declaration order', () => {
      expect(resolve({ 'a::hidden, visible': 1, 'b::visible, hidden': 2 })).toEqual({ a: 1 });
    });

    it('hide the content a choice swaps in', () => {
      expect(resolve({ 'a::choices({"x": {"v": 1}}, "x"), hidden': null, b: 2 })).toEqual({ b: 2 });
    });
  });

  describe('promote', () => {
    it('lifts a single entry into its parent slot', () => {
      expect(resolve({ '_::promote': 1 })).toEqual(1);
      expect(resolve({ _: 1 })).toEqual({ _: 1 });
      expect(resolve({ a: { 'v::promote': [1, 2] } })).toEqual({ a: [1, 2] });
    });

    it('keeps the promoted node addressable at its new place', () => {
      const conf = new SolConf({ a: { '_::promote': { b: 1 } } });
      expect(conf.get('a.b').qualifiedName).toBe('a.b');
      expect(conf.resolve()).toEqual({ a: { b: 1 } });
    });

    it('rejects mappings with more than one entry', () => {
      expect(() => resolve({ a: { '_::promote': 1, b: 2 } })).toThrow(
        "entry 'a.*_': promote requires a single-entry mapping, found keys _, b"
      );
    });
  });

  describe('rename', () => {
    it('changes the emitted key only', () => {
      expect(resolve({ 'lr::rename("learning_rate")': 0.1 }, ['lr = 0.2'])).toEqual({ learning_rate: 0.2 });
    });

    it('rejects two entries emitted under one key', () => {
      expect(() => resolve({ 'a::rename("b")': 1, b: 2 })).toThrow(
        "mapping '<root>': Entries 'a' and 'b' are both emitted as 'b'"
      );
    });
  });

  describe('cast', () => {
    it('converts the value before the type check', () => {
      expect(resolve({ 'n:int:cast(int)': '42', 's::cast(upper)': 'abc' })).toEqual({ n: 42, s: 'ABC' });
    });

    it('rejects arguments that cannot be called', () => {
      expect(() => resolve({ 'n::cast(1)': '42' })).toThrow("entry '*n': cast() expects a callable, got int");
    });

    it('keeps its transform when a later modifier replaces the node', () => {
      expect(resolve({ 'n::cast(str), choices({"a": 1, "b": 2})': 'b' })).toEqual({ n: '2' });
      const conf = new SolConf({ 'opt::required, choices({"a": {"v": 1}})': 'a' });
      expect(conf.resolve()).toEqual({ opt: { v: 1 } });
      expect(conf.get('opt').required).toBe(true);
    });
  });

  describe('choices', () => {
    it('checks values against a plain list', () => {
      expect(resolve({ 'mode::choices("a", "b")': 'a' })).toEqual({ mode: 'a' });
      expect(resolve({ 'mode::choices(["a", "b"])': 'c' }, ['mode = "b"'])).toEqual({ mode: 'b' });
      expect(() => resolve({ 'mode::choices("a", "b")': 'c' })).toThrow(ChoiceConstraintError);
      expect(() => resolve({ 'mode::choices("a", "b")': 'c' })).toThrow(
        `scalar 'mode': "c" is not one of "a", "b"`
      );
    });

    it('swaps in the selected named option', () => {
      const raw = { 'opt::choices({"small": {"w": 1}, "big": {"w": 9}}, "small")': null };
      expect(resolve(raw)).toEqual({ opt: { w: 1 } });
      expect(resolve(raw, ["opt = 'big'"])).toEqual({ opt: { w: 9 } });
      expect(resolve(raw, ["opt = 'big'", 'opt.w = 10'])).toEqual({ opt: { w: 10 } });
    });

    it('fails without a selection or a default', () => {
      expect(() => resolve({ 'opt::choices({"a": 1, "b": 2})': null })).toThrow(
        "entry '*opt': No choice selected and no default; expected one of a, b"
      );
      expect(() => resolve({ 'opt::choices({"a": 1})': 'z' })).toThrow(`entry '*opt': "z" is not one of a`);
    });

    it('merges named options with an inherited declaration', () => {
      const conf = new SolConf({
        'base::hidden': { 'size::choices({"s": 1, "m": 2}, "s")': null },
        'derived::extends("base")': { 'size::choices({"l": 3})': 'l' },
        'plain::extends("base")': {}
      });
      expect(conf.resolve()).toEqual({ derived: { size: 3 }, plain: { size: 1 } });
    });
  });

  describe('extends', () => {
    const raw = {
      'base::hidden': { lr: 0.1, 'depth:int': 3 },
      'model::extends("base")': { depth: 5, extra: true }
    };

    it('lays derived entries over the base', () => {
      const result = new SolConf(raw).resolve();
      expect(result).toEqual({ model: { depth: 5, extra: true, lr: 0.1 } });
      const model = new SolConf(raw).get('model');
      expect(model).toBeInstanceOf(MappingNode);
      expect(model instanceof MappingNode && model.keys).toEqual(['depth', 'extra', 'lr']);
    });

    it('inherits declared types', () => {
      expect(() => resolve(raw, ["model.depth = 'deep'"])).toThrow(TypeConstraintError);
      expect(() => resolve(raw, ["model.depth = 'deep'"])).toThrow(
        "scalar 'model.depth': Expected a value of type int but got str"
      );
    });

    it('accepts a node as the base', () => {
      expect(resolve({ 'base::hidden': { a: 1 }, 'd::derives(node("base"))': { b: 2 } })).toEqual({
        d: { b: 2, a: 1 }
      });
    });

    it('copies base content rather than sharing it', () => {
      expect(resolve(raw, ['model.lr = 0.5'])).toEqual({ model: { depth: 5, extra: true, lr: 0.5 } });
      const conf = new SolConf({ base: { lr: 0.1 }, 'model::extends("base")': {} }, { overrides: ['model.lr = 0.5'] });
      expect(conf.resolve()).toEqual({ base: { lr: 0.1 }, model: { lr: 0.5 } });
    });

    it('requires mappings on both sides', () => {
      expect(() => resolve({ base: 1, 'd::extends("base")': {} })).toThrow(
        "entry '*d': Base 'base' of extends is a scalar, not a mapping"
      );
      expect(() => resolve({ base: {}, 'd::extends("base")': 1 })).toThrow(
        "entry '*d': extends requires a mapping value, got a scalar"
      );
    });
  });

  describe('load', () => {
    const loader = new MemoryUnitLoader({
      'models/resnet': { depth: 50, 'width:int': 64 },
      'models/vit': { depth: 12, heads: 8 },
      shared: { x: 3, inner: { y: "$:unit['x']() * 2" } }
    });

    it('replaces a unit name with the unit content', () => {
      const conf = new SolConf({ "model::load('models')": 'resnet' }, { loader });
      expect(conf.resolve()).toEqual({ model: { depth: 50, width: 64 } });
      expect(conf.loadedUnits()).toEqual(['models/resnet']);
    });

    it('selects the unit through an override and overrides inside it', () => {
      const conf = new SolConf(
        { "model::load('models')": 'resnet' },
        { loader, overrides: ["model = 'vit'", 'model.heads = 4'] }
      );
      expect(conf.resolve()).toEqual({ model: { depth: 12, heads: 4 } });
    });

    it('gives each load site its own instance', () => {
      const conf = new SolConf({ 'a::load': 'shared', 'b::load': 'shared' }, { loader, overrides: ['a.x = 5'] });
      const result = conf.resolve();
      expect(result).toEqual({ a: { x: 5, inner: { y: 10 } }, b: { x: 3, inner: { y: 6 } } });
      expect(conf.get('a.inner')).not.toBe(conf.get('b.inner'));
      expect(conf.loadedUnits()).toEqual(['shared']);
    });

    it('leaves structured values alone', () => {
      expect(new SolConf({ 'a::load': { x: 1 } }, { loader }).resolve()).toEqual({ a: { x: 1 } });
    });

    it('substitutes vars into the loaded unit before overrides', () => {
      const raw = { 'model::load("models", vars={"depth": 18})': 'resnet' };
      expect(new SolConf(raw, { loader }).resolve()).toEqual({ model: { depth: 18, width: 64 } });
      expect(new SolConf(raw, { loader, overrides: ['model.depth = 20'] }).resolve()).toEqual({
        model: { depth: 20, width: 64 }
      });
      expect(() =>
        new SolConf({ 'model::load("models", vars={"nope": 1})': 'resnet' }, { loader }).resolve()
      ).toThrow("entry '*model': load vars: unit 'models/resnet' has no node at 'nope'");
    });

    it('loads the same unit at sibling sites inside another unit', () => {
      const nested = new MemoryUnitLoader({ pair: { 'left::load': 'leaf', 'right::load': 'leaf' }, leaf: { v: 1 } });
      expect(new SolConf({ 'p::load': 'pair' }, { loader: nested }).resolve()).toEqual({
        p: { left: { v: 1 }, right: { v: 1 } }
      });
    });

    it('rejects units that load themselves', () => {
      const cyclic = new MemoryUnitLoader({
        self: { 'next::load': 'self' },
        a: { 'n::load': 'b' },
        b: { 'n::load': 'a' }
      });
      const direct = new SolConf({ 'top::load': 'self' }, { loader: cyclic });
      expect(() => direct.resolve()).toThrow(CyclicDependencyError);
      expect(() => direct.resolve()).toThrow("entry 'top.*next': Cyclic dependency: self -> self");
      expect(() => new SolConf({ 'top::load': 'a' }, { loader: cyclic }).resolve()).toThrow(
        "entry 'top.n.*n': Cyclic dependency: a -> b -> a"
      );
    });

    it('reports missing units and bad names', () => {
      expect(() => new SolConf({ 'a::load': 'nope' }, { loader }).resolve()).toThrow(UnitNotFoundError);
      expect(() => new SolConf({ 'a::load': '../x' }, { loader }).resolve()).toThrow("Invalid unit name '../x'");
      expect(() => new SolConf({ 'a::load': 'shared' }).resolve()).toThrow(
        "entry '*a': Cannot load unit 'shared': no unit loader configured"
      );
    });
  });

  describe('fuse', () => {
    it('reads types and modifiers from the value', () => {
      const raw = { 'lr::fuse': { value: '0.5', types: 'float', modifiers: ['cast(float)'] } };
      expect(resolve(raw)).toEqual({ lr: 0.5 });
    });

    it('applies the fused types', () => {
      expect(() => resolve({ 'lr::fuse': { value: 'x', types: ['int', 'float'] } })).toThrow(
        "scalar 'lr': Expected a value of type int | float but got str"
      );
    });

    it('rejects unknown keys', () => {
      expect(() => resolve({ 'lr::fuse': { value: 1, kind: 'x' } })).toThrow(ConstructionError);
      expect(() => resolve({ 'lr::fuse': 1 })).toThrow(
        "entry '*lr': fuse requires a mapping with a 'value' key, got a scalar"
      );
    });
  });

  describe('custom modifiers', () => {
    it('run host functions registered by name', () => {
      const registry = createDefaultRegistry().register(
        'double',
        defineModifier('double', node => {
          node.valueTransforms.push(value => Number(value) * 2);
        })
      );
      expect(new SolConf({ 'x::double': 4 }, { registry }).resolve()).toEqual({ x: 8 });
    });

    it('must return a node or nothing', () => {
      const conf = new SolConf({ 'x::odd': 1 }, { context: { odd: defineModifier('odd', () => undefined) } });
      expect(conf.resolve()).toEqual({ x: 1 });
    });

    it('reject declarations that are not modifiers', () => {
      expect(() => resolve({ 'x::1': 1 })).toThrow(ConstructionError);
    });
  });
});
