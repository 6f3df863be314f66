import { EvalError } from '@core/errors';
import { describeType } from '@core/types/native';
import { MappingNode, Node, ScalarNode, SequenceNode } from '@core/tree';
import type { BuiltinFunctionDefinition } from './functions';

function expectNode(fn: string, value: unknown): Node {
  if (!(value instanceof Node)) {
    throw new EvalError(`${fn}() expects a node, got ${describeType(value)}`);
  }
  return value.current();
}

function expectLevels(fn: string, value: unknown): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new EvalError(`${fn}() levels must be a positive int, got ${describeType(value)}`);
  }
  return value;
}

/**
 * Functions over tree nodes, e.g. `parent(self)['lr']()` or `raw_value(node('x'))`.
 */
export const nodeFunctions: BuiltinFunctionDefinition[] = [
  {
    name: 'parent',
    description: 'Enclosing mapping or sequence of a node, levels steps up (default 1)',
    implementation: (args, kwargs) => {
      if (args.length < 1 || args.length > 2) {
        throw new EvalError(`parent() takes 1 to 2 arguments but ${args.length} were given`);
      }
      const node = expectNode('parent', args[0]);
      return node.ancestor(expectLevels('parent', args[1] ?? kwargs.levels ?? 1));
    }
  },
  {
    name: 'child',
    description: 'The only child of a mapping or sequence node',
    implementation: args => {
      if (args.length !== 1) {
        throw new EvalError(`child() takes 1 argument but ${args.length} were given`);
      }
      const node = expectNode('child', args[0]).settled();
      if (node instanceof MappingNode) {
        const { keys } = node;
        if (keys.length !== 1) {
          throw new EvalError(`child() expects exactly one child, mapping has ${keys.length}`);
        }
        return node.child(keys[0]);
      }
      if (node instanceof SequenceNode) {
        if (node.length !== 1) {
          throw new EvalError(`child() expects exactly one child, sequence has ${node.length}`);
        }
        return node.child(0);
      }
      throw new EvalError(`child() expects a mapping or sequence node, got ${describeType(node)}`);
    }
  },
  {
    name: 'raw_value',
    description: 'Declared value of a scalar node, or its override, before evaluation',
    implementation: args => {
      if (args.length !== 1) {
        throw new EvalError(`raw_value() takes 1 argument but ${args.length} were given`);
      }
      const node = expectNode('raw_value', args[0]);
      if (!(node instanceof ScalarNode)) {
        throw new EvalError(`raw_value() expects a scalar node, got ${describeType(node)}`);
      }
      return node.definedValue();
    }
  }
];
