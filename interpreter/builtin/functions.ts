import { EvalError } from '@core/errors';
import { describeType, isPlainMapping } from '@core/types/native';
import { ExpressionFunction } from '@core/types/callable';
import type { KeywordArguments } from '@core/types/callable';
import { compare, isTruthy, iterate } from '@interpreter/eval/operators';
import { nodeFunctions } from './nodes';
import { toText } from './types';

export interface BuiltinFunctionDefinition {
  name: string;
  description: string;
  implementation: (args: unknown[], kwargs: KeywordArguments) => unknown;
}

function expectNumber(fn: string, value: unknown): number {
  if (typeof value !== 'number') {
    throw new EvalError(`${fn}() expects a number, got ${describeType(value)}`);
  }
  return value;
}

function expectInteger(fn: string, value: unknown): number {
  const number = expectNumber(fn, value);
  if (!Number.isInteger(number)) {
    throw new EvalError(`${fn}() expects an int, got float`);
  }
  return number;
}

function expectMapping(fn: string, value: unknown): Record<string, unknown> {
  if (!isPlainMapping(value)) {
    throw new EvalError(`${fn}() expects a dict, got ${describeType(value)}`);
  }
  return value;
}

function expectArity(fn: string, args: unknown[], min: number, max = min): void {
  if (args.length < min || args.length > max) {
    const expected = min === max ? `${min}` : `${min} to ${max}`;
    throw new EvalError(`${fn}() takes ${expected} positional arguments but ${args.length} were given`);
  }
}

function order(a: unknown, b: unknown): number {
  if (compare('<', a, b)) return -1;
  if (compare('>', a, b)) return 1;
  return 0;
}

/**
 * min()/max() accept either one iterable or several values.
 */
function extreme(fn: string, args: unknown[], pick: (a: unknown, b: unknown) => boolean): unknown {
  const candidates = args.length === 1 ? iterate(args[0]) : args;
  if (candidates.length === 0) {
    throw new EvalError(`${fn}() arg is an empty sequence`);
  }
  return candidates.reduce((best, item) => (pick(item, best) ? item : best));
}

export const builtinFunctions: BuiltinFunctionDefinition[] = [
  {
    name: 'len',
    description: 'Length of a string, list, set or dict',
    implementation: args => {
      expectArity('len', args, 1);
      const [value] = args;
      if (typeof value === 'string' || Array.isArray(value)) return value.length;
      if (value instanceof Set) return value.size;
      if (isPlainMapping(value)) return Object.keys(value).length;
      throw new EvalError(`Object of type ${describeType(value)} has no len()`);
    }
  },
  {
    name: 'range',
    description: 'range(stop) or range(start, stop[, step]) as a list of ints',
    implementation: args => {
      expectArity('range', args, 1, 3);
      const [start, stop, step] =
        args.length === 1
          ? [0, expectInteger('range', args[0]), 1]
          : [
              expectInteger('range', args[0]),
              expectInteger('range', args[1]),
              args.length === 3 ? expectInteger('range', args[2]) : 1
            ];
      if (step === 0) {
        throw new EvalError('range() arg 3 must not be zero');
      }
      const result: number[] = [];
      for (let i = start; step > 0 ? i < stop : i > stop; i += step) {
        result.push(i);
      }
      return result;
    }
  },
  {
    name: 'min',
    description: 'Smallest item of an iterable or of the arguments',
    implementation: args => extreme('min', args, (a, b) => compare('<', a, b))
  },
  {
    name: 'max',
    description: 'Largest item of an iterable or of the arguments',
    implementation: args => extreme('max', args, (a, b) => compare('>', a, b))
  },
  {
    name: 'sum',
    description: 'Sum of a list of numbers, plus an optional start value',
    implementation: (args, kwargs) => {
      expectArity('sum', args, 1, 2);
      const start = expectNumber('sum', args[1] ?? kwargs.start ?? 0);
      return iterate(args[0]).reduce<number>((total, item) => total + expectNumber('sum', item), start);
    }
  },
  {
    name: 'abs',
    description: 'Absolute value',
    implementation: args => {
      expectArity('abs', args, 1);
      return Math.abs(expectNumber('abs', args[0]));
    }
  },
  {
    name: 'round',
    description: 'Round to a number of decimal digits (default 0)',
    implementation: (args, kwargs) => {
      expectArity('round', args, 1, 2);
      const value = expectNumber('round', args[0]);
      const digits = expectInteger('round', args[1] ?? kwargs.ndigits ?? 0);
      const factor = 10 ** digits;
      return Math.round(value * factor) / factor;
    }
  },
  {
    name: 'floor',
    description: 'Largest int not greater than the argument',
    implementation: args => {
      expectArity('floor', args, 1);
      return Math.floor(expectNumber('floor', args[0]));
    }
  },
  {
    name: 'ceil',
    description: 'Smallest int not less than the argument',
    implementation: args => {
      expectArity('ceil', args, 1);
      return Math.ceil(expectNumber('ceil', args[0]));
    }
  },
  {
    name: 'keys',
    description: 'Keys of a dict, in insertion order',
    implementation: args => {
      expectArity('keys', args, 1);
      return Object.keys(expectMapping('keys', args[0]));
    }
  },
  {
    name: 'values',
    description: 'Values of a dict, in insertion order',
    implementation: args => {
      expectArity('values', args, 1);
      return Object.values(expectMapping('values', args[0]));
    }
  },
  {
    name: 'items',
    description: '[key, value] pairs of a dict',
    implementation: args => {
      expectArity('items', args, 1);
      return Object.entries(expectMapping('items', args[0]));
    }
  },
  {
    name: 'zip',
    description: 'Lists of corresponding items, truncated to the shortest input',
    implementation: args => {
      const lists = args.map(iterate);
      const length = lists.length === 0 ? 0 : Math.min(...lists.map(list => list.length));
      return Array.from({ length }, (_, i) => lists.map(list => list[i]));
    }
  },
  {
    name: 'enumerate',
    description: '[index, item] pairs, counting from start (default 0)',
    implementation: (args, kwargs) => {
      expectArity('enumerate', args, 1, 2);
      const start = expectInteger('enumerate', args[1] ?? kwargs.start ?? 0);
      return iterate(args[0]).map((item, i) => [start + i, item]);
    }
  },
  {
    name: 'sorted',
    description: 'Sorted copy of an iterable; reverse=true for descending order',
    implementation: (args, kwargs) => {
      expectArity('sorted', args, 1);
      const result = [...iterate(args[0])].sort(order);
      return isTruthy(kwargs.reverse) ? result.reverse() : result;
    }
  },
  {
    name: 'reversed',
    description: 'Reversed copy of a list or string characters',
    implementation: args => {
      expectArity('reversed', args, 1);
      return [...iterate(args[0])].reverse();
    }
  },
  {
    name: 'any',
    description: 'True if any item is truthy',
    implementation: args => {
      expectArity('any', args, 1);
      return iterate(args[0]).some(isTruthy);
    }
  },
  {
    name: 'all',
    description: 'True if every item is truthy',
    implementation: args => {
      expectArity('all', args, 1);
      return iterate(args[0]).every(isTruthy);
    }
  },
  {
    name: 'join',
    description: 'Concatenate items as text with a separator (default empty)',
    implementation: (args, kwargs) => {
      expectArity('join', args, 1, 2);
      const separator = args[1] ?? kwargs.separator ?? '';
      if (typeof separator !== 'string') {
        throw new EvalError(`join() separator must be str, got ${describeType(separator)}`);
      }
      return iterate(args[0]).map(toText).join(separator);
    }
  },
  {
    name: 'upper',
    description: 'Upper-case copy of a string',
    implementation: args => {
      expectArity('upper', args, 1);
      return toText(args[0]).toUpperCase();
    }
  },
  {
    name: 'lower',
    description: 'Lower-case copy of a string',
    implementation: args => {
      expectArity('lower', args, 1);
      return toText(args[0]).toLowerCase();
    }
  },
  {
    name: 'env',
    description: 'Environment variable value, or the default (null) when unset',
    implementation: (args, kwargs) => {
      expectArity('env', args, 1, 2);
      const [name] = args;
      if (typeof name !== 'string') {
        throw new EvalError(`env() expects a variable name, got ${describeType(name)}`);
      }
      const value = process.env[name];
      return value ?? args[1] ?? kwargs.default ?? null;
    }
  },
  {
    name: 'cwd',
    description: 'Current working directory',
    implementation: args => {
      expectArity('cwd', args, 0);
      return process.cwd();
    }
  }
];

export function createBuiltinFunctions(): ExpressionFunction[] {
  return [...builtinFunctions, ...nodeFunctions].map(def => new ExpressionFunction(def.name, def.implementation));
}
