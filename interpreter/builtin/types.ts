import { EvalError } from '@core/errors';
import { defineEntry, describeType, isPlainMapping } from '@core/types/native';
import type { Invocable, KeywordArguments } from '@core/types/callable';
import type { TypeConstraint } from '@core/tree/types';
import { formatValue, isTruthy, iterate } from '@interpreter/eval/operators';

/**
 * A named type usable in `name:types` declarations and callable as a cast,
 * e.g. `int('3')`.
 */
export class TypeDescriptor implements TypeConstraint, Invocable {
  readonly typeName = 'type';

  constructor(
    readonly name: string,
    private readonly test: (value: unknown) => boolean,
    private readonly convert: (value: unknown, kwargs: KeywordArguments) => unknown
  ) {}

  accepts(value: unknown): boolean {
    return this.test(value);
  }

  invoke(args: unknown[], kwargs: KeywordArguments): unknown {
    if (args.length > 1) {
      throw new EvalError(`${this.name}() takes at most 1 argument (${args.length} given)`);
    }
    return this.convert(args[0], kwargs);
  }

  toString(): string {
    return `<type ${this.name}>`;
  }
}

function castError(name: string, value: unknown): EvalError {
  return new EvalError(`Cannot convert ${describeType(value)} ${formatValue(value)} to ${name}`);
}

function toNumber(name: string, value: unknown): number {
  if (value === undefined) return 0;
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    if (Number.isFinite(parsed)) return parsed;
  }
  throw castError(name, value);
}

/**
 * String form used by str(): strings pass through, everything else uses the
 * display format.
 */
export function toText(value: unknown): string {
  return typeof value === 'string' ? value : formatValue(value);
}

export const intType = new TypeDescriptor(
  'int',
  value => typeof value === 'number' && Number.isInteger(value),
  value => {
    if (typeof value === 'string' && !/^\s*[+-]?\d+\s*$/.test(value)) {
      throw castError('int', value);
    }
    return Math.trunc(toNumber('int', value));
  }
);

export const floatType = new TypeDescriptor(
  'float',
  value => typeof value === 'number' && Number.isFinite(value),
  value => toNumber('float', value)
);

export const numberType = new TypeDescriptor(
  'number',
  value => typeof value === 'number',
  value => toNumber('number', value)
);

export const strType = new TypeDescriptor(
  'str',
  value => typeof value === 'string',
  value => (value === undefined ? '' : toText(value))
);

export const boolType = new TypeDescriptor(
  'bool',
  value => typeof value === 'boolean',
  value => isTruthy(value)
);

export const listType = new TypeDescriptor(
  'list',
  value => Array.isArray(value),
  value => (value === undefined ? [] : [...iterate(value)])
);

export const setType = new TypeDescriptor(
  'set',
  value => value instanceof Set,
  value => new Set(value === undefined ? [] : iterate(value))
);

export const dictType = new TypeDescriptor(
  'dict',
  value => isPlainMapping(value),
  (value, kwargs) => {
    const result: Record<string, unknown> = {};
    if (isPlainMapping(value)) {
      Object.entries(value).forEach(([k, v]) => defineEntry(result, k, v));
    } else if (value !== undefined) {
      for (const pair of iterate(value)) {
        if (!Array.isArray(pair) || pair.length !== 2 || typeof pair[0] !== 'string') {
          throw new EvalError(`dict() expects [key, value] pairs with str keys, got ${formatValue(pair)}`);
        }
        defineEntry(result, pair[0], pair[1]);
      }
    }
    Object.entries(kwargs).forEach(([k, v]) => defineEntry(result, k, v));
    return result;
  }
);

export const builtinTypes: TypeDescriptor[] = [
  intType,
  floatType,
  numberType,
  strType,
  boolType,
  listType,
  setType,
  dictType
];
