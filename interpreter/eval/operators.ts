import { EvalError } from '@core/errors';
import { describeType, isPlainMapping } from '@core/types/native';
import { isSubscriptable } from '@core/types/callable';
import type { BinaryOperator, CompareOperator } from '@grammar/types/expression';

/**
 * Truthiness of expression values: null, false, 0, NaN, '' and empty
 * collections are false.
 */
export function isTruthy(value: unknown): boolean {
  if (value === null || value === undefined) {
    return false;
  }

  if (typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'number') {
    return value !== 0 && !isNaN(value);
  }

  if (typeof value === 'string') {
    return value.length > 0;
  }

  if (Array.isArray(value)) {
    return value.length > 0;
  }

  if (value instanceof Set) {
    return value.size > 0;
  }

  if (isPlainMapping(value)) {
    return Object.keys(value).length > 0;
  }

  return true;
}

/**
 * Structural equality over lists, mappings and sets; identity for anything else.
 */
export function isEqual(a: unknown, b: unknown): boolean {
  if (a === b) {
    return true;
  }
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => isEqual(item, b[i]));
  }
  if (a instanceof Set && b instanceof Set) {
    return a.size === b.size && [...a].every(item => contains(b, item));
  }
  if (isPlainMapping(a) && isPlainMapping(b)) {
    const keys = Object.keys(a);
    return (
      keys.length === Object.keys(b).length &&
      keys.every(key => Object.prototype.hasOwnProperty.call(b, key) && isEqual(a[key], b[key]))
    );
  }
  return false;
}

function contains(collection: Iterable<unknown>, item: unknown): boolean {
  for (const candidate of collection) {
    if (isEqual(candidate, item)) {
      return true;
    }
  }
  return false;
}

function isNumber(value: unknown): value is number {
  return typeof value === 'number';
}

function operandError(operator: string, left: unknown, right: unknown): EvalError {
  return new EvalError(
    `Unsupported operand types for ${operator}: ${describeType(left)} and ${describeType(right)}`
  );
}

function repeat(sequence: unknown, count: unknown): unknown {
  if (!isNumber(count) || !Number.isInteger(count)) {
    return undefined;
  }
  const times = Math.max(0, count);
  if (typeof sequence === 'string') {
    return sequence.repeat(times);
  }
  if (Array.isArray(sequence)) {
    const result: unknown[] = [];
    for (let i = 0; i < times; i++) {
      result.push(...sequence);
    }
    return result;
  }
  return undefined;
}

/**
 * Arithmetic operators. `+` also concatenates strings and lists; `*` repeats
 * a string or list by an integer.
 */
export function applyBinary(operator: BinaryOperator, left: unknown, right: unknown): unknown {
  switch (operator) {
    case '+':
      if (isNumber(left) && isNumber(right)) return left + right;
      if (typeof left === 'string' && typeof right === 'string') return left + right;
      if (Array.isArray(left) && Array.isArray(right)) return [...left, ...right];
      throw operandError(operator, left, right);
    case '-':
      if (isNumber(left) && isNumber(right)) return left - right;
      throw operandError(operator, left, right);
    case '*': {
      if (isNumber(left) && isNumber(right)) return left * right;
      const repeated = repeat(left, right) ?? repeat(right, left);
      if (repeated !== undefined) return repeated;
      throw operandError(operator, left, right);
    }
    case '/':
      if (isNumber(left) && isNumber(right)) {
        if (right === 0) throw new EvalError('Division by zero');
        return left / right;
      }
      throw operandError(operator, left, right);
    case '%':
      if (isNumber(left) && isNumber(right)) {
        if (right === 0) throw new EvalError('Modulo by zero');
        // Result takes the sign of the divisor
        return ((left % right) + right) % right;
      }
      throw operandError(operator, left, right);
    case '**':
      if (isNumber(left) && isNumber(right)) return left ** right;
      throw operandError(operator, left, right);
  }
}

export function applyUnary(operator: '-' | '+' | '!', argument: unknown): unknown {
  if (operator === '!') {
    return !isTruthy(argument);
  }
  if (!isNumber(argument)) {
    throw new EvalError(`Bad operand type for unary ${operator}: ${describeType(argument)}`);
  }
  return operator === '-' ? -argument : argument;
}

/**
 * Membership test behind the `in` operator.
 */
export function isMember(item: unknown, container: unknown): boolean {
  if (typeof container === 'string') {
    if (typeof item !== 'string') {
      throw new EvalError(`'in <str>' requires a str on the left, got ${describeType(item)}`);
    }
    return container.includes(item);
  }
  if (Array.isArray(container) || container instanceof Set) {
    return contains(container, item);
  }
  if (isPlainMapping(container)) {
    return typeof item === 'string' && Object.prototype.hasOwnProperty.call(container, item);
  }
  throw new EvalError(`Argument of type ${describeType(container)} does not support 'in'`);
}

export function compare(operator: CompareOperator, left: unknown, right: unknown): boolean {
  switch (operator) {
    case '==':
      return isEqual(left, right);
    case '!=':
      return !isEqual(left, right);
    case 'in':
      return isMember(left, right);
    default:
      break;
  }
  if (isNumber(left) && isNumber(right)) {
    return ordered(operator, Math.sign(left - right));
  }
  if (typeof left === 'string' && typeof right === 'string') {
    return ordered(operator, left < right ? -1 : left > right ? 1 : 0);
  }
  throw operandError(operator, left, right);
}

// sign is NaN when either number operand is NaN, making every ordering false
function ordered(operator: '<' | '<=' | '>' | '>=', sign: number): boolean {
  switch (operator) {
    case '<':
      return sign < 0;
    case '<=':
      return sign <= 0;
    case '>':
      return sign > 0;
    case '>=':
      return sign >= 0;
  }
}

function normalizeIndex(index: unknown, length: number): number {
  if (!isNumber(index) || !Number.isInteger(index)) {
    throw new EvalError(`Indices must be integers, not ${describeType(index)}`);
  }
  const position = index < 0 ? index + length : index;
  if (position < 0 || position >= length) {
    throw new EvalError(`Index ${index} out of range for length ${length}`);
  }
  return position;
}

/**
 * `object[index]` for lists, strings, mappings and subscriptable host values.
 */
export function getIndex(object: unknown, index: unknown): unknown {
  if (Array.isArray(object)) {
    return object[normalizeIndex(index, object.length)];
  }
  if (typeof object === 'string') {
    return object[normalizeIndex(index, object.length)];
  }
  if (isPlainMapping(object)) {
    if (typeof index !== 'string' || !Object.prototype.hasOwnProperty.call(object, index)) {
      throw new EvalError(`Key ${formatValue(index)} not found`);
    }
    return object[index];
  }
  if (isSubscriptable(object)) {
    return object.subscript(index);
  }
  throw new EvalError(`Value of type ${describeType(object)} is not subscriptable`);
}

function sliceBound(value: unknown, name: string): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isNumber(value) || !Number.isInteger(value)) {
    throw new EvalError(`Slice ${name} must be an integer, not ${describeType(value)}`);
  }
  return value;
}

/**
 * Start/stop/step slicing with negative bounds and clamping.
 */
export function getSlice(object: unknown, start: unknown, stop: unknown, step: unknown): unknown {
  let items: unknown[];
  if (typeof object === 'string') {
    items = [...object];
  } else if (Array.isArray(object)) {
    items = object;
  } else {
    throw new EvalError(`Value of type ${describeType(object)} cannot be sliced`);
  }
  const isString = typeof object === 'string';
  const length = items.length;
  const stride = sliceBound(step, 'step') ?? 1;
  if (stride === 0) {
    throw new EvalError('Slice step cannot be zero');
  }

  const clamp = (bound: number | undefined, fallback: number): number => {
    if (bound === undefined) return fallback;
    const adjusted = bound < 0 ? bound + length : bound;
    return stride > 0
      ? Math.min(Math.max(adjusted, 0), length)
      : Math.min(Math.max(adjusted, -1), length - 1);
  };

  const from = clamp(sliceBound(start, 'start'), stride > 0 ? 0 : length - 1);
  const to = clamp(sliceBound(stop, 'stop'), stride > 0 ? length : -1);

  const result: unknown[] = [];
  for (let i = from; stride > 0 ? i < to : i > to; i += stride) {
    result.push(items[i]);
  }
  return isString ? result.join('') : result;
}

/**
 * Values visited by comprehensions and iterable-consuming builtins.
 */
export function iterate(value: unknown): unknown[] {
  if (Array.isArray(value)) return value;
  if (typeof value === 'string') return [...value];
  if (value instanceof Set) return [...value];
  if (isPlainMapping(value)) return Object.keys(value);
  throw new EvalError(`Value of type ${describeType(value)} is not iterable`);
}

/**
 * Display form used by str() and error messages.
 */
export function formatValue(value: unknown): string {
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (Array.isArray(value)) return `[${value.map(formatValue).join(', ')}]`;
  if (value instanceof Set) return `{${[...value].map(formatValue).join(', ')}}`;
  if (isPlainMapping(value)) {
    const pairs = Object.entries(value).map(([k, v]) => `${JSON.stringify(k)}: ${formatValue(v)}`);
    return `{${pairs.join(', ')}}`;
  }
  return String(value);
}
