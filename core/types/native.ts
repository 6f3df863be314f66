/**
 * Native value model.
 *
 * The closed set of shapes accepted as raw configuration content and produced
 * by resolution: scalars, ordered sequences and string-keyed mappings.
 */

export type NativeScalar = string | number | boolean | null;

export interface NativeMapping {
  [key: string]: NativeValue;
}

export type NativeValue = NativeScalar | NativeValue[] | NativeMapping;

/**
 * A plain object literal (or an object with a null prototype). Class
 * instances, arrays, dates and sets are not mappings.
 */
export function isPlainMapping(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isNativeScalar(value: unknown): value is NativeScalar {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  );
}

/**
 * Deep check that a value belongs to the native value model.
 */
export function isNativeValue(value: unknown): value is NativeValue {
  if (isNativeScalar(value)) {
    return true;
  }
  if (Array.isArray(value)) {
    return value.every(isNativeValue);
  }
  if (isPlainMapping(value)) {
    return Object.values(value).every(isNativeValue);
  }
  return false;
}

/**
 * Short runtime type name used in error messages and type constraints.
 */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  switch (typeof value) {
    case 'number':
      return Number.isInteger(value) ? 'int' : 'float';
    case 'string':
      return 'str';
    case 'boolean':
      return 'bool';
    case 'function':
      return 'function';
    case 'object':
      break;
    default:
      return typeof value;
  }
  if (Array.isArray(value)) return 'list';
  if (value instanceof Set) return 'set';
  if (isPlainMapping(value)) return 'dict';
  const described = Reflect.get(value, 'typeName');
  if (typeof described === 'string') {
    return described;
  }
  return value.constructor?.name ?? 'object';
}

/**
 * Set a mapping entry without going through `__proto__` setters.
 */
export function defineEntry(target: Record<string, unknown>, key: string, value: unknown): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true
  });
}
