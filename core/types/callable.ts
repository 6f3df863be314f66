/**
 * Protocols the expression evaluator uses to call and index host values.
 */

export type KeywordArguments = Record<string, unknown>;

/**
 * A value that can appear in call position inside an expression.
 */
export interface Invocable {
  invoke(args: unknown[], kwargs: KeywordArguments): unknown;
}

/**
 * A value that can be indexed with `value[key]` inside an expression.
 */
export interface Subscriptable {
  subscript(key: unknown): unknown;
}

export function isInvocable(value: unknown): value is Invocable {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'invoke') === 'function'
  );
}

export function isSubscriptable(value: unknown): value is Subscriptable {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'subscript') === 'function'
  );
}

export type FunctionImpl = (args: unknown[], kwargs: KeywordArguments) => unknown;

/**
 * A named host function exposed to expressions.
 */
export class ExpressionFunction implements Invocable {
  readonly typeName = 'function';

  constructor(
    public readonly name: string,
    private readonly impl: FunctionImpl
  ) {}

  invoke(args: unknown[], kwargs: KeywordArguments): unknown {
    return this.impl(args, kwargs);
  }

  toString(): string {
    return `<function ${this.name}>`;
  }
}
