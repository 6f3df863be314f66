import { EvalError } from '@core/errors';
import type { Invocable, KeywordArguments } from '@core/types/callable';
import { describeType } from '@core/types/native';
import type { Modifier } from '@core/tree';

export type ModifierBuilder = (args: unknown[], kwargs: KeywordArguments) => Modifier;

/**
 * Callable that produces a configured modifier, e.g. `rename('lr')`.
 */
export class ModifierFactory implements Invocable {
  readonly typeName = 'modifier factory';

  constructor(
    readonly name: string,
    private readonly build: ModifierBuilder
  ) {}

  invoke(args: unknown[], kwargs: KeywordArguments): Modifier {
    return this.build(args, kwargs);
  }

  toString(): string {
    return `<modifier factory ${this.name}>`;
  }
}

export function expectArguments(fn: string, args: unknown[], min: number, max = min): void {
  if (args.length < min || args.length > max) {
    const expected = min === max ? `${min}` : `${min} to ${max}`;
    throw new EvalError(`${fn}() takes ${expected} arguments but ${args.length} were given`);
  }
}

export function expectString(fn: string, value: unknown): string {
  if (typeof value !== 'string' || value === '') {
    throw new EvalError(`${fn}() expects a non-empty str, got ${describeType(value)}`);
  }
  return value;
}
