import { EvalError } from '@core/errors';
import { isInvocable } from '@core/types/callable';
import type { Invocable } from '@core/types/callable';
import { describeType } from '@core/types/native';
import { Modifier } from '@core/tree';
import type { Node } from '@core/tree';
import { ModifierFactory, expectArguments } from './factory';

/**
 * Pass the computed value through a callable before the type check,
 * e.g. `cast(int)` or `cast(upper)`.
 */
export class CastModifier extends Modifier {
  readonly kind = 'cast';

  constructor(readonly fn: Invocable) {
    super();
  }

  apply(node: Node): void {
    node.valueTransforms.push(value => this.fn.invoke([value], {}));
  }
}

export const cast = new ModifierFactory('cast', args => {
  expectArguments('cast', args, 1);
  const [fn] = args;
  if (!isInvocable(fn)) {
    throw new EvalError(`cast() expects a callable, got ${describeType(fn)}`);
  }
  return new CastModifier(fn);
});
