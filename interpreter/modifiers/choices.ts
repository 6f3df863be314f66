import { ChoiceConstraintError, EvalError } from '@core/errors';
import { isPlainMapping } from '@core/types/native';
import { Modifier, Node } from '@core/tree';
import { formatValue, isEqual, iterate } from '@interpreter/eval/operators';
import { ModifierFactory } from './factory';

export type ChoiceSpec =
  | { type: 'options'; options: Record<string, unknown>; fallback?: string }
  | { type: 'values'; values: unknown[] };

/**
 * Restrict a value to a fixed set.
 *
 * With named options the scalar value selects one of them by key and the
 * selected content takes the node's place. With a plain list the resolved
 * value must equal one of the listed values.
 */
export class ChoicesModifier extends Modifier {
  readonly kind = 'choices';

  constructor(readonly spec: ChoiceSpec) {
    super();
  }

  apply(node: Node): Node | void {
    const spec = this.spec;
    if (spec.type === 'values') {
      node.valueTransforms.push(value => {
        if (!spec.values.some(choice => isEqual(choice, value))) {
          throw new ChoiceConstraintError(
            `${formatValue(value)} is not one of ${spec.values.map(formatValue).join(', ')}`,
            spec.values
          );
        }
        return value;
      });
      return;
    }

    const keys = Object.keys(spec.options);
    const selected = node.resolve() ?? spec.fallback;
    if (selected === undefined || selected === null) {
      throw new ChoiceConstraintError(`No choice selected and no default; expected one of ${keys.join(', ')}`, keys);
    }
    if (typeof selected !== 'string' || !Object.prototype.hasOwnProperty.call(spec.options, selected)) {
      throw new ChoiceConstraintError(`${formatValue(selected)} is not one of ${keys.join(', ')}`, keys);
    }
    const option = spec.options[selected];
    const replacement = option instanceof Node ? option.copy() : node.session.build(option, node.qualifiedName);
    return node.replaceWith(replacement);
  }

  /**
   * Named options merge with the base's; the derived default wins.
   */
  inherit(base: Modifier): Modifier {
    if (base instanceof ChoicesModifier && base.spec.type === 'options' && this.spec.type === 'options') {
      return new ChoicesModifier({
        type: 'options',
        options: { ...base.spec.options, ...this.spec.options },
        fallback: this.spec.fallback ?? base.spec.fallback
      });
    }
    return this;
  }
}

function optionalKey(value: unknown): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new EvalError(`choices() default must be a str key, got ${formatValue(value)}`);
  }
  return value;
}

/**
 * `choices({'a': ..., 'b': ...}, 'a')`, `choices([1, 2, 3])` or `choices(1, 2, 3)`.
 */
export const choices = new ModifierFactory('choices', (args, kwargs) => {
  const [first] = args;
  if (isPlainMapping(first)) {
    if (args.length > 2) {
      throw new EvalError(`choices() with named options takes at most 2 arguments but ${args.length} were given`);
    }
    return new ChoicesModifier({
      type: 'options',
      options: first,
      fallback: optionalKey(args[1] ?? kwargs.default)
    });
  }
  const values =
    args.length === 1 && (Array.isArray(first) || first instanceof Set) ? iterate(first) : args;
  if (values.length === 0) {
    throw new EvalError('choices() needs at least one option');
  }
  return new ChoicesModifier({ type: 'values', values });
});
