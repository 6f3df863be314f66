import { ConstructionError, EvalError } from '@core/errors';
import { describeType } from '@core/types/native';
import { MappingNode, Modifier, Node } from '@core/tree';
import { ModifierFactory, expectArguments } from './factory';

/**
 * Lay a mapping over a base mapping. Entries present in both inherit the
 * base entry's types and modifiers; base-only entries are copied in.
 * A string base is an address relative to the root.
 */
export class ExtendsModifier extends Modifier {
  readonly kind = 'extends';

  constructor(readonly base: Node | string) {
    super();
  }

  apply(node: Node): Node {
    const derived = node.current();
    if (!(derived instanceof MappingNode)) {
      throw new ConstructionError(`extends requires a mapping value, got a ${derived.kind}`);
    }
    const target = typeof this.base === 'string' ? node.session.root.fromAddress(this.base) : this.base;
    const base = target.settled();
    if (!(base instanceof MappingNode)) {
      throw new ConstructionError(`Base '${base.qualifiedName}' of extends is a ${base.kind}, not a mapping`);
    }
    if (base === derived) {
      throw new ConstructionError('A mapping cannot extend itself');
    }
    return derived.replaceWith(derived.mergeWithBase(base));
  }
}

export const extendsModifier = new ModifierFactory('extends', args => {
  expectArguments('extends', args, 1);
  const [base] = args;
  if (!(base instanceof Node) && typeof base !== 'string') {
    throw new EvalError(`extends() expects a node or a reference string, got ${describeType(base)}`);
  }
  return new ExtendsModifier(base);
});
