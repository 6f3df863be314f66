import { ConstructionError } from '@core/errors';
import { EntryNode, Modifier } from '@core/tree';
import type { Node } from '@core/tree';
import { ModifierFactory, expectArguments, expectString } from './factory';

/**
 * Emit the entry under a different key. The entry keeps its own key for
 * addressing and overrides.
 */
export class RenameModifier extends Modifier {
  readonly kind = 'rename';

  constructor(readonly name: string) {
    super();
  }

  apply(node: Node): void {
    const entry = node.parent;
    if (!(entry instanceof EntryNode)) {
      throw new ConstructionError('rename applies only to mapping entries');
    }
    entry.renamedTo = this.name;
  }
}

export const rename = new ModifierFactory('rename', args => {
  expectArguments('rename', args, 1);
  return new RenameModifier(expectString('rename', args[0]));
});
