import { ConstructionError } from '@core/errors';
import { EntryNode, MappingNode, Modifier } from '@core/tree';
import type { Node } from '@core/tree';

/**
 * Replace the enclosing single-entry mapping with this entry's value:
 * `{a: {_::promote: 3}}` resolves to `{a: 3}`.
 */
export class PromoteModifier extends Modifier {
  readonly kind = 'promote';

  apply(node: Node): Node {
    const entry = node.parent;
    const mapping = entry?.parent;
    if (!(entry instanceof EntryNode) || !(mapping instanceof MappingNode)) {
      throw new ConstructionError('promote applies only to mapping entries');
    }
    if (mapping.entries.length !== 1) {
      throw new ConstructionError(
        `promote requires a single-entry mapping, found keys ${mapping.keys.join(', ')}`
      );
    }
    return mapping.replaceWith(node);
  }
}

export const promote = new PromoteModifier();
