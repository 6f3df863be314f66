import { ConstructionError } from '@core/errors';
import { describeType } from '@core/types/native';
import { Modifier, Node } from '@core/tree';

/**
 * Host function run as a modifier. It may mutate the node it gets or return
 * the node that should take its place.
 */
export type ModifierFunction = (node: Node) => Node | void;

export class CustomModifier extends Modifier {
  constructor(
    readonly kind: string,
    private readonly fn: ModifierFunction
  ) {
    super();
  }

  apply(node: Node): Node | void {
    const result: unknown = this.fn(node);
    if (result === undefined || result instanceof Node) {
      return result;
    }
    throw new ConstructionError(`Modifier '${this.kind}' returned a ${describeType(result)} instead of a node`);
  }
}

export function defineModifier(name: string, fn: ModifierFunction): CustomModifier {
  return new CustomModifier(name, fn);
}
