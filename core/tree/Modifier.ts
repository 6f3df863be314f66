import type { Node } from './Node';

/**
 * A construction-time transformation attached to an entry's value.
 *
 * Modifiers run once, in declaration order, when their entry is first
 * modified. `apply` may mutate the node in place (returning nothing) or
 * return the node that now stands in its place.
 */
export abstract class Modifier {
  readonly typeName = 'modifier';

  /** Modifiers of the same kind replace each other when declarations are inherited */
  abstract readonly kind: string;

  abstract apply(node: Node): Node | void;

  /**
   * Combine with the same-kind modifier declared on an inherited base entry.
   * Without an implementation the derived modifier simply wins.
   */
  inherit?(base: Modifier): Modifier;

  toString(): string {
    return `<modifier ${this.kind}>`;
  }
}

export function isModifier(value: unknown): value is Modifier {
  return value instanceof Modifier;
}
