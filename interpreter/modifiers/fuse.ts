import { ConstructionError } from '@core/errors';
import { MappingNode, Modifier, Node, evaluateModifiers, evaluateTypes } from '@core/tree';

const FUSE_KEYS = new Set(['value', 'types', 'modifiers']);

/**
 * Declare types and modifiers in the value instead of the key:
 *
 * ```yaml
 * lr::fuse:
 *   value: 0.1
 *   types: float
 *   modifiers: [required]
 * ```
 */
export class FuseModifier extends Modifier {
  readonly kind = 'fuse';

  apply(node: Node): Node {
    const mapping = node.settled();
    if (!(mapping instanceof MappingNode)) {
      throw new ConstructionError(`fuse requires a mapping with a 'value' key, got a ${mapping.kind}`);
    }
    const unexpected = mapping.keys.filter(key => !FUSE_KEYS.has(key));
    if (!mapping.entry('value') || unexpected.length > 0) {
      const detail = unexpected.length > 0 ? `; unexpected ${unexpected.join(', ')}` : '';
      throw new ConstructionError(`fuse requires key 'value' and optionally 'types' and 'modifiers'${detail}`);
    }
    const typeSources = this.sources(mapping, 'types');
    const modifierSources = this.sources(mapping, 'modifiers');

    let result = mapping.replaceWith(mapping.child('value'));
    const session = result.session;
    for (const source of modifierSources) {
      for (const modifier of evaluateModifiers(session, source, result.expressionLocals())) {
        const next = modifier.apply(result);
        result = (next instanceof Node ? next : result).current();
      }
    }
    if (typeSources.length > 0) {
      const locals = result.expressionLocals();
      result.types = typeSources.flatMap(source => evaluateTypes(session, source, locals));
    }
    return result;
  }

  private sources(mapping: MappingNode, key: string): string[] {
    if (!mapping.entry(key)) {
      return [];
    }
    const value = mapping.child(key).resolve();
    const list = Array.isArray(value) ? value : [value];
    if (!list.every((item): item is string => typeof item === 'string')) {
      throw new ConstructionError(`fuse '${key}' must be a str or a list of str`);
    }
    return list;
  }
}

export const fuse = new FuseModifier();
