import { ConstructionError, CyclicDependencyError, EvalError } from '@core/errors';
import type { Invocable, KeywordArguments } from '@core/types/callable';
import { describeType, isPlainMapping } from '@core/types/native';
import { modifierLogger as logger } from '@core/utils/logger';
import { MappingNode, Modifier, ScalarNode, SequenceNode } from '@core/tree';
import type { Node } from '@core/tree';
import { expectArguments, expectString } from './factory';

/**
 * Names of the units enclosing `node`, outermost first.
 */
function enclosingUnits(node: Node): string[] {
  const units: string[] = [];
  let current: Node | undefined = node.current();
  while (current) {
    if (current.unitName) {
      units.unshift(current.unitName);
    }
    current = current.parent?.current();
  }
  return units;
}

/**
 * Follow a dot path through declared content without modifying anything.
 */
function declaredNode(root: Node, path: string, unit: string): Node {
  let node = root;
  for (const part of path.split('.')) {
    let next: Node | undefined;
    if (node instanceof MappingNode) {
      next = node.entry(part)?.value;
    } else if (node instanceof SequenceNode && /^\d+$/.test(part)) {
      next = node.children()[Number(part)];
    }
    if (!next) {
      throw new ConstructionError(`load vars: unit '${unit}' has no node at '${path}'`);
    }
    node = next;
  }
  return node;
}

/**
 * Replace a scalar unit name with a fresh instance of that configuration
 * unit. Used bare (`load`) or with a group prefix (`load('models')`, which
 * turns `resnet` into unit `models/resnet`). `vars` maps dot paths inside the
 * unit to raw values substituted before the instance is modified.
 */
export class LoadModifier extends Modifier implements Invocable {
  readonly kind = 'load';

  constructor(
    readonly group?: string,
    readonly vars?: Readonly<Record<string, unknown>>
  ) {
    super();
  }

  apply(node: Node): Node | void {
    if (!(node instanceof ScalarNode)) {
      logger.debug('load: value is already structured, nothing to load', { address: node.qualifiedName });
      return;
    }
    const name = node.resolve();
    if (typeof name !== 'string' || name === '') {
      throw new ConstructionError(`load expects a unit name, got ${describeType(name)}`);
    }
    const unit = this.group ? `${this.group}/${name}` : name;
    const enclosing = enclosingUnits(node);
    const start = enclosing.indexOf(unit);
    if (start >= 0) {
      throw new CyclicDependencyError([...enclosing.slice(start), unit]);
    }

    const session = node.session;
    const instance = session.instantiateUnit(unit);
    for (const [path, value] of Object.entries(this.vars ?? {})) {
      declaredNode(instance, path, unit).replaceWith(session.build(value, path));
    }
    return node.replaceWith(instance);
  }

  invoke(args: unknown[], kwargs: KeywordArguments): LoadModifier {
    expectArguments('load', args, 0, 1);
    const group = args[0] ?? kwargs.group;
    const vars = kwargs.vars;
    if (vars !== undefined && !isPlainMapping(vars)) {
      throw new EvalError(`load() vars must be a dict, got ${describeType(vars)}`);
    }
    return new LoadModifier(group === undefined ? undefined : expectString('load', group), vars);
  }

  inherit(base: Modifier): Modifier {
    if (base instanceof LoadModifier && this.group === undefined && this.vars === undefined) {
      return base;
    }
    return this;
  }
}

export const load = new LoadModifier();
