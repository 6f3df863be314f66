import {
  AddressError,
  CyclicDependencyError,
  EvalError,
  ResolutionError,
  SolconfError,
  TypeConstraintError
} from '@core/errors';
import { ExpressionFunction } from '@core/types/callable';
import type { Invocable, KeywordArguments, Subscriptable } from '@core/types/callable';
import { describeType } from '@core/types/native';
import { treeLogger as logger } from '@core/utils/logger';
import { parseAddress } from './address';
import type { NodeKind, ResolutionState, TreeSession, TypeConstraint, ValueTransform } from './types';

export type Selector = string | number;

function addressArgument(fn: string, args: unknown[]): string {
  if (args.length > 1) {
    throw new EvalError(`${fn}() takes at most 1 argument (${args.length} given)`);
  }
  const [address = ''] = args;
  if (typeof address !== 'string') {
    throw new EvalError(`${fn}() expects a reference string, got ${describeType(address)}`);
  }
  return address;
}

/**
 * Base class of the configuration tree.
 *
 * A node is built unbound from raw content, bound to a session through its
 * root, then resolved lazily. Resolution is memoized: a node computes its
 * value at most once, and a failure is remembered and rethrown. When a
 * modifier replaces a node, the old node keeps a `replacedBy` link and every
 * public operation forwards to the live replacement.
 */
export abstract class Node implements Invocable, Subscriptable {
  abstract readonly kind: NodeKind;

  parent?: Node;
  /** Owning session; set only on the root */
  boundSession?: TreeSession;
  /** Set on the root of an instantiated unit */
  unitName?: string;
  replacedBy?: Node;

  hidden = false;
  required = false;
  overridden = false;
  types?: TypeConstraint[];
  readonly valueTransforms: ValueTransform[] = [];

  private resolutionState: ResolutionState = 'unresolved';
  private cachedValue: unknown;
  private failure?: SolconfError;

  get state(): ResolutionState {
    return this.resolutionState;
  }

  get typeName(): string {
    return `${this.kind} node`;
  }

  /** Direct children, in declaration order */
  abstract children(): Node[];

  abstract replaceChild(current: Node, replacement: Node): void;

  /** Unbound structural copy built from the declared (pre-override) content */
  abstract copy(): Node;

  protected abstract selectChild(selector: Selector): Node;

  /** Qualified-name parts of `child`, a direct child of this node */
  protected abstract childParts(child: Node): string[];

  protected abstract computeValue(): unknown;

  /**
   * Apply overrides and modifiers below this node. Runs at most once and
   * before the node's value is computed or its children are selected.
   */
  settle(): void {}

  /**
   * Take an override value in place, if this kind of node can.
   */
  protected acceptOverride(_value: unknown): boolean {
    return false;
  }

  /**
   * Apply the override registered for this node's qualified name. Scalars
   * take scalar values in place; anything else is rebuilt from the override
   * value and swapped in.
   */
  applyOverride(): Node {
    const node = this.current();
    const session = node.session;
    const address = node.qualifiedName;
    const hit = session.takeOverride(address);
    if (!hit) {
      return node;
    }
    if (node.acceptOverride(hit.value)) {
      node.overridden = true;
      return node;
    }
    const replacement = session.build(hit.value, address);
    replacement.overridden = true;
    return node.replaceWith(replacement);
  }

  current(): Node {
    let node: Node = this;
    while (node.replacedBy) {
      node = node.replacedBy;
    }
    return node;
  }

  /**
   * Settle this node and any replacements settling produces.
   */
  settled(): Node {
    let node = this.current();
    node.settle();
    while (node.replacedBy) {
      node = node.current();
      node.settle();
    }
    return node;
  }

  get isBound(): boolean {
    return this.findSession() !== undefined;
  }

  get session(): TreeSession {
    const session = this.findSession();
    if (!session) {
      throw new ResolutionError(`Node '${this.qualifiedName}' is not attached to a configuration`);
    }
    return session;
  }

  private findSession(): TreeSession | undefined {
    let node = this.current();
    while (node.parent) {
      node = node.parent.current();
    }
    return node.boundSession;
  }

  addressParts(): string[] {
    const node = this.current();
    return node.parent ? node.parent.childParts(node) : [];
  }

  /** Dot-separated address from the root ('' for the root itself) */
  get qualifiedName(): string {
    return this.addressParts().join('.');
  }

  /** Nearest enclosing unit root, or the tree root */
  get unitRoot(): Node {
    let node = this.current();
    while (!node.unitName && node.parent) {
      node = node.parent.current();
    }
    return node;
  }

  /**
   * The container whose children are addressed by `ref()` and `node()` in this
   * node's expressions: the enclosing mapping for an entry value, otherwise
   * the parent.
   */
  get scope(): Node {
    const node = this.current();
    const parent = node.parent;
    if (!parent) {
      return node;
    }
    if (parent.kind === 'entry' && parent.parent) {
      return parent.parent;
    }
    return parent;
  }

  replaceWith(replacement: Node): Node {
    const node = this.current();
    if (replacement === node) {
      return node;
    }
    const parent = node.parent;
    if (parent) {
      parent.current().replaceChild(node, replacement);
    } else {
      replacement.parent = undefined;
      const session = node.boundSession;
      if (session) {
        node.boundSession = undefined;
        replacement.boundSession = session;
        session.root = replacement;
      }
    }
    if (node.hidden) {
      replacement.hidden = true;
    }
    if (node.required) {
      replacement.required = true;
    }
    // Transforms set before the swap run after the replacement's own
    replacement.valueTransforms.push(...node.valueTransforms);
    node.replacedBy = replacement;
    logger.debug('Replaced node', {
      address: replacement.qualifiedName,
      from: node.kind,
      to: replacement.kind
    });
    return replacement;
  }

  child(selector: Selector): Node {
    return this.settled().selectChild(selector);
  }

  /**
   * Follow a reference string relative to this node.
   * @throws {AddressError} when a step does not lead to a node
   */
  fromAddress(address: string): Node {
    let node = this.current();
    for (const step of parseAddress(address)) {
      if (step.type === 'ascend') {
        for (let i = 0; i < step.levels; i++) {
          node = node.ascend(address);
        }
      } else {
        node = node.child(step.selector);
      }
    }
    return node;
  }

  /**
   * Container `levels` steps above this node, skipping entries the way
   * `'..'` does in a reference string.
   */
  ancestor(levels = 1): Node {
    let node = this.current();
    for (let i = 0; i < levels; i++) {
      node = node.ascend('.'.repeat(levels + 1));
    }
    return node;
  }

  private ascend(address: string): Node {
    let parent = this.current().parent?.current();
    if (parent?.kind === 'entry') {
      parent = parent.parent?.current();
    }
    if (!parent) {
      throw new AddressError(`Reference '${address}' ascends past the root`, { address });
    }
    return parent;
  }

  resolve(): unknown {
    const live = this.current();
    if (live !== this) {
      return live.resolve();
    }
    switch (this.resolutionState) {
      case 'resolved':
        return this.cachedValue;
      case 'failed':
        throw this.failure;
      case 'in-progress':
        throw this.locate(new CyclicDependencyError(this.session.cycleThrough(this)));
      case 'unresolved':
        break;
    }

    const session = this.session;
    this.resolutionState = 'in-progress';
    session.enter(this);
    try {
      this.settle();
      const replacement = this.current();
      const value = replacement === this ? this.finish(this.computeValue()) : replacement.resolve();
      this.cachedValue = value;
      this.resolutionState = 'resolved';
      return value;
    } catch (error) {
      const located = this.locate(error);
      this.failure = located;
      this.resolutionState = 'failed';
      throw located;
    } finally {
      session.leave(this);
    }
  }

  private finish(computed: unknown): unknown {
    let value = computed;
    for (const transform of this.valueTransforms) {
      value = transform(value, this);
    }
    if (this.types && this.types.length > 0 && !this.types.some(type => type.accepts(value))) {
      throw new TypeConstraintError(
        this.types.map(type => type.name),
        describeType(value)
      );
    }
    return value;
  }

  protected locate(error: unknown): SolconfError {
    return ResolutionError.wrap(error).locate(this.qualifiedName, this.kind);
  }

  /**
   * Names available to expressions evaluated on behalf of this node.
   */
  expressionLocals(): Record<string, unknown> {
    const scope = this.scope;
    return {
      root: this.session.root,
      self: this,
      unit: this.unitRoot,
      ref: new ExpressionFunction('ref', args => scope.fromAddress(addressArgument('ref', args)).resolve()),
      node: new ExpressionFunction('node', args => scope.fromAddress(addressArgument('node', args)))
    };
  }

  /**
   * `self()` resolves this node, `self('..x')` resolves an address relative to it.
   */
  invoke(args: unknown[], kwargs: KeywordArguments): unknown {
    if (Object.keys(kwargs).length > 0) {
      throw new EvalError('Nodes take no keyword arguments');
    }
    return this.fromAddress(addressArgument('node', args)).resolve();
  }

  subscript(key: unknown): unknown {
    if (typeof key !== 'string' && typeof key !== 'number') {
      throw new AddressError(`Cannot select ${describeType(key)} from a node`);
    }
    return this.child(key);
  }

  toString(): string {
    const name = this.qualifiedName;
    return `<${this.kind} ${name === '' ? '<root>' : name}>`;
  }
}
