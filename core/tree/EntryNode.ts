import { AddressError, ConstructionError, CyclicDependencyError, SolconfError } from '@core/errors';
import { modifierLogger as logger } from '@core/utils/logger';
import { evaluateDeclaration, mergeDeclarations } from './declaration';
import type { Declaration, DeclarationSource } from './declaration';
import { Node } from './Node';
import type { Selector } from './Node';

type ModificationState = 'pending' | 'active' | 'done' | 'failed';

/**
 * One key of a mapping, carrying the key's type and modifier declarations.
 *
 * Modification applies the entry's override, then folds the declared
 * modifiers over the value node and attaches the declared types to whatever
 * node ends up in the value slot. It runs once; selecting the entry's value
 * triggers it.
 */
export class EntryNode extends Node {
  readonly kind = 'entry';

  /** Key under which the value is emitted; set by `rename` */
  renamedTo?: string;
  /** Same-key entry of an `extends` base whose declaration this one inherits */
  inherited?: EntryNode;

  private valueSlot: Node;
  private readonly declaredValue: Node;
  private modification: ModificationState = 'pending';
  private modificationError?: SolconfError;
  private evaluated?: Declaration;

  constructor(
    readonly key: string,
    value: Node,
    readonly source: DeclarationSource = {}
  ) {
    super();
    this.valueSlot = value;
    this.declaredValue = value;
    value.parent = this;
  }

  get exposedKey(): string {
    return this.renamedTo ?? this.key;
  }

  /** Value slot as it is, without triggering modification */
  get value(): Node {
    return this.valueSlot.current();
  }

  /** Modified value node */
  valueNode(): Node {
    this.modify();
    return this.valueSlot.current();
  }

  children(): Node[] {
    return [this.value];
  }

  replaceChild(current: Node, replacement: Node): void {
    if (current !== this.valueSlot) {
      throw new AddressError(`'${current.qualifiedName}' is not the value of entry '${this.key}'`);
    }
    this.valueSlot = replacement;
    replacement.parent = this;
  }

  copy(): EntryNode {
    const copy = new EntryNode(this.key, this.declaredValue.copy(), this.source);
    copy.inherited = this.inherited;
    return copy;
  }

  protected selectChild(selector: Selector): Node {
    return this.valueNode().child(selector);
  }

  protected childParts(): string[] {
    return [...(this.parent ? this.parent.addressParts() : []), this.key];
  }

  protected computeValue(): [string, unknown] {
    return [this.exposedKey, this.valueNode().resolve()];
  }

  settle(): void {
    this.modify();
  }

  /**
   * Declaration of this entry merged with any inherited one. Each source is
   * evaluated once, with the value node's expression names in scope.
   */
  effectiveDeclaration(): Declaration {
    if (!this.evaluated) {
      const own = evaluateDeclaration(this.session, this.source, this.value.expressionLocals());
      this.evaluated = this.inherited
        ? mergeDeclarations(own, this.inherited.effectiveDeclaration())
        : own;
    }
    return this.evaluated;
  }

  modify(): void {
    switch (this.modification) {
      case 'done':
        return;
      case 'failed':
        throw this.modificationError;
      case 'active':
        throw this.locate(new CyclicDependencyError(this.session.cycleThrough(this)));
      case 'pending':
        break;
    }

    const session = this.session;
    this.modification = 'active';
    session.enter(this);
    try {
      let node = this.valueSlot.applyOverride();
      const declaration = this.effectiveDeclaration();
      for (const modifier of declaration.modifiers) {
        const next = modifier.apply(node);
        node = (next instanceof Node ? next : node).current();
      }
      if (declaration.types) {
        node.types = declaration.types;
      }
      this.modification = 'done';
      if (declaration.modifiers.length > 0) {
        logger.debug('Applied modifiers', {
          entry: this.qualifiedName,
          modifiers: declaration.modifiers.map(m => m.kind)
        });
      }
    } catch (error) {
      const located = this.locate(
        error instanceof SolconfError
          ? error
          : new ConstructionError(error instanceof Error ? error.message : String(error), { cause: error })
      );
      this.modification = 'failed';
      this.modificationError = located;
      throw located;
    } finally {
      session.leave(this);
    }
  }
}
