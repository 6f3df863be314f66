import { AddressError } from '@core/errors';
import { Node } from './Node';
import type { Selector } from './Node';

/**
 * Ordered list of nodes addressed by integer index.
 */
export class SequenceNode extends Node {
  readonly kind = 'sequence';
  private readonly items: Node[];
  private readonly declared: Node[];
  private isSettled = false;

  constructor(items: Node[] = []) {
    super();
    items.forEach(item => {
      item.parent = this;
    });
    this.items = [...items];
    this.declared = [...items];
  }

  get length(): number {
    return this.items.length;
  }

  children(): Node[] {
    return this.items.map(item => item.current());
  }

  replaceChild(current: Node, replacement: Node): void {
    const index = this.items.indexOf(current);
    if (index < 0) {
      throw new AddressError(`'${current.qualifiedName}' is not an item of sequence '${this.qualifiedName}'`);
    }
    this.items[index] = replacement;
    replacement.parent = this;
  }

  copy(): SequenceNode {
    return new SequenceNode(this.declared.map(item => item.copy()));
  }

  /**
   * Apply overrides addressed to individual items (`seq.0`, `seq.1`, ...).
   */
  settle(): void {
    if (this.isSettled) {
      return;
    }
    this.isSettled = true;
    [...this.items].forEach(item => item.applyOverride());
  }

  protected selectChild(selector: Selector): Node {
    if (typeof selector !== 'number' || !Number.isInteger(selector)) {
      throw new AddressError(`Cannot select '${selector}' from sequence '${this.qualifiedName}'`, {
        selector: String(selector)
      });
    }
    const index = selector < 0 ? this.items.length + selector : selector;
    const item = this.items[index];
    if (index < 0 || !item) {
      throw new AddressError(
        `Index ${selector} out of range for sequence '${this.qualifiedName}' of length ${this.items.length}`,
        { selector: String(selector) }
      );
    }
    return item.current();
  }

  protected childParts(child: Node): string[] {
    const index = this.items.indexOf(child);
    if (index < 0) {
      throw new AddressError(`Node is not an item of sequence '${this.qualifiedName}'`);
    }
    return [...this.addressParts(), String(index)];
  }

  protected computeValue(): unknown[] {
    return this.items
      .map(item => item.current())
      .filter(item => !item.hidden)
      .map(item => item.resolve());
  }
}
