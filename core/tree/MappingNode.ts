import { AddressError, ConstructionError } from '@core/errors';
import { defineEntry } from '@core/types/native';
import type { EntryNode } from './EntryNode';
import { Node } from './Node';
import type { Selector } from './Node';

/**
 * Ordered, string-keyed container. Its children are entry nodes.
 */
export class MappingNode extends Node {
  readonly kind = 'mapping';
  private readonly entryList: EntryNode[] = [];
  private isSettled = false;

  constructor(entries: EntryNode[] = []) {
    super();
    entries.forEach(entry => this.add(entry));
  }

  get entries(): readonly EntryNode[] {
    return this.entryList;
  }

  get keys(): string[] {
    return this.entryList.map(entry => entry.key);
  }

  entry(key: string): EntryNode | undefined {
    return this.entryList.find(entry => entry.key === key);
  }

  private add(entry: EntryNode): void {
    if (this.entry(entry.key)) {
      throw new ConstructionError(`Duplicate key '${entry.key}'`);
    }
    entry.parent = this;
    this.entryList.push(entry);
  }

  children(): Node[] {
    return [...this.entryList];
  }

  replaceChild(current: Node): void {
    throw new ConstructionError(`Entry '${current.qualifiedName}' cannot be replaced`);
  }

  copy(): MappingNode {
    return new MappingNode(this.entryList.map(entry => entry.copy()));
  }

  /**
   * Modify every entry. Stops early if a modifier replaced this mapping.
   */
  settle(): void {
    if (this.isSettled) {
      return;
    }
    this.isSettled = true;
    for (const entry of [...this.entryList]) {
      if (this.replacedBy) {
        break;
      }
      entry.modify();
    }
  }

  /**
   * New unbound mapping with this mapping's entries laid over `base`.
   *
   * Entries declared here come first, each inheriting the declaration of the
   * same-key base entry; base-only entries follow in base order. All entries
   * are copies built from declared content.
   */
  mergeWithBase(base: MappingNode): MappingNode {
    const merged = this.entryList.map(entry => {
      const copy = entry.copy();
      const inherited = base.entry(entry.key);
      if (inherited) {
        copy.inherited = inherited;
      }
      return copy;
    });
    for (const baseEntry of base.entries) {
      if (!this.entry(baseEntry.key)) {
        merged.push(baseEntry.copy());
      }
    }
    return new MappingNode(merged);
  }

  protected selectChild(selector: Selector): Node {
    const name = this.qualifiedName === '' ? 'root mapping' : `mapping '${this.qualifiedName}'`;
    if (typeof selector === 'number') {
      throw new AddressError(`Cannot select index ${selector} from ${name}`, { selector: String(selector) });
    }
    const entryOnly = selector.startsWith('*');
    const key = entryOnly ? selector.slice(1) : selector;
    const entry = this.entry(key);
    if (!entry) {
      throw new AddressError(`No key '${key}' in ${name}`, { selector });
    }
    return entryOnly ? entry : entry.valueNode();
  }

  protected childParts(child: Node): string[] {
    const entry = this.entryList.find(candidate => candidate === child);
    if (!entry) {
      throw new AddressError(`Node is not an entry of mapping '${this.qualifiedName}'`);
    }
    return [...this.addressParts(), `*${entry.key}`];
  }

  protected computeValue(): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    const emittedBy = new Map<string, string>();
    for (const entry of this.entryList) {
      const value = entry.valueNode();
      if (value.hidden) {
        continue;
      }
      const key = entry.exposedKey;
      const previous = emittedBy.get(key);
      if (previous !== undefined) {
        throw new ConstructionError(`Entries '${previous}' and '${entry.key}' are both emitted as '${key}'`);
      }
      emittedBy.set(key, entry.key);
      defineEntry(result, key, value.resolve());
    }
    return result;
  }
}
