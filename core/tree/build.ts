import { ConstructionError, EvalError } from '@core/errors';
import { describeType, isNativeScalar, isPlainMapping } from '@core/types/native';
import { parseExpressionList } from '@grammar/parser';
import type { DeclarationSource } from './declaration';
import { EntryNode } from './EntryNode';
import { MappingNode } from './MappingNode';
import type { Node } from './Node';
import { ScalarNode } from './ScalarNode';
import { SequenceNode } from './SequenceNode';

const RAW_KEY_PATTERN = /^\s*([A-Za-z_]\w*)\s*(?::\s*([^:]*?)\s*(?::\s*(.*?))?)?\s*$/;

export interface RawKey extends DeclarationSource {
  name: string;
}

function childPath(path: string, key: string | number): string {
  if (typeof key === 'number') {
    return `${path}[${key}]`;
  }
  return path === '' ? key : `${path}.${key}`;
}

function checkSyntax(rawKey: string, part: string, path: string): void {
  try {
    parseExpressionList(part);
  } catch (error) {
    if (error instanceof EvalError) {
      throw new ConstructionError(`Invalid declaration in key '${rawKey}': ${error.message}`, {
        path,
        cause: error
      });
    }
    throw error;
  }
}

/**
 * Split a raw key `name`, `name:types` or `name:types:modifiers`. Empty parts
 * count as absent. Declarations are syntax-checked here and evaluated later.
 */
export function parseRawKey(rawKey: string, path = ''): RawKey {
  const match = RAW_KEY_PATTERN.exec(rawKey);
  if (!match) {
    throw new ConstructionError(`Invalid key '${rawKey}'`, { path });
  }
  const [, name, types, modifiers] = match;
  if (name === '__proto__') {
    throw new ConstructionError(`Key '__proto__' is not allowed`, { path });
  }
  const result: RawKey = { name };
  if (types) {
    checkSyntax(rawKey, types, path);
    result.types = types;
  }
  if (modifiers) {
    checkSyntax(rawKey, modifiers, path);
    result.modifiers = modifiers;
  }
  return result;
}

/**
 * Build an unbound tree from raw native content.
 *
 * @param path - Location used in error messages, e.g. `a.b[2]`
 * @throws {ConstructionError} on unsupported values, malformed or duplicate keys
 */
export function buildNode(raw: unknown, path = ''): Node {
  if (isNativeScalar(raw)) {
    return new ScalarNode(raw);
  }
  if (Array.isArray(raw)) {
    return new SequenceNode(raw.map((item, index) => buildNode(item, childPath(path, index))));
  }
  if (isPlainMapping(raw)) {
    const entries: EntryNode[] = [];
    const seen = new Map<string, string>();
    for (const [rawKey, value] of Object.entries(raw)) {
      const { name, types, modifiers } = parseRawKey(rawKey, path);
      const entryPath = childPath(path, name);
      const previous = seen.get(name);
      if (previous !== undefined) {
        throw new ConstructionError(`Keys '${previous}' and '${rawKey}' both declare '${name}'`, { path });
      }
      seen.set(name, rawKey);
      entries.push(new EntryNode(name, buildNode(value, entryPath), { types, modifiers }));
    }
    return new MappingNode(entries);
  }
  throw new ConstructionError(`Unsupported value of type ${describeType(raw)}`, { path });
}
