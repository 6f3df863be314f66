import { MappingNode } from './MappingNode';
import type { Node } from './Node';
import { ScalarNode } from './ScalarNode';
import { SequenceNode } from './SequenceNode';

export interface DescribeOptions {
  /** Apply overrides and modifiers before printing (bound trees only) */
  settle?: boolean;
}

function flags(node: Node): string {
  const parts: string[] = [];
  if (node.hidden) parts.push('hidden');
  if (node.required) parts.push('required');
  if (node.overridden) parts.push('overridden');
  if (node.types && node.types.length > 0) {
    parts.push(`types=${node.types.map(type => type.name).join('|')}`);
  }
  if (node.unitName) parts.push(`unit=${node.unitName}`);
  return parts.length > 0 ? ` [${parts.join(', ')}]` : '';
}

function label(node: Node): string {
  if (node instanceof ScalarNode) {
    return `scalar ${JSON.stringify(node.definedValue())}`;
  }
  return node.kind;
}

/**
 * Indented outline of a tree, one line per node:
 *
 * ```
 * mapping
 *   lr: scalar 0.1 [types=float]
 *   layers: sequence
 *     - scalar 64
 * ```
 */
export function describeTree(root: Node, options: DescribeOptions = {}): string {
  const lines: string[] = [];
  const visit = (node: Node, prefix: string, depth: number): void => {
    const live = options.settle ? node.settled() : node.current();
    lines.push(`${'  '.repeat(depth)}${prefix}${label(live)}${flags(live)}`);
    if (live instanceof MappingNode) {
      for (const entry of live.entries) {
        visit(options.settle ? entry.valueNode() : entry.value, `${entry.exposedKey}: `, depth + 1);
      }
    } else if (live instanceof SequenceNode) {
      for (const item of live.children()) {
        visit(item, '- ', depth + 1);
      }
    }
  };
  visit(root, '', 0);
  return lines.join('\n');
}
