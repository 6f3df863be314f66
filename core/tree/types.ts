import type { SolconfConfig } from '@core/config/types';
import type { Node } from './Node';

export type NodeKind = 'mapping' | 'entry' | 'sequence' | 'scalar';

export type ResolutionState = 'unresolved' | 'in-progress' | 'resolved' | 'failed';

/**
 * A declared type a resolved value is checked against.
 */
export interface TypeConstraint {
  readonly name: string;
  accepts(value: unknown): boolean;
}

export function isTypeConstraint(value: unknown): value is TypeConstraint {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'name') === 'string' &&
    typeof Reflect.get(value, 'accepts') === 'function'
  );
}

/**
 * Post-processing step run on a node's computed value, before the type check.
 */
export type ValueTransform = (value: unknown, node: Node) => unknown;

/**
 * Override value matched for a qualified name.
 */
export interface OverrideHit {
  value: unknown;
}

/**
 * Everything a bound tree needs from its owning configuration instance.
 */
export interface TreeSession {
  readonly config: SolconfConfig;
  /** Current root; promotion at the top level replaces it */
  root: Node;
  evaluate(source: string, locals: Record<string, unknown>): unknown;
  evaluateList(source: string, locals: Record<string, unknown>): unknown[];
  /** Override for a qualified name, if any; records the use */
  takeOverride(qualifiedName: string): OverrideHit | undefined;
  /** Build an unbound subtree from raw content */
  build(raw: unknown, path?: string): Node;
  /** A fresh copy of a named configuration unit */
  instantiateUnit(name: string): Node;
  /** Push a node onto the in-progress stack */
  enter(node: Node): void;
  leave(node: Node): void;
  /** Qualified names from the first in-progress visit of `node` to the top of the stack */
  cycleThrough(node: Node): string[];
}

/**
 * Matches only null; what `null` means inside a type declaration.
 */
export const nullConstraint: TypeConstraint = {
  name: 'null',
  accepts: value => value === null
};
