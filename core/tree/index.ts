export { Node } from './Node';
export type { Selector } from './Node';
export { Modifier, isModifier } from './Modifier';
export { ScalarNode } from './ScalarNode';
export { EntryNode } from './EntryNode';
export { MappingNode } from './MappingNode';
export { SequenceNode } from './SequenceNode';
export { buildNode, parseRawKey } from './build';
export type { RawKey } from './build';
export { parseAddress, joinAddress } from './address';
export type { AddressStep } from './address';
export { evaluateDeclaration, evaluateModifiers, evaluateTypes, mergeDeclarations } from './declaration';
export type { Declaration, DeclarationSource } from './declaration';
export { describeTree } from './describe';
export { isTypeConstraint, nullConstraint } from './types';
export type { NodeKind, OverrideHit, ResolutionState, TreeSession, TypeConstraint, ValueTransform } from './types';
