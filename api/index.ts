/**
 * solconf API entry point
 *
 * Hierarchical configuration with embedded expressions, modifiers and
 * command-line overrides.
 */
export { SolConf } from './SolConf';
export type { SolConfFileOptions, SolConfOptions } from './SolConf';

export * from '@core/errors';
export type { SolconfConfig, SolconfConfigFile } from '@core/config/types';
export { DEFAULT_CONFIG } from '@core/config/types';
export { ConfigLoader, resolveConfig } from '@core/config/loader';
export type { NativeMapping, NativeScalar, NativeValue } from '@core/types/native';
export { ExpressionFunction } from '@core/types/callable';
export type { Invocable, KeywordArguments, Subscriptable } from '@core/types/callable';

export {
  EntryNode,
  MappingNode,
  Modifier,
  Node,
  ScalarNode,
  SequenceNode,
  buildNode,
  describeTree,
  parseAddress
} from '@core/tree';
export type { NodeKind, Selector, TypeConstraint } from '@core/tree';

export { Evaluator } from '@interpreter/eval/Evaluator';
export type { EvaluatorOptions, Locals } from '@interpreter/eval/Evaluator';
export { ContextRegistry } from '@interpreter/env/ContextRegistry';
export { createDefaultRegistry, globalRegistry, registerGlobal, registerModifier } from '@interpreter/env/defaults';
export { TypeDescriptor } from '@interpreter/builtin/types';
export * from '@interpreter/modifiers';
export { OverrideSpec } from '@interpreter/overrides/OverrideSpec';
export type { OverrideInput } from '@interpreter/overrides/OverrideSpec';
export { MemoryUnitLoader } from '@interpreter/loader/UnitLoader';
export type { UnitLoader } from '@interpreter/loader/UnitLoader';
export { FileUnitLoader, parseUnitContent } from '@services/loader/FileUnitLoader';
export type { IFileSystemService } from '@services/fs/IFileSystemService';
export { NodeFileSystem } from '@services/fs/NodeFileSystem';
