import type { SolconfConfig } from '@core/config/types';
import { buildNode } from '@core/tree';
import type { Node, OverrideHit, TreeSession } from '@core/tree';
import { resolutionLogger as logger } from '@core/utils/logger';
import type { Evaluator } from '@interpreter/eval/Evaluator';
import type { UnitArena } from '@interpreter/loader/UnitArena';
import type { OverrideSpec } from '@interpreter/overrides/OverrideSpec';
import { ResolutionTracker } from './ResolutionTracker';

export interface ResolutionSessionOptions {
  evaluator: Evaluator;
  overrides: OverrideSpec;
  units: UnitArena;
  config: SolconfConfig;
}

/**
 * Per-instance state shared by every node of one bound tree: the evaluator,
 * the override spec, loaded units and the in-progress stack.
 */
export class ResolutionSession implements TreeSession {
  root: Node;
  readonly config: SolconfConfig;
  readonly evaluator: Evaluator;
  readonly overrides: OverrideSpec;
  readonly units: UnitArena;
  private readonly tracker = new ResolutionTracker();

  constructor(root: Node, options: ResolutionSessionOptions) {
    this.root = root;
    this.config = options.config;
    this.evaluator = options.evaluator;
    this.overrides = options.overrides;
    this.units = options.units;
    root.boundSession = this;
  }

  evaluate(source: string, locals: Record<string, unknown>): unknown {
    return this.evaluator.evaluate(source, locals);
  }

  evaluateList(source: string, locals: Record<string, unknown>): unknown[] {
    return this.evaluator.evaluateList(source, locals);
  }

  takeOverride(qualifiedName: string): OverrideHit | undefined {
    return this.overrides.take(qualifiedName);
  }

  build(raw: unknown, path?: string): Node {
    return buildNode(raw, path);
  }

  instantiateUnit(name: string): Node {
    return this.units.instantiate(name);
  }

  enter(node: Node): void {
    this.tracker.enter(node);
    if (logger.isDebugEnabled()) {
      logger.debug('Enter', { address: node.qualifiedName, kind: node.kind, depth: this.tracker.depth });
    }
  }

  leave(node: Node): void {
    this.tracker.leave(node);
  }

  cycleThrough(node: Node): string[] {
    return this.tracker.cycleThrough(node);
  }
}
