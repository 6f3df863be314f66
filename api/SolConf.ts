import * as path from 'path';
import { resolveConfig } from '@core/config/loader';
import type { SolconfConfig, SolconfConfigFile } from '@core/config/types';
import { AddressError } from '@core/errors';
import { buildNode, describeTree } from '@core/tree';
import type { Node, Selector } from '@core/tree';
import { resolutionLogger as logger } from '@core/utils/logger';
import type { ContextRegistry, RegisterOptions } from '@interpreter/env/ContextRegistry';
import { Evaluator } from '@interpreter/eval/Evaluator';
import { UnitArena } from '@interpreter/loader/UnitArena';
import type { UnitLoader } from '@interpreter/loader/UnitLoader';
import { OverrideSpec } from '@interpreter/overrides/OverrideSpec';
import type { OverrideInput } from '@interpreter/overrides/OverrideSpec';
import { ResolutionSession } from '@interpreter/resolution/ResolutionSession';
import type { IFileSystemService } from '@services/fs/IFileSystemService';
import { NodeFileSystem } from '@services/fs/NodeFileSystem';
import { FileUnitLoader, parseUnitContent } from '@services/loader/FileUnitLoader';

export interface SolConfOptions {
  /** Override sources, merged in order; a target set twice is a conflict */
  overrides?: readonly OverrideInput[];
  /** Extra names visible to this instance's expressions */
  context?: Record<string, unknown>;
  /** Registry the evaluator starts from (defaults to the global registry) */
  registry?: ContextRegistry;
  /** Source of units for the `load` modifier */
  loader?: UnitLoader;
  config?: SolconfConfigFile;
}

export interface SolConfFileOptions extends SolConfOptions {
  fileSystem?: IFileSystemService;
}

/**
 * A configuration instance: one bound tree with its overrides, evaluator
 * context and loaded units.
 *
 * @example
 * ```typescript
 * const conf = new SolConf({ lr: 0.1, 'steps::required': null }, { overrides: ['steps = 100'] });
 * conf.resolve(); // { lr: 0.1, steps: 100 }
 * ```
 */
export class SolConf {
  readonly session: ResolutionSession;
  readonly config: SolconfConfig;
  private readonly evaluator: Evaluator;
  private unusedReported = false;

  constructor(raw: unknown, options: SolConfOptions = {}) {
    this.config = resolveConfig(options.config);
    this.evaluator = new Evaluator({
      registry: options.registry,
      maxExpressionLength: this.config.maxExpressionLength
    });
    for (const [name, value] of Object.entries(options.context ?? {})) {
      this.evaluator.register(name, value, { overwrite: true });
    }
    const overrides = OverrideSpec.fromInputs(options.overrides ?? [], this.evaluator);
    this.session = new ResolutionSession(buildNode(raw), {
      evaluator: this.evaluator,
      overrides,
      units: new UnitArena(options.loader),
      config: this.config
    });
  }

  /**
   * Load a YAML or JSON file. Units named by `load` are looked up next to it
   * unless another loader is given.
   */
  static fromFile(filePath: string, options: SolConfFileOptions = {}): SolConf {
    const fileSystem = options.fileSystem ?? new NodeFileSystem();
    const raw = parseUnitContent(fileSystem.readFile(filePath), filePath);
    const config = resolveConfig(options.config);
    const loader =
      options.loader ?? new FileUnitLoader(path.dirname(path.resolve(filePath)), fileSystem, config.unitExtensions);
    return new SolConf(raw, { ...options, loader });
  }

  get root(): Node {
    return this.session.root;
  }

  /**
   * Resolve the whole tree to native content.
   * @throws {AddressError} for unmatched overrides when `failOnUnusedOverrides` is set
   */
  resolve(): unknown {
    const value = this.root.resolve();
    this.reportUnusedOverrides();
    return value;
  }

  /** Node at a reference string relative to the root */
  get(address: string): Node {
    return this.root.fromAddress(address);
  }

  /** Node reached by selecting each key or index in turn */
  node(...selectors: Selector[]): Node {
    return selectors.reduce<Node>((node, selector) => node.child(selector), this.root);
  }

  /** Resolved value at an address, or of the whole tree */
  call(address?: string): unknown {
    return address === undefined || address === '' ? this.resolve() : this.get(address).resolve();
  }

  register(name: string, value: unknown, options?: RegisterOptions): this {
    this.evaluator.register(name, value, options);
    return this;
  }

  unusedOverrides(): string[] {
    return this.session.overrides.unused();
  }

  loadedUnits(): string[] {
    return this.session.units.loaded;
  }

  describe(): string {
    return describeTree(this.root, { settle: true });
  }

  private reportUnusedOverrides(): void {
    if (this.unusedReported) {
      return;
    }
    this.settleOverrideTargets();
    const unused = this.unusedOverrides();
    if (unused.length > 0 && this.config.failOnUnusedOverrides) {
      throw new AddressError(`Overrides matched no node: ${unused.join(', ')}`);
    }
    this.unusedReported = true;
    if (unused.length === 0) {
      return;
    }
    logger.warn('Overrides matched no node', { targets: unused });
  }

  /**
   * Address every target still unused. Hidden subtrees nothing referenced
   * are modified only now, which applies the overrides aimed into them.
   */
  private settleOverrideTargets(): void {
    for (const target of this.unusedOverrides()) {
      try {
        this.root.fromAddress(target);
      } catch (error) {
        if (!(error instanceof AddressError)) {
          throw error;
        }
        logger.debug('Override target does not exist', { target, reason: error.message });
      }
    }
  }
}
