import { ConstructionError, EvalError, OverrideConflictError } from '@core/errors';
import { describeType, isNativeValue, isPlainMapping } from '@core/types/native';
import type { OverrideHit } from '@core/tree';
import { overrideLogger as logger } from '@core/utils/logger';
import { parseAssignments, parseTarget } from '@grammar/parser';
import type { Evaluator } from '@interpreter/eval/Evaluator';

/**
 * One override source: either a mapping from target to value
 * (`{'a.b': 1, 'seq[0]': 'x'}`) or assignment text (`a.b = 1; seq.0 = 'x'`)
 * whose right-hand sides are expressions.
 */
export type OverrideInput = string | Record<string, unknown>;

/**
 * Override values keyed by canonical dot path, applied to nodes whose
 * qualified names match exactly.
 */
export class OverrideSpec {
  private readonly values = new Map<string, unknown>();
  private readonly uses = new Map<string, number>();

  private constructor(pairs: Array<[string, unknown]>) {
    const counts = new Map<string, number>();
    for (const [target] of pairs) {
      counts.set(target, (counts.get(target) ?? 0) + 1);
    }
    const conflicts = [...counts].filter(([, count]) => count > 1).map(([target]) => target);
    if (conflicts.length > 0) {
      throw new OverrideConflictError(conflicts);
    }
    for (const [target, value] of pairs) {
      this.values.set(target, value);
      this.uses.set(target, 0);
    }
  }

  static empty(): OverrideSpec {
    return new OverrideSpec([]);
  }

  /**
   * Merge several override sources into one spec.
   * @throws {OverrideConflictError} when two sources set the same target
   */
  static fromInputs(inputs: readonly OverrideInput[], evaluator: Evaluator): OverrideSpec {
    const pairs: Array<[string, unknown]> = [];
    for (const input of inputs) {
      if (typeof input === 'string') {
        pairs.push(...OverrideSpec.fromAssignments(input, evaluator));
      } else if (isPlainMapping(input)) {
        for (const [key, value] of Object.entries(input)) {
          pairs.push([OverrideSpec.canonicalTarget(key), OverrideSpec.checkValue(key, value)]);
        }
      } else {
        throw new ConstructionError(`Overrides must be a mapping or assignment text, got ${describeType(input)}`);
      }
    }
    logger.debug('Merged overrides', { targets: pairs.map(([target]) => target) });
    return new OverrideSpec(pairs);
  }

  private static fromAssignments(text: string, evaluator: Evaluator): Array<[string, unknown]> {
    if (text.trim() === '') {
      return [];
    }
    return parseAssignments(evaluator.guardLength(text)).map((assignment): [string, unknown] => [
      assignment.target,
      OverrideSpec.checkValue(assignment.target, evaluator.evaluate(assignment.source))
    ]);
  }

  private static canonicalTarget(key: string): string {
    try {
      return parseTarget(key);
    } catch (error) {
      if (error instanceof EvalError) {
        throw new ConstructionError(`Invalid override target '${key}'`, { cause: error });
      }
      throw error;
    }
  }

  private static checkValue(target: string, value: unknown): unknown {
    if (!isNativeValue(value)) {
      throw new ConstructionError(`Override for '${target}' is a ${describeType(value)}, not native content`);
    }
    return value;
  }

  get size(): number {
    return this.values.size;
  }

  targets(): string[] {
    return [...this.values.keys()];
  }

  /**
   * Override for a qualified name, counting the use.
   */
  take(qualifiedName: string): OverrideHit | undefined {
    if (!this.values.has(qualifiedName)) {
      return undefined;
    }
    this.uses.set(qualifiedName, (this.uses.get(qualifiedName) ?? 0) + 1);
    logger.debug('Applied override', { target: qualifiedName });
    return { value: this.values.get(qualifiedName) };
  }

  /** Targets that never matched a node */
  unused(): string[] {
    return [...this.uses].filter(([, count]) => count === 0).map(([target]) => target);
  }
}
