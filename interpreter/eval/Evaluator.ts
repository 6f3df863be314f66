import { parseExpression, parseExpressionList } from '@grammar/parser';
import type {
  ArgumentNode,
  ComprehensionClause,
  ExpressionNode,
  ItemNode,
  MappingNode
} from '@grammar/types/expression';
import { EvalError, SolconfError } from '@core/errors';
import { defineEntry, describeType, isPlainMapping } from '@core/types/native';
import { isInvocable } from '@core/types/callable';
import type { KeywordArguments } from '@core/types/callable';
import { DEFAULT_CONFIG } from '@core/config/types';
import { evaluatorLogger as logger } from '@core/utils/logger';
import { ContextRegistry } from '@interpreter/env/ContextRegistry';
import type { RegisterOptions } from '@interpreter/env/ContextRegistry';
import { globalRegistry } from '@interpreter/env/defaults';
import {
  applyBinary,
  applyUnary,
  compare,
  getIndex,
  getSlice,
  isTruthy,
  iterate
} from './operators';

export type Locals = Readonly<Record<string, unknown>>;

export interface EvaluatorOptions {
  /** Registry copied into the evaluator's own context (defaults to the global one) */
  registry?: ContextRegistry;
  maxExpressionLength?: number;
}

/**
 * Comprehension variables. Each `for` clause pushes one frame.
 */
class Frame {
  constructor(
    private readonly vars: Map<string, unknown>,
    private readonly parent?: Frame
  ) {}

  lookup(name: string): { value: unknown } | undefined {
    if (this.vars.has(name)) {
      return { value: this.vars.get(name) };
    }
    return this.parent?.lookup(name);
  }
}

/**
 * Restricted expression evaluator.
 *
 * Names resolve through comprehension variables, then the per-call locals,
 * then the evaluator's own context. Anything else is an EvalError.
 */
export class Evaluator {
  private readonly context: ContextRegistry;
  readonly maxExpressionLength: number;

  constructor(options: EvaluatorOptions = {}) {
    this.context = (options.registry ?? globalRegistry).clone();
    this.maxExpressionLength = options.maxExpressionLength ?? DEFAULT_CONFIG.maxExpressionLength;
  }

  register(name: string, value: unknown, options?: RegisterOptions): this {
    this.context.register(name, value, options);
    return this;
  }

  has(name: string): boolean {
    return this.context.has(name);
  }

  /**
   * Parse without evaluating.
   * @throws {EvalError} on overlong or malformed input
   */
  check(source: string): void {
    parseExpression(this.guardLength(source));
  }

  evaluate(source: string, locals: Locals = {}): unknown {
    const ast = parseExpression(this.guardLength(source));
    return this.run(source, () => this.evaluateNode(ast, locals));
  }

  /**
   * Evaluate a comma separated expression list, as used by type and modifier
   * declarations. An empty source yields an empty list.
   */
  evaluateList(source: string, locals: Locals = {}): unknown[] {
    const list = parseExpressionList(this.guardLength(source));
    return this.run(source, () => list.map(item => this.evaluateNode(item, locals)));
  }

  private evaluateNode(node: ExpressionNode, locals: Locals, frame?: Frame): unknown {
    switch (node.type) {
      case 'Literal':
        return node.value;

      case 'Name':
        return this.lookup(node.name, locals, frame);

      case 'List':
        return this.evaluateItems(node.items, locals, frame);

      case 'Set':
        return new Set(this.evaluateItems(node.items, locals, frame));

      case 'Mapping':
        return this.evaluateMapping(node, locals, frame);

      case 'Comprehension': {
        const results: unknown[] = [];
        this.comprehend(node.clauses, 0, locals, frame, inner => {
          results.push(this.evaluateNode(node.element, locals, inner));
        });
        return node.kind === 'set' ? new Set(results) : results;
      }

      case 'MappingComprehension': {
        const result: Record<string, unknown> = {};
        this.comprehend(node.clauses, 0, locals, frame, inner => {
          const key = this.mappingKey(this.evaluateNode(node.key, locals, inner));
          defineEntry(result, key, this.evaluateNode(node.value, locals, inner));
        });
        return result;
      }

      case 'Unary':
        return applyUnary(node.operator, this.evaluateNode(node.argument, locals, frame));

      case 'Binary':
        return applyBinary(
          node.operator,
          this.evaluateNode(node.left, locals, frame),
          this.evaluateNode(node.right, locals, frame)
        );

      case 'Logical': {
        // Short-circuit, returning the deciding operand
        const left = this.evaluateNode(node.left, locals, frame);
        if (node.operator === '&&' ? !isTruthy(left) : isTruthy(left)) {
          return left;
        }
        return this.evaluateNode(node.right, locals, frame);
      }

      case 'Compare': {
        let left = this.evaluateNode(node.first, locals, frame);
        for (const { operator, operand } of node.rest) {
          const right = this.evaluateNode(operand, locals, frame);
          if (!compare(operator, left, right)) {
            return false;
          }
          left = right;
        }
        return true;
      }

      case 'Conditional':
        return isTruthy(this.evaluateNode(node.test, locals, frame))
          ? this.evaluateNode(node.consequent, locals, frame)
          : this.evaluateNode(node.alternate, locals, frame);

      case 'Call':
        return this.evaluateCall(node.callee, node.args, locals, frame);

      case 'Index':
        return getIndex(
          this.evaluateNode(node.object, locals, frame),
          this.evaluateNode(node.index, locals, frame)
        );

      case 'Slice':
        return getSlice(
          this.evaluateNode(node.object, locals, frame),
          node.start && this.evaluateNode(node.start, locals, frame),
          node.stop && this.evaluateNode(node.stop, locals, frame),
          node.step && this.evaluateNode(node.step, locals, frame)
        );
    }
  }

  /**
   * Reject source text longer than `maxExpressionLength` before it is parsed.
   */
  guardLength(source: string): string {
    if (source.length > this.maxExpressionLength) {
      throw new EvalError(
        `Expression of length ${source.length} exceeds the maximum of ${this.maxExpressionLength}`,
        { expression: source.slice(0, 80) }
      );
    }
    return source;
  }

  private run<T>(source: string, body: () => T): T {
    try {
      return body();
    } catch (error) {
      if (error instanceof SolconfError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      logger.debug('Foreign error during evaluation', { source, message });
      throw new EvalError(`Error evaluating '${source}': ${message}`, {
        expression: source,
        cause: error
      });
    }
  }

  private lookup(name: string, locals: Locals, frame?: Frame): unknown {
    const bound = frame?.lookup(name);
    if (bound) {
      return bound.value;
    }
    if (Object.prototype.hasOwnProperty.call(locals, name)) {
      return locals[name];
    }
    if (this.context.has(name)) {
      return this.context.get(name);
    }
    throw new EvalError(`Name '${name}' is not defined`, { identifier: name });
  }

  private evaluateItems(items: ItemNode[], locals: Locals, frame?: Frame): unknown[] {
    const result: unknown[] = [];
    for (const item of items) {
      if (item.type === 'Spread') {
        result.push(...iterate(this.evaluateNode(item.argument, locals, frame)));
      } else {
        result.push(this.evaluateNode(item, locals, frame));
      }
    }
    return result;
  }

  private mappingKey(key: unknown): string {
    if (typeof key !== 'string') {
      throw new EvalError(`Mapping keys must be str, not ${describeType(key)}`);
    }
    return key;
  }

  private evaluateMapping(node: MappingNode, locals: Locals, frame?: Frame): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const entry of node.entries) {
      if (entry.type === 'Spread') {
        const source = this.evaluateNode(entry.argument, locals, frame);
        if (!isPlainMapping(source)) {
          throw new EvalError(`Cannot spread ${describeType(source)} into a mapping`);
        }
        for (const [key, value] of Object.entries(source)) {
          defineEntry(result, key, value);
        }
      } else {
        const key = this.mappingKey(this.evaluateNode(entry.key, locals, frame));
        defineEntry(result, key, this.evaluateNode(entry.value, locals, frame));
      }
    }
    return result;
  }

  private comprehend(
    clauses: ComprehensionClause[],
    index: number,
    locals: Locals,
    frame: Frame | undefined,
    emit: (frame: Frame | undefined) => void
  ): void {
    if (index === clauses.length) {
      emit(frame);
      return;
    }
    const clause = clauses[index];
    if (clause.type === 'If') {
      if (isTruthy(this.evaluateNode(clause.test, locals, frame))) {
        this.comprehend(clauses, index + 1, locals, frame, emit);
      }
      return;
    }
    for (const item of iterate(this.evaluateNode(clause.iterable, locals, frame))) {
      const vars = new Map<string, unknown>();
      this.bindTargets(clause.targets, item, vars);
      this.comprehend(clauses, index + 1, locals, new Frame(vars, frame), emit);
    }
  }

  private bindTargets(targets: string[], item: unknown, vars: Map<string, unknown>): void {
    if (targets.length === 1) {
      vars.set(targets[0], item);
      return;
    }
    const values = Array.isArray(item) ? item : undefined;
    if (!values || values.length !== targets.length) {
      throw new EvalError(
        `Cannot unpack ${describeType(item)} into ${targets.length} names (${targets.join(', ')})`
      );
    }
    targets.forEach((target, i) => vars.set(target, values[i]));
  }

  private evaluateCall(
    calleeNode: ExpressionNode,
    argNodes: ArgumentNode[],
    locals: Locals,
    frame?: Frame
  ): unknown {
    const callee = this.evaluateNode(calleeNode, locals, frame);
    const calleeName = calleeNode.type === 'Name' ? calleeNode.name : describeType(callee);

    const args: unknown[] = [];
    const kwargs: KeywordArguments = {};
    const setKeyword = (name: string, value: unknown): void => {
      if (Object.prototype.hasOwnProperty.call(kwargs, name)) {
        throw new EvalError(`${calleeName}() got multiple values for keyword argument '${name}'`);
      }
      defineEntry(kwargs, name, value);
    };

    for (const arg of argNodes) {
      if (arg.type === 'Positional') {
        args.push(this.evaluateNode(arg.value, locals, frame));
      } else if (arg.type === 'Keyword') {
        setKeyword(arg.name, this.evaluateNode(arg.value, locals, frame));
      } else {
        const spread = this.evaluateNode(arg.argument, locals, frame);
        if (isPlainMapping(spread)) {
          for (const [name, value] of Object.entries(spread)) {
            setKeyword(name, value);
          }
        } else {
          args.push(...iterate(spread));
        }
      }
    }

    if (!isInvocable(callee)) {
      throw new EvalError(`'${calleeName}' of type ${describeType(callee)} is not callable`);
    }

    try {
      return callee.invoke(args, kwargs);
    } catch (error) {
      if (error instanceof SolconfError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new EvalError(`Call to ${calleeName}() failed: ${message}`, { cause: error });
    }
  }
}
