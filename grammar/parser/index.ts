/**
 * Expression parser entry point.
 *
 * The parser is generated from grammar/expression.peggy the first time it is
 * needed. Results are cached per source string and start rule.
 */
import { readFileSync } from 'fs';
import { createRequire } from 'module';
import { fileURLToPath } from 'url';
import type * as Peggy from 'peggy';
import { EvalError } from '@core/errors';
import type { AssignmentNode, ExpressionNode } from '@grammar/types/expression';

const START_RULES = ['ExpressionStart', 'ExpressionListStart', 'AssignmentsStart', 'TargetStart'] as const;

type StartRule = (typeof START_RULES)[number];

const grammarPath = fileURLToPath(new URL('../expression.peggy', import.meta.url));

// peggy ships as CommonJS without statically detectable named exports
const localRequire = createRequire(import.meta.url);
const peggy: typeof Peggy = localRequire('peggy');

let parser: Peggy.Parser | undefined;

function getParser(): Peggy.Parser {
  if (!parser) {
    parser = peggy.generate(readFileSync(grammarPath, 'utf-8'), {
      allowedStartRules: [...START_RULES],
      grammarSource: 'expression.peggy'
    });
  }
  return parser;
}

const MAX_CACHE_ENTRIES = 2048;

const expressionCache = new Map<string, ExpressionNode>();
const listCache = new Map<string, ExpressionNode[]>();
const assignmentCache = new Map<string, AssignmentNode[]>();
const targetCache = new Map<string, string>();

function run<T>(source: string, startRule: StartRule, cache: Map<string, T>): T {
  const cached = cache.get(source);
  if (cached !== undefined) {
    return cached;
  }
  const generated = getParser();
  let result: T;
  try {
    result = generated.parse(source, { startRule });
  } catch (error) {
    if (error instanceof generated.SyntaxError) {
      const column = error.location.start.offset + 1;
      throw new EvalError(`Invalid expression '${source}' at column ${column}: ${error.message}`, {
        expression: source,
        column,
        cause: error
      });
    }
    throw error;
  }
  if (cache.size >= MAX_CACHE_ENTRIES) {
    cache.clear();
  }
  cache.set(source, result);
  return result;
}

/**
 * Parse a single expression.
 * @throws {EvalError} on a syntax error
 */
export function parseExpression(source: string): ExpressionNode {
  return run(source, 'ExpressionStart', expressionCache);
}

/**
 * Parse a comma separated list of expressions. An empty string is an empty list.
 */
export function parseExpressionList(source: string): ExpressionNode[] {
  return run(source, 'ExpressionListStart', listCache);
}

/**
 * Parse `target = expression` statements separated by `;` or newlines.
 */
export function parseAssignments(source: string): AssignmentNode[] {
  return run(source, 'AssignmentsStart', assignmentCache);
}

/**
 * Canonicalise an assignment target: `a.b[0]` and `a["b"].0` both become `a.b.0`.
 */
export function parseTarget(source: string): string {
  return run(source, 'TargetStart', targetCache);
}
