/**
 * AST produced by grammar/expression.peggy.
 */

export type LiteralValue = string | number | boolean | null;

export type BinaryOperator = '+' | '-' | '*' | '/' | '%' | '**';
export type CompareOperator = '==' | '!=' | '<' | '<=' | '>' | '>=' | 'in';
export type UnaryOperator = '-' | '+' | '!';
export type LogicalOperator = '&&' | '||';

export interface LiteralNode {
  type: 'Literal';
  value: LiteralValue;
}

export interface NameNode {
  type: 'Name';
  name: string;
}

export interface SpreadNode {
  type: 'Spread';
  argument: ExpressionNode;
}

export type ItemNode = ExpressionNode | SpreadNode;

export interface ListNode {
  type: 'List';
  items: ItemNode[];
}

export interface SetNode {
  type: 'Set';
  items: ItemNode[];
}

export interface PairNode {
  type: 'Pair';
  key: ExpressionNode;
  value: ExpressionNode;
}

export interface MappingNode {
  type: 'Mapping';
  entries: Array<PairNode | SpreadNode>;
}

export interface ForClause {
  type: 'For';
  targets: string[];
  iterable: ExpressionNode;
}

export interface IfClause {
  type: 'If';
  test: ExpressionNode;
}

export type ComprehensionClause = ForClause | IfClause;

export interface ComprehensionNode {
  type: 'Comprehension';
  kind: 'list' | 'set';
  element: ExpressionNode;
  clauses: ComprehensionClause[];
}

export interface MappingComprehensionNode {
  type: 'MappingComprehension';
  key: ExpressionNode;
  value: ExpressionNode;
  clauses: ComprehensionClause[];
}

export interface UnaryNode {
  type: 'Unary';
  operator: UnaryOperator;
  argument: ExpressionNode;
}

export interface BinaryNode {
  type: 'Binary';
  operator: BinaryOperator;
  left: ExpressionNode;
  right: ExpressionNode;
}

export interface LogicalNode {
  type: 'Logical';
  operator: LogicalOperator;
  left: ExpressionNode;
  right: ExpressionNode;
}

export interface CompareNode {
  type: 'Compare';
  first: ExpressionNode;
  rest: Array<{ operator: CompareOperator; operand: ExpressionNode }>;
}

export interface ConditionalNode {
  type: 'Conditional';
  test: ExpressionNode;
  consequent: ExpressionNode;
  alternate: ExpressionNode;
}

export type ArgumentNode =
  | { type: 'Positional'; value: ExpressionNode }
  | { type: 'Keyword'; name: string; value: ExpressionNode }
  | SpreadNode;

export interface CallNode {
  type: 'Call';
  callee: ExpressionNode;
  args: ArgumentNode[];
}

export interface IndexNode {
  type: 'Index';
  object: ExpressionNode;
  index: ExpressionNode;
}

export interface SliceNode {
  type: 'Slice';
  object: ExpressionNode;
  start?: ExpressionNode;
  stop?: ExpressionNode;
  step?: ExpressionNode;
}

export type ExpressionNode =
  | LiteralNode
  | NameNode
  | ListNode
  | SetNode
  | MappingNode
  | ComprehensionNode
  | MappingComprehensionNode
  | UnaryNode
  | BinaryNode
  | LogicalNode
  | CompareNode
  | ConditionalNode
  | CallNode
  | IndexNode
  | SliceNode;

export interface AssignmentNode {
  /** Canonical dot path, e.g. `a.b.0` */
  target: string;
  expression: ExpressionNode;
  /** Source text of the right-hand side */
  source: string;
}
