/**
 * Expression syntax tree. The set of node kinds is closed; the evaluator
 * switches over `kind` exhaustively.
 *
 * @module expression
 */

export type ArithmeticOperator = '+' | '-' | '*' | '/' | '//' | '%' | '**';
export type CompareOperator = '==' | '!=' | '<' | '<=' | '>' | '>=' | 'in' | 'not in';

export interface LiteralNode {
  kind: 'literal';
  value: string | number | boolean | null;
}

export interface ListNode {
  kind: 'list';
  items: ExpressionNode[];
}

export interface DictNode {
  kind: 'dict';
  entries: Array<{ key: ExpressionNode; value: ExpressionNode }>;
}

export interface NameNode {
  kind: 'name';
  name: string;
}

export interface AttributeNode {
  kind: 'attribute';
  target: ExpressionNode;
  name: string;
}

export interface IndexNode {
  kind: 'index';
  target: ExpressionNode;
  index: ExpressionNode;
}

export interface UnaryNode {
  kind: 'unary';
  operator: '+' | '-';
  operand: ExpressionNode;
}

export interface NotNode {
  kind: 'not';
  operand: ExpressionNode;
}

export interface BinaryNode {
  kind: 'binary';
  operator: ArithmeticOperator;
  left: ExpressionNode;
  right: ExpressionNode;
}

export interface ConcatNode {
  kind: 'concat';
  left: ExpressionNode;
  right: ExpressionNode;
}

export interface LogicalNode {
  kind: 'logical';
  operator: 'and' | 'or';
  left: ExpressionNode;
  right: ExpressionNode;
}

/** `a < b <= c` chains, as in Jinja */
export interface CompareNode {
  kind: 'compare';
  first: ExpressionNode;
  rest: Array<{ operator: CompareOperator; operand: ExpressionNode }>;
}

export interface ConditionalNode {
  kind: 'conditional';
  test: ExpressionNode;
  then: ExpressionNode;
  otherwise?: ExpressionNode;
}

export interface FilterNode {
  kind: 'filter';
  target: ExpressionNode;
  name: string;
  args: ExpressionNode[];
  kwargs: Record<string, ExpressionNode>;
}

export interface TestNode {
  kind: 'test';
  target: ExpressionNode;
  name: string;
  negated: boolean;
  args: ExpressionNode[];
}

export type ExpressionNode =
  | LiteralNode
  | ListNode
  | DictNode
  | NameNode
  | AttributeNode
  | IndexNode
  | UnaryNode
  | NotNode
  | BinaryNode
  | ConcatNode
  | LogicalNode
  | CompareNode
  | ConditionalNode
  | FilterNode
  | TestNode;
