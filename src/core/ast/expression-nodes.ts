import type {
  ComparisonOperator,
  LogicalOperator,
  NullCheckOperator,
  ScalarCastType
} from '../sql/sql.js';

/**
 * AST node representing a literal value
 */
export interface LiteralNode {
  type: 'Literal';
  /** The literal value (string, number, boolean, or null) */
  value: string | number | boolean | null;
}

/**
 * AST node representing a column reference
 */
export interface ColumnNode {
  type: 'Column';
  /** Table (or CTE) alias the column belongs to */
  table: string;
  /** Column name */
  name: string;
}

/**
 * AST node referencing an output alias of the enclosing SELECT
 */
export interface AliasRefNode {
  type: 'AliasRef';
  /** Alias name */
  name: string;
}

/**
 * AST node representing a scalar cast to an engine-neutral type
 */
export interface CastExpressionNode {
  type: 'Cast';
  /** Expression being cast */
  expression: OperandNode;
  /** Target type; dialects choose the spelling */
  castType: ScalarCastType;
}

/**
 * AST node representing COALESCE(a, b, ...)
 */
export interface CoalesceNode {
  type: 'Coalesce';
  args: OperandNode[];
}

/**
 * Union type representing any operand that can be used in expressions
 */
export type OperandNode =
  | ColumnNode
  | LiteralNode
  | AliasRefNode
  | CastExpressionNode
  | CoalesceNode;

/**
 * AST node representing a binary comparison (e.g. a = b, a IS DISTINCT FROM b)
 */
export interface BinaryExpressionNode {
  type: 'BinaryExpression';
  left: OperandNode;
  operator: ComparisonOperator;
  right: OperandNode;
}

/**
 * AST node representing an IS NULL check
 */
export interface NullExpressionNode {
  type: 'NullExpression';
  left: OperandNode;
  operator: NullCheckOperator;
}

/**
 * AST node representing AND/OR over several expressions
 */
export interface LogicalExpressionNode {
  type: 'LogicalExpression';
  operator: LogicalOperator;
  operands: ExpressionNode[];
}

/**
 * Union type representing any boolean expression
 */
export type ExpressionNode =
  | BinaryExpressionNode
  | NullExpressionNode
  | LogicalExpressionNode;
