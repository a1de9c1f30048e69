import type { ExpressionNode, OperandNode } from './expression-nodes.js';
import type { JoinKind, OrderDirection } from '../sql/sql.js';

/**
 * AST node representing a table reference in a query
 */
export interface TableNode {
  type: 'Table';
  /** Qualified name, outermost qualifier first (e.g. [project, dataset, table]) */
  path: readonly string[];
  /** Optional table alias */
  alias?: string;
}

/**
 * AST node representing a projected expression with its output alias
 */
export interface SelectItemNode {
  type: 'SelectItem';
  /** A value, or a predicate projected as a boolean */
  expression: OperandNode | ExpressionNode;
  alias: string;
}

/**
 * AST node representing a JOIN clause
 */
export interface JoinNode {
  type: 'Join';
  kind: JoinKind;
  table: TableNode;
  condition: ExpressionNode;
}

/**
 * AST node representing an ORDER BY term
 */
export interface OrderByNode {
  type: 'OrderBy';
  term: OperandNode;
  direction: OrderDirection;
}

/**
 * AST node representing a Common Table Expression (CTE)
 */
export interface CommonTableExpressionNode {
  type: 'CommonTableExpression';
  /** CTE name */
  name: string;
  /** CTE query */
  query: SelectQueryNode;
}

/**
 * AST node representing a complete SELECT query
 */
export interface SelectQueryNode {
  type: 'SelectQuery';
  /** Optional CTEs (WITH clauses) */
  ctes?: CommonTableExpressionNode[];
  /** Columns to select */
  columns: SelectItemNode[];
  /** FROM clause table */
  from: TableNode;
  /** JOIN clauses */
  joins: JoinNode[];
  /** Optional WHERE clause */
  where?: ExpressionNode;
  /** Optional ORDER BY clause */
  orderBy?: OrderByNode[];
  /** Optional LIMIT clause */
  limit?: number;
}

export const table = (path: readonly string[], alias?: string): TableNode => ({
  type: 'Table',
  path,
  alias
});

export const selectItem = (expression: OperandNode | ExpressionNode, alias: string): SelectItemNode => ({
  type: 'SelectItem',
  expression,
  alias
});
