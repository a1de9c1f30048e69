import { SQL_OPERATORS, type ScalarCastType } from '../sql/sql.js';
import type {
  AliasRefNode,
  BinaryExpressionNode,
  CastExpressionNode,
  CoalesceNode,
  ColumnNode,
  ExpressionNode,
  LiteralNode,
  LogicalExpressionNode,
  NullExpressionNode,
  OperandNode
} from './expression-nodes.js';

export type LiteralValue = LiteralNode['value'];

export const column = (table: string, name: string): ColumnNode => ({
  type: 'Column',
  table,
  name
});

export const literal = (value: LiteralValue): LiteralNode => ({
  type: 'Literal',
  value
});

export const aliasRef = (name: string): AliasRefNode => ({
  type: 'AliasRef',
  name
});

/**
 * Wraps an operand in a cast when a target type is given
 * @param expression - Operand to cast
 * @param castType - Target type, or undefined to leave the operand untouched
 */
export const cast = (expression: OperandNode, castType?: ScalarCastType): OperandNode => {
  if (!castType) return expression;
  const node: CastExpressionNode = { type: 'Cast', expression, castType };
  return node;
};

export const coalesce = (...args: OperandNode[]): CoalesceNode => ({
  type: 'Coalesce',
  args
});

export const eq = (left: OperandNode, right: OperandNode): BinaryExpressionNode => ({
  type: 'BinaryExpression',
  left,
  operator: SQL_OPERATORS.EQUALS,
  right
});

/**
 * NULL-safe inequality: two NULLs are not distinct, NULL and a value are.
 */
export const isDistinctFrom = (left: OperandNode, right: OperandNode): BinaryExpressionNode => ({
  type: 'BinaryExpression',
  left,
  operator: SQL_OPERATORS.IS_DISTINCT_FROM,
  right
});

export const isNull = (left: OperandNode): NullExpressionNode => ({
  type: 'NullExpression',
  left,
  operator: SQL_OPERATORS.IS_NULL
});

const logical = (
  operator: LogicalExpressionNode['operator'],
  operands: ExpressionNode[]
): ExpressionNode | undefined => {
  if (operands.length === 0) return undefined;
  if (operands.length === 1) return operands[0];
  return { type: 'LogicalExpression', operator, operands };
};

/**
 * Joins expressions with AND. Returns undefined for an empty list and the
 * expression itself for a single entry.
 */
export const and = (...operands: ExpressionNode[]): ExpressionNode | undefined =>
  logical(SQL_OPERATORS.AND, operands);

/**
 * Joins expressions with OR. Returns undefined for an empty list and the
 * expression itself for a single entry.
 */
export const or = (...operands: ExpressionNode[]): ExpressionNode | undefined =>
  logical(SQL_OPERATORS.OR, operands);
