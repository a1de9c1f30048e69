import { JoinNode, TableNode } from '../../ast/query.js';
import { ExpressionNode } from '../../ast/expression.js';

/**
 * Compiler for JOIN clauses in SELECT statements.
 */
export class JoinCompiler {
  static compileJoins(
    joins: JoinNode[] | undefined,
    compileFrom: (from: TableNode) => string,
    compileExpression: (expr: ExpressionNode) => string
  ): string {
    if (!joins || joins.length === 0) return '';
    const parts = joins.map(j => {
      const table = compileFrom(j.table);
      const cond = compileExpression(j.condition);
      return `${j.kind} JOIN ${table} ON ${cond}`;
    });
    return ` ${parts.join(' ')}`;
  }
}
