import { OrderByNode, SelectQueryNode } from '../../ast/query.js';

type TermRenderer = (term: OrderByNode['term']) => string;

/**
 * Compiler for ORDER BY clauses in SELECT statements.
 */
export class OrderByCompiler {
  /**
   * Compiles ORDER BY clause from a SELECT query AST.
   * @param ast - The SELECT query AST containing sort specifications.
   * @param renderTerm - Function to render an ordering term.
   * @returns SQL ORDER BY clause (e.g., " ORDER BY "pk_1" ASC") or empty string if no ordering.
   */
  static compileOrderBy(ast: SelectQueryNode, renderTerm: TermRenderer): string {
    if (!ast.orderBy || ast.orderBy.length === 0) return '';
    const parts = ast.orderBy.map(o => `${renderTerm(o.term)} ${o.direction}`).join(', ');
    return ` ORDER BY ${parts}`;
  }
}
