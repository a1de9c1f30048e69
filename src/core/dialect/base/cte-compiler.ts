import { SelectQueryNode } from '../../ast/query.js';

/**
 * Compiler for Common Table Expressions (CTEs).
 */
export class CteCompiler {
  /**
   * Compiles the WITH clause of a SELECT query.
   * @param ast - The SELECT query AST containing CTE definitions.
   * @param quoteIdentifier - Function to quote identifiers according to dialect rules.
   * @param compileSelectAst - Function to recursively compile SELECT query ASTs.
   * @returns SQL WITH clause string (e.g., "WITH cte_name AS (...) ") or empty string if no CTEs.
   */
  static compileCtes(
    ast: SelectQueryNode,
    quoteIdentifier: (id: string) => string,
    compileSelectAst: (ast: SelectQueryNode) => string
  ): string {
    if (!ast.ctes || ast.ctes.length === 0) return '';
    const cteDefs = ast.ctes
      .map(cte => `${quoteIdentifier(cte.name)} AS (${compileSelectAst(cte.query).replace(/;$/, '')})`)
      .join(', ');
    return `WITH ${cteDefs} `;
  }
}
