import { Dialect } from '../abstract.js';
import { SelectQueryNode } from '../../ast/query.js';
import { CteCompiler } from './cte-compiler.js';
import { JoinCompiler } from './join-compiler.js';
import { OrderByCompiler } from './orderby-compiler.js';
import { PaginationStrategy, StandardLimitPagination } from './pagination-strategy.js';

/**
 * Shared SQL compiler for dialects with ANSI-style SELECT syntax.
 * Concrete dialects override only the minimal hooks (identifier quoting,
 * table naming, cast types, pagination) instead of re-implementing the
 * compile pipeline.
 */
export abstract class SqlDialectBase extends Dialect {
  protected readonly paginationStrategy: PaginationStrategy;

  protected constructor(paginationStrategy: PaginationStrategy = new StandardLimitPagination()) {
    super();
    this.paginationStrategy = paginationStrategy;
  }

  /**
   * Compiles SELECT query AST to SQL using common rules.
   */
  protected compileSelectAst(ast: SelectQueryNode): string {
    const ctes = CteCompiler.compileCtes(
      ast,
      id => this.quoteIdentifier(id),
      cte => this.compileSelectCore(cte)
    );
    return `${ctes}${this.compileSelectCore(ast)}`;
  }

  /**
   * Compiles a single SELECT (no CTE prefix).
   * Orchestrates compilation of individual clauses.
   */
  private compileSelectCore(ast: SelectQueryNode): string {
    const columns = this.compileSelectColumns(ast);
    const from = this.compileTableName(ast.from);
    const joins = JoinCompiler.compileJoins(
      ast.joins,
      table => this.compileTableName(table),
      expr => this.compileExpression(expr)
    );
    const whereClause = this.compileWhere(ast.where);
    const orderBy = OrderByCompiler.compileOrderBy(ast, term => this.compileOperand(term));
    const pagination = this.paginationStrategy.compilePagination(ast.limit);

    return `SELECT ${columns} FROM ${from}${joins}${whereClause}${orderBy}${pagination}`;
  }

  protected compileSelectColumns(ast: SelectQueryNode): string {
    return ast.columns
      .map(item => `${this.compileSelectExpression(item.expression)} AS ${this.quoteIdentifier(item.alias)}`)
      .join(', ');
  }
}
