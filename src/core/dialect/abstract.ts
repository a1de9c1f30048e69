import type { SelectQueryNode, TableNode } from '../ast/query.js';
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
} from '../ast/expression.js';
import { SQL_OPERATORS, type DialectName, type ScalarCastType } from '../sql/sql.js';

/**
 * Result of SQL compilation
 */
export interface CompiledQuery {
  /** Generated SQL string */
  sql: string;
}

/**
 * Abstract base class for SQL dialect implementations.
 *
 * Everything that differs between engines (identifier quoting, how a
 * qualified table name is written, cast type names, the NULL-safe
 * inequality operator, pagination) is a hook here; query construction
 * itself stays engine-agnostic.
 */
export abstract class Dialect {
  /** Dialect identifier */
  abstract readonly name: DialectName;

  /**
   * Compiles a SELECT query AST to SQL
   * @param ast - Query AST to compile
   * @returns Compiled query
   */
  compileSelect(ast: SelectQueryNode): CompiledQuery {
    const rawSql = this.compileSelectAst(ast).trim();
    const sql = rawSql.endsWith(';') ? rawSql : `${rawSql};`;
    return { sql };
  }

  /**
   * Compiles SELECT query AST to SQL (to be implemented by concrete dialects)
   */
  protected abstract compileSelectAst(ast: SelectQueryNode): string;

  /**
   * Quotes an SQL identifier (to be implemented by concrete dialects)
   * @param id - Identifier to quote
   * @returns Quoted identifier
   */
  abstract quoteIdentifier(id: string): string;

  /**
   * Spelling of an engine-neutral cast type in this dialect
   */
  abstract castTypeName(type: ScalarCastType): string;

  /**
   * Completes a table path the way the engine resolves it. The default keeps
   * the path as given; dialects that need a fully qualified name override it.
   * @param path - Dot-separated name segments
   */
  qualifyTablePath(path: readonly string[]): string[] {
    return [...path];
  }

  /**
   * Formats a positional parameter placeholder
   * @param _index - 1-based parameter index
   */
  formatPlaceholder(_index: number): string {
    void _index;
    return '?';
  }

  /**
   * Compiles a table reference, with its alias when present
   */
  protected compileTableName(table: TableNode): string {
    const name = table.path.map(part => this.quoteIdentifier(part)).join('.');
    return table.alias ? `${name} AS ${this.quoteIdentifier(table.alias)}` : name;
  }

  /**
   * Compiles a WHERE clause
   * @param where - WHERE expression
   * @returns SQL WHERE clause or empty string
   */
  protected compileWhere(where: ExpressionNode | undefined): string {
    if (!where) return '';
    return ` WHERE ${this.compileExpression(where)}`;
  }

  /**
   * Compiles an expression node
   * @param node - Expression node to compile
   * @returns Compiled SQL expression
   */
  protected compileExpression(node: ExpressionNode): string {
    switch (node.type) {
      case 'BinaryExpression':
        return this.compileBinary(node);
      case 'NullExpression':
        return this.compileNullCheck(node);
      case 'LogicalExpression':
        return this.compileLogical(node);
    }
  }

  /**
   * Compiles an operand node
   * @param node - Operand node to compile
   * @returns Compiled SQL operand
   */
  protected compileOperand(node: OperandNode): string {
    switch (node.type) {
      case 'Column':
        return this.compileColumn(node);
      case 'Literal':
        return this.compileLiteral(node);
      case 'AliasRef':
        return this.compileAliasRef(node);
      case 'Cast':
        return this.compileCast(node);
      case 'Coalesce':
        return this.compileCoalesce(node);
    }
  }

  /**
   * Compiles a projected expression. Predicates are parenthesized so the
   * output alias binds to the whole comparison.
   */
  protected compileSelectExpression(node: OperandNode | ExpressionNode): string {
    switch (node.type) {
      case 'BinaryExpression':
      case 'NullExpression':
      case 'LogicalExpression':
        return `(${this.compileExpression(node)})`;
      default:
        return this.compileOperand(node);
    }
  }

  protected compileColumn(node: ColumnNode): string {
    return `${this.quoteIdentifier(node.table)}.${this.quoteIdentifier(node.name)}`;
  }

  protected compileAliasRef(node: AliasRefNode): string {
    return this.quoteIdentifier(node.name);
  }

  protected compileLiteral(node: LiteralNode): string {
    const { value } = node;
    if (value === null) return 'NULL';
    if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
    if (typeof value === 'number') return String(value);
    return `'${value.replace(/'/g, "''")}'`;
  }

  /**
   * Compiles CAST(expr AS type). Override when a type needs a conversion
   * function instead of a plain cast.
   */
  protected compileCast(node: CastExpressionNode): string {
    return `CAST(${this.compileOperand(node.expression)} AS ${this.castTypeName(node.castType)})`;
  }

  protected compileCoalesce(node: CoalesceNode): string {
    return `COALESCE(${node.args.map(arg => this.compileOperand(arg)).join(', ')})`;
  }

  /**
   * Compiles the NULL-safe inequality. Standard SQL spelling by default.
   */
  protected compileDistinctFrom(left: string, right: string): string {
    return `${left} ${SQL_OPERATORS.IS_DISTINCT_FROM} ${right}`;
  }

  private compileBinary(node: BinaryExpressionNode): string {
    const left = this.compileOperand(node.left);
    const right = this.compileOperand(node.right);
    if (node.operator === SQL_OPERATORS.IS_DISTINCT_FROM) {
      return this.compileDistinctFrom(left, right);
    }
    return `${left} ${node.operator} ${right}`;
  }

  private compileNullCheck(node: NullExpressionNode): string {
    return `${this.compileOperand(node.left)} ${node.operator}`;
  }

  private compileLogical(node: LogicalExpressionNode): string {
    if (node.operands.length === 0) return '';
    return node.operands
      .map(op => {
        const compiled = this.compileExpression(op);
        return op.type === 'LogicalExpression' ? `(${compiled})` : compiled;
      })
      .join(` ${node.operator} `);
  }
}
