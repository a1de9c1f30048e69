import type { ScalarCastType } from '../../sql/sql.js';
import type { TableNode } from '../../ast/query.js';
import type { CastExpressionNode } from '../../ast/expression.js';
import { InvalidTableReference } from '../../errors.js';
import { SqlDialectBase } from '../base/sql-dialect.js';

export interface BigQueryDialectOptions {
  /** Project used for `dataset.table` references */
  defaultProject?: string;
}

/**
 * BigQuery (GoogleSQL) dialect implementation
 */
export class BigQueryDialect extends SqlDialectBase {
  readonly name = 'bigquery';
  private readonly defaultProject?: string;

  /**
   * Creates a new BigQueryDialect instance
   * @param options - Default project used to qualify two-part table names
   */
  public constructor(options: BigQueryDialectOptions = {}) {
    super();
    this.defaultProject = options.defaultProject;
  }

  /**
   * Quotes an identifier using backticks
   * @param id - Identifier to quote
   * @returns Quoted identifier
   */
  quoteIdentifier(id: string): string {
    return `\`${id.replace(/\\/g, '\\\\').replace(/`/g, '\\`')}\``;
  }

  /**
   * GoogleSQL spells the neutral cast types natively
   */
  castTypeName(type: ScalarCastType): string {
    return type;
  }

  /**
   * Expands `dataset.table` with the default project; anything else than
   * `project.dataset.table` or `dataset.table` is rejected.
   */
  qualifyTablePath(path: readonly string[]): string[] {
    const raw = path.join('.');
    if (path.length === 3) {
      return [...path];
    }
    if (path.length === 2) {
      if (!this.defaultProject) {
        throw new InvalidTableReference(
          raw,
          'missing project ID and no default project is configured; use project.dataset.table'
        );
      }
      return [this.defaultProject, ...path];
    }
    throw new InvalidTableReference(raw, 'expected [project.]dataset.table');
  }

  /**
   * A qualified path is written as one backticked name: `project.dataset.table`
   */
  protected compileTableName(table: TableNode): string {
    const name = this.quoteIdentifier(table.path.join('.'));
    return table.alias ? `${name} AS ${this.quoteIdentifier(table.alias)}` : name;
  }

  /**
   * JSON values are not comparable in GoogleSQL, so JSON casts compare the
   * canonical text of the parsed value instead.
   */
  protected compileCast(node: CastExpressionNode): string {
    if (node.castType === 'JSON') {
      return `TO_JSON_STRING(PARSE_JSON(${this.compileOperand(node.expression)}))`;
    }
    return super.compileCast(node);
  }
}
