import type { Dialect } from '../core/dialect/abstract.js';
import {
  aliasRef,
  and,
  cast,
  coalesce,
  column,
  eq,
  isDistinctFrom,
  isNull,
  literal,
  or,
  type ExpressionNode
} from '../core/ast/expression.js';
import {
  selectItem,
  table,
  type CommonTableExpressionNode,
  type OrderByNode,
  type SelectItemNode,
  type SelectQueryNode
} from '../core/ast/query.js';
import { JOIN_KINDS, ORDER_DIRECTIONS } from '../core/sql/sql.js';
import type { ComparisonPlan, TableRef } from './types.js';

const SOURCE_ALIAS = 'src';
const PRESENT = 'present';

/**
 * Which result alias carries which value of the reconciliation query.
 */
export interface ResultColumnMap {
  /** Key column name and its alias, in primary key order */
  readonly primaryKey: ReadonlyArray<{ readonly column: string; readonly alias: string }>;
  readonly table1Present: string;
  readonly table2Present: string;
  /**
   * Compared columns with the alias of each side and of the engine's
   * NULL-safe verdict on whether the two sides differ
   */
  readonly compared: ReadonlyArray<{
    readonly column: string;
    readonly table1Alias: string;
    readonly table2Alias: string;
    readonly differsAlias: string;
  }>;
}

export interface ComparisonQuery {
  readonly sql: string;
  readonly columns: ResultColumnMap;
}

export interface BuildOptions {
  /** Maximum number of differing rows; undefined means unbounded */
  limit?: number;
}

interface SideSpec {
  cte: string;
  alias: string;
}

const SIDE1: SideSpec = { cte: 'table1_prepared', alias: 't1' };
const SIDE2: SideSpec = { cte: 'table2_prepared', alias: 't2' };

const pkAlias = (index: number): string => `pk_${index + 1}`;
const colAlias = (index: number): string => `col_${index + 1}`;
const differsAlias = (index: number): string => `diff_${index + 1}`;

/**
 * Builds the single reconciliation query of a comparison plan.
 * The builder is engine-agnostic; quoting, table naming and cast spelling
 * all come from the dialect.
 */
export class ComparisonQueryBuilder {
  constructor(private readonly dialect: Dialect) {}

  /**
   * @param table1 - Qualified reference of the first table
   * @param table2 - Qualified reference of the second table
   * @param plan - Comparison plan with its casts resolved
   */
  build(
    table1: TableRef,
    table2: TableRef,
    plan: ComparisonPlan,
    options: BuildOptions = {}
  ): ComparisonQuery {
    const ast: SelectQueryNode = {
      type: 'SelectQuery',
      ctes: [this.prepare(SIDE1.cte, table1, plan), this.prepare(SIDE2.cte, table2, plan)],
      columns: this.outerColumns(plan),
      from: table([SIDE1.cte], SIDE1.alias),
      joins: [
        {
          type: 'Join',
          kind: JOIN_KINDS.FULL_OUTER,
          table: table([SIDE2.cte], SIDE2.alias),
          condition: this.joinCondition(plan)
        }
      ],
      where: this.differencePredicate(plan),
      orderBy: plan.primaryKey.map((_, index): OrderByNode => ({
        type: 'OrderBy',
        term: aliasRef(pkAlias(index)),
        direction: ORDER_DIRECTIONS.ASC
      })),
      limit: options.limit
    };

    return {
      sql: this.dialect.compileSelect(ast).sql,
      columns: {
        primaryKey: plan.primaryKey.map((name, index) => ({ column: name, alias: pkAlias(index) })),
        table1Present: `${SIDE1.alias}_${PRESENT}`,
        table2Present: `${SIDE2.alias}_${PRESENT}`,
        compared: plan.compareColumns.map((name, index) => ({
          column: name,
          table1Alias: `${SIDE1.alias}_${colAlias(index)}`,
          table2Alias: `${SIDE2.alias}_${colAlias(index)}`,
          differsAlias: differsAlias(index)
        }))
      }
    };
  }

  /**
   * One side projected under positional aliases, casts applied.
   */
  private prepare(name: string, ref: TableRef, plan: ComparisonPlan): CommonTableExpressionNode {
    const columns: SelectItemNode[] = [
      selectItem(literal(true), PRESENT),
      ...plan.primaryKey.map((pk, index) => selectItem(column(SOURCE_ALIAS, pk), pkAlias(index))),
      ...plan.compareColumns.map((name, index) =>
        selectItem(cast(column(SOURCE_ALIAS, name), plan.casts.get(name)), colAlias(index))
      )
    ];
    return {
      type: 'CommonTableExpression',
      name,
      query: {
        type: 'SelectQuery',
        columns,
        from: table(ref.parts, SOURCE_ALIAS),
        joins: []
      }
    };
  }

  private outerColumns(plan: ComparisonPlan): SelectItemNode[] {
    return [
      ...plan.primaryKey.map((_, index) =>
        selectItem(
          coalesce(column(SIDE1.alias, pkAlias(index)), column(SIDE2.alias, pkAlias(index))),
          pkAlias(index)
        )
      ),
      selectItem(column(SIDE1.alias, PRESENT), `${SIDE1.alias}_${PRESENT}`),
      selectItem(column(SIDE2.alias, PRESENT), `${SIDE2.alias}_${PRESENT}`),
      ...plan.compareColumns.flatMap((_, index) => [
        selectItem(column(SIDE1.alias, colAlias(index)), `${SIDE1.alias}_${colAlias(index)}`),
        selectItem(column(SIDE2.alias, colAlias(index)), `${SIDE2.alias}_${colAlias(index)}`),
        selectItem(this.distinct(index), differsAlias(index))
      ])
    ];
  }

  private distinct(index: number): ExpressionNode {
    return isDistinctFrom(column(SIDE1.alias, colAlias(index)), column(SIDE2.alias, colAlias(index)));
  }

  private joinCondition(plan: ComparisonPlan): ExpressionNode {
    const [first, ...rest] = plan.primaryKey.map((_, index) =>
      eq(column(SIDE1.alias, pkAlias(index)), column(SIDE2.alias, pkAlias(index)))
    );
    return and(first, ...rest) ?? first;
  }

  /**
   * Missing on either side, or any compared column NULL-safely distinct.
   */
  private differencePredicate(plan: ComparisonPlan): ExpressionNode {
    const presence1 = isNull(column(SIDE1.alias, PRESENT));
    const presence2 = isNull(column(SIDE2.alias, PRESENT));
    const distinct = or(...plan.compareColumns.map((_, index) => this.distinct(index)));
    const operands = distinct ? [presence1, presence2, distinct] : [presence1, presence2];
    return or(...operands) ?? presence1;
  }
}
