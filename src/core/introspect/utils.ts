import { z } from 'zod';
import type { ResultRow, SqlParameter } from '../execution/db-executor.js';
import type { ColumnDefinition, IntrospectContext } from './types.js';

const columnRowSchema = z.object({
  column_name: z.string(),
  data_type: z.string()
});

/**
 * Maps information_schema.columns rows onto column definitions.
 * Engines that return other shapes fail loudly instead of yielding an empty schema.
 */
export const toColumnDefinitions = (rows: readonly ResultRow[]): ColumnDefinition[] =>
  rows.map(row => {
    const { column_name, data_type } = columnRowSchema.parse(row);
    return { name: column_name, type: data_type };
  });

/**
 * Describes a table through the ANSI information_schema.columns view.
 * One-part names are looked up in the current schema, two-part names as
 * schema.table and three-part names as catalog.schema.table.
 */
export const describeFromInformationSchema = async (
  ctx: IntrospectContext,
  path: readonly string[]
): Promise<ColumnDefinition[]> => {
  const tableName = path[path.length - 1];
  const schemaName = path.length >= 2 ? path[path.length - 2] : undefined;
  const catalogName = path.length >= 3 ? path[path.length - 3] : undefined;

  const params: SqlParameter[] = [];
  const bind = (value: string): string => {
    params.push(value);
    return ctx.dialect.formatPlaceholder(params.length);
  };

  const conditions = [
    `table_name = ${bind(tableName)}`,
    schemaName !== undefined ? `table_schema = ${bind(schemaName)}` : 'table_schema = current_schema()',
    catalogName !== undefined ? `table_catalog = ${bind(catalogName)}` : 'table_catalog = current_database()'
  ];

  const sql =
    'SELECT column_name, data_type FROM information_schema.columns' +
    ` WHERE ${conditions.join(' AND ')}` +
    ' ORDER BY ordinal_position';

  return toColumnDefinitions(await ctx.executor.executeSql(sql, params));
};
