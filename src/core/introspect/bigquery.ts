import type { SchemaIntrospector } from './types.js';
import { toColumnDefinitions } from './utils.js';

/**
 * BigQuery keeps one INFORMATION_SCHEMA per dataset, so the view is
 * addressed through the table's project and dataset.
 */
export const bigqueryIntrospector: SchemaIntrospector = {
  async describeTable(ctx, path) {
    if (path.length !== 3) {
      throw new Error(`Expected project.dataset.table, got '${path.join('.')}'`);
    }
    const [project, dataset, tableName] = path;
    const view = `${ctx.dialect.quoteIdentifier(`${project}.${dataset}`)}.INFORMATION_SCHEMA.COLUMNS`;
    const sql =
      `SELECT column_name, data_type FROM ${view}` +
      ` WHERE table_name = ${ctx.dialect.formatPlaceholder(1)}` +
      ' ORDER BY ordinal_position';
    return toColumnDefinitions(await ctx.executor.executeSql(sql, [tableName]));
  }
};
