import type { DialectName } from '../sql/sql.js';
import type { IntrospectContext, SchemaIntrospector, SchemaLookup } from './types.js';
import { duckdbIntrospector } from './duckdb.js';
import { bigqueryIntrospector } from './bigquery.js';
import { postgresIntrospector } from './postgres.js';

/** Registry mapping dialect names to their corresponding schema introspectors. */
const registry = new Map<DialectName, SchemaIntrospector>();

/**
 * Registers the built-in schema introspectors for all supported database dialects.
 */
const registerBuiltInIntrospectors = () => {
  registry.set('duckdb', duckdbIntrospector);
  registry.set('bigquery', bigqueryIntrospector);
  registry.set('postgres', postgresIntrospector);
};

registerBuiltInIntrospectors();

/**
 * Gets the schema introspector for a dialect.
 * @param dialect - The dialect name.
 * @returns The schema introspector or undefined if not found.
 */
export const getSchemaIntrospector = (dialect: DialectName): SchemaIntrospector | undefined => {
  return registry.get(dialect);
};

/**
 * Builds the schema-lookup capability of an engine from its registered introspector.
 */
export const createSchemaLookup = (ctx: IntrospectContext): SchemaLookup => {
  const introspector = getSchemaIntrospector(ctx.dialect.name);
  if (!introspector) {
    throw new Error(`No schema introspector registered for dialect "${ctx.dialect.name}"`);
  }
  return ref => introspector.describeTable(ctx, ref.parts);
};
