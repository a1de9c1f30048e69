import { InvalidTableReference } from '../core/errors.js';
import type { Dialect } from '../core/dialect/abstract.js';
import type { TableRef } from './types.js';

/**
 * Parses `table`, `schema.table` or `catalog.schema.table`.
 */
export const parseTableRef = (raw: string): TableRef => {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new InvalidTableReference(raw, 'table name is empty');
  }
  const parts = trimmed.split('.').map(part => part.trim());
  if (parts.some(part => part.length === 0)) {
    throw new InvalidTableReference(raw, 'empty name segment');
  }
  if (parts.length > 3) {
    throw new InvalidTableReference(raw, 'at most three name segments are allowed');
  }
  return Object.freeze({ raw: trimmed, parts: Object.freeze(parts) });
};

/**
 * Completes a reference the way the target engine resolves it
 * (BigQuery prepends the default project, for instance).
 */
export const qualifyTableRef = (ref: TableRef, dialect: Dialect): TableRef => {
  const parts = dialect.qualifyTablePath(ref.parts);
  return Object.freeze({ raw: parts.join('.'), parts: Object.freeze(parts) });
};
