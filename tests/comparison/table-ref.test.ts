import { describe, it, expect } from 'vitest';
import { parseTableRef, qualifyTableRef } from '../../src/comparison/table-ref.js';
import { BigQueryDialect } from '../../src/core/dialect/bigquery/index.js';
import { DuckDbDialect } from '../../src/core/dialect/duckdb/index.js';
import { InvalidTableReference } from '../../src/core/errors.js';

describe('parseTableRef', () => {
  it('splits a qualified name into its segments', () => {
    expect(parseTableRef(' analytics.orders ')).toEqual({
      raw: 'analytics.orders',
      parts: ['analytics', 'orders']
    });
  });

  it('accepts up to three segments', () => {
    expect(parseTableRef('proj.ds.orders').parts).toEqual(['proj', 'ds', 'orders']);
  });

  it('rejects empty names, empty segments and deep paths', () => {
    expect(() => parseTableRef('  ')).toThrow(InvalidTableReference);
    expect(() => parseTableRef('ds..orders')).toThrow("Invalid table reference 'ds..orders': empty name segment");
    expect(() => parseTableRef('a.b.c.d')).toThrow(InvalidTableReference);
  });

  it('returns frozen references', () => {
    const ref = parseTableRef('orders');
    expect(Object.isFrozen(ref)).toBe(true);
    expect(Object.isFrozen(ref.parts)).toBe(true);
  });
});

describe('qualifyTableRef', () => {
  it('keeps DuckDB names as written', () => {
    const ref = qualifyTableRef(parseTableRef('main.orders'), new DuckDbDialect());
    expect(ref.parts).toEqual(['main', 'orders']);
  });

  it('prepends the BigQuery default project to dataset.table', () => {
    const dialect = new BigQueryDialect({ defaultProject: 'test-project' });
    const ref = qualifyTableRef(parseTableRef('sales.orders'), dialect);
    expect(ref).toEqual({ raw: 'test-project.sales.orders', parts: ['test-project', 'sales', 'orders'] });
  });

  it('refuses BigQuery dataset.table without a default project', () => {
    expect(() => qualifyTableRef(parseTableRef('sales.orders'), new BigQueryDialect())).toThrow(
      "Invalid table reference 'sales.orders': missing project ID and no default project is configured; use project.dataset.table"
    );
  });

  it('refuses a bare BigQuery table name', () => {
    const dialect = new BigQueryDialect({ defaultProject: 'test-project' });
    expect(() => qualifyTableRef(parseTableRef('orders'), dialect)).toThrow(
      "Invalid table reference 'orders': expected [project.]dataset.table"
    );
  });
});
