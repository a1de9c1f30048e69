import { z } from 'zod';
import { InvalidOptions } from '../core/errors.js';
import { parseColumnList, parsePrimaryKey } from './column-set-planner.js';
import type { RawCastSpec } from './cast-registry.js';
import type { EmptyComparisonPolicy } from './types.js';

const columnListSchema = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform(value => (Array.isArray(value) ? parseColumnList(value.join(',')) : parseColumnList(value)));

const limitSchema = z
  .union([z.number(), z.string(), z.null()])
  .optional()
  .transform((value, ctx): number | undefined => {
    if (value === undefined || value === null) return undefined;
    const text = typeof value === 'string' ? value.trim() : String(value);
    if (text.toLowerCase() === 'null') return undefined;
    if (!/^\d+$/.test(text)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `limit must be a non-negative integer or "null", got '${String(value)}'`
      });
      return z.NEVER;
    }
    const limit = Number(text);
    if (!Number.isSafeInteger(limit)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `limit must be at most ${Number.MAX_SAFE_INTEGER}, got '${text}'`
      });
      return z.NEVER;
    }
    return limit;
  });

/**
 * Options of one comparison as a host collects them (CLI flags, config
 * objects). Lists may be comma-separated strings or arrays.
 */
export const compareOptionsSchema = z.object({
  table1: z.string().trim().min(1, 'table1 is required'),
  table2: z.string().trim().min(1, 'table2 is required'),
  pkCols: z
    .union([z.string(), z.array(z.string())])
    .optional()
    .transform(value => parsePrimaryKey(Array.isArray(value) ? value.join(',') : value)),
  ignoreCols: columnListSchema,
  scalarCasts: z.union([z.string(), z.record(z.string())]).optional(),
  limit: limitSchema,
  strictColumns: z.boolean().optional().default(false)
});

export type CompareOptionsInput = z.input<typeof compareOptionsSchema>;

/**
 * A validated comparison request, ready for compareTables.
 */
export interface CompareRequest {
  table1: string;
  table2: string;
  primaryKey: string[];
  ignoreColumns: string[];
  casts?: RawCastSpec;
  limit?: number;
  emptyComparison: EmptyComparisonPolicy;
}

/**
 * Validates raw options and normalizes them into a CompareRequest.
 * @throws InvalidOptions listing every violation
 */
export const parseCompareOptions = (input: unknown): CompareRequest => {
  const result = compareOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidOptions(
      result.error.issues.map(issue =>
        issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }
  const options = result.data;
  return {
    table1: options.table1,
    table2: options.table2,
    primaryKey: options.pkCols,
    ignoreColumns: options.ignoreCols,
    casts: options.scalarCasts,
    limit: options.limit,
    emptyComparison: options.strictColumns ? 'error' : 'presence-only'
  };
};
