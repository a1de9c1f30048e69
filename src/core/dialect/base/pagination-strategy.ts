/**
 * Strategy interface for compiling pagination clauses.
 * Allows dialects to customize how a row cap (LIMIT, FETCH FIRST, etc.) is generated.
 */
export interface PaginationStrategy {
  /**
   * Compiles pagination logic into SQL clause.
   * @param limit - The limit value, if present.
   * @returns SQL pagination clause (e.g., " LIMIT 10") or empty string if no pagination.
   */
  compilePagination(limit?: number): string;
}

/**
 * Standard SQL pagination using LIMIT.
 */
export class StandardLimitPagination implements PaginationStrategy {
  compilePagination(limit?: number): string {
    return limit !== undefined ? ` LIMIT ${limit}` : '';
  }
}
