import type { QueryResult, QueryResultRow } from 'pg';

/**
 * The slice of a pg client the repositories use. Satisfied by a pg `PoolClient`
 * and by the query-logging wrapper in DatabaseService.
 */
export interface SqlExecutor {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}
