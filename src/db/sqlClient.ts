import { Pool, PoolConfig, QueryResult, QueryResultRow } from 'pg';

/**
 * The slice of a pg pool the stores depend on. Tests hand in pg-mem pools or
 * scripted fakes.
 */
export interface SqlClient {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export const createPool = (connectionString: string, ssl = false): Pool => {
  const config: PoolConfig = { connectionString };
  if (ssl) {
    config.ssl = { rejectUnauthorized: false };
  }
  return new Pool(config);
};

export const fromPool = (pool: Pool): SqlClient => ({
  query: <R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]) =>
    pool.query<R>(text, values)
});
