import { QueryResult, QueryResultRow } from 'pg';
import { logger } from '../../utils/logging';

/**
 * The slice of pg's Pool / PoolClient the repositories rely on.
 */
export interface SqlClient {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export interface TransactionClient extends SqlClient {
  release(): void;
}

export interface Database extends SqlClient {
  connect(): Promise<TransactionClient>;
}

/**
 * Run `work` inside BEGIN/COMMIT on a dedicated client. Any error rolls the
 * transaction back and is rethrown unchanged; the client is always released.
 */
export const withTransaction = async <T>(
  db: Pick<Database, 'connect'>,
  work: (client: SqlClient) => Promise<T>
): Promise<T> => {
  const client = await db.connect();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      logger.error('Transaction rollback failed', {
        error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
      });
    }
    throw error;
  } finally {
    client.release();
  }
};
