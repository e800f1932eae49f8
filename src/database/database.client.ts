import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';

import { DatabaseConfig } from './database.config';

export type IsolationLevel = 'READ COMMITTED' | 'REPEATABLE READ' | 'SERIALIZABLE';

/**
 * The slice of `pg.Pool` the client relies on.
 */
export type PgPool = Pick<Pool, 'query' | 'connect' | 'end'>;

export class DatabaseClient {
  constructor(private readonly pool: PgPool) {}

  static async connect(config: DatabaseConfig = DatabaseConfig.fromEnv()): Promise<DatabaseClient> {
    const client = new DatabaseClient(new Pool(config.toPoolConfig()));
    await client.verifyConnection();
    return client;
  }

  async query<T extends QueryResultRow = QueryResultRow>(
    queryText: string,
    values?: ReadonlyArray<unknown>,
  ): Promise<QueryResult<T>> {
    return this.pool.query<T>(queryText, values ? [...values] : undefined);
  }

  /**
   * Runs `callback` on a dedicated connection between BEGIN and COMMIT,
   * rolling back when it throws.
   */
  async transaction<T>(
    callback: (client: PoolClient) => Promise<T>,
    isolationLevel: IsolationLevel = 'READ COMMITTED',
  ): Promise<T> {
    const client = await this.pool.connect();

    try {
      await client.query(`BEGIN ISOLATION LEVEL ${isolationLevel}`);
      const result = await callback(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async verifyConnection(): Promise<void> {
    const client = await this.pool.connect();

    try {
      await client.query('SELECT 1');
    } finally {
      client.release();
    }
  }
}
