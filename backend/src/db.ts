import { Pool, type PoolClient, type QueryResult, type QueryResultRow } from 'pg';
import type { DatabaseConfig } from './config.js';
import { logger } from './logger.js';

/**
 * A connection pool plus the query and transaction helpers used by the
 * repositories. The staging and destination stores each get their own.
 */
export class Database {
  readonly name: string;
  private readonly pool: Pool;

  constructor(name: string, pool: Pool) {
    this.name = name;
    this.pool = pool;
  }

  async query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[],
    client?: PoolClient
  ): Promise<QueryResult<T>> {
    if (client) {
      return client.query<T>(text, params);
    }
    return this.pool.query<T>(text, params);
  }

  async withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('begin');
      const result = await fn(client);
      await client.query('commit');
      return result;
    } catch (error) {
      await client.query('rollback');
      throw error;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
    logger.info({ database: this.name }, 'connection pool closed');
  }
}

export function createDatabase(name: string, config: DatabaseConfig): Database {
  const pool = new Pool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    max: config.max,
  });

  pool.on('error', (err) => {
    logger.error({ err, database: name }, 'unexpected error on idle client');
  });

  return new Database(name, pool);
}
