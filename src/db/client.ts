import pg from 'pg';
import { logger, Logger } from '../config/logger.js';
import { describeError } from '../errors.js';

const { Pool } = pg;

export interface Queryable {
  query<T extends pg.QueryResultRow = pg.QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<pg.QueryResult<T>>;
}

export interface DatabaseOptions {
  connectionString: string;
  max?: number;
}

/**
 * Thin wrapper over a pg pool: logged queries, transactions on a dedicated
 * client, and pool shutdown.
 */
export class Database implements Queryable {
  private readonly pool: pg.Pool;
  private readonly log = logger.child('db');

  constructor(options: DatabaseOptions) {
    this.pool = new Pool({
      connectionString: options.connectionString,
      max: options.max ?? 20,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });

    this.pool.on('error', (err) => {
      this.log.error('Unexpected database error', { error: err });
    });

    this.pool.on('connect', () => {
      this.log.debug('New database client connected');
    });
  }

  async query<T extends pg.QueryResultRow = pg.QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<pg.QueryResult<T>> {
    return runQuery(() => this.pool.query<T>(text, params), text, this.log);
  }

  /**
   * Run `fn` inside BEGIN/COMMIT on one pooled client. Any error rolls the
   * transaction back and is re-thrown. A client whose ROLLBACK fails is
   * discarded from the pool and the original error still propagates.
   */
  async transaction<T>(fn: (client: Queryable) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    const scoped: Queryable = {
      query: <R extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]) =>
        runQuery(() => client.query<R>(text, params), text, this.log),
    };
    let broken: Error | undefined;

    try {
      await client.query('BEGIN');
      const result = await fn(scoped);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        this.log.error('Rollback failed, discarding client', { error: rollbackError });
        broken = new Error(`Rollback failed: ${describeError(rollbackError)}`);
      }
      throw error;
    } finally {
      client.release(broken);
    }
  }

  async disconnect(): Promise<void> {
    await this.pool.end();
    this.log.info('Database pool closed');
  }
}

async function runQuery<T extends pg.QueryResultRow>(
  execute: () => Promise<pg.QueryResult<T>>,
  text: string,
  log: Logger
): Promise<pg.QueryResult<T>> {
  const start = Date.now();
  try {
    const result = await execute();
    log.debug('Executed query', { text, duration: Date.now() - start, rows: result.rowCount });
    return result;
  } catch (error) {
    log.error('Query error', { text, error });
    throw error;
  }
}
