import { readFile } from 'node:fs/promises';
import path from 'node:path';
import pg from 'pg';
import type { QueryResult, QueryResultRow } from 'pg';

const { Pool, types } = pg;

export type DbPool = pg.Pool;

/** Minimal query surface shared by a pool and a checked-out client. */
export interface SqlExecutor {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[],
  ): Promise<QueryResult<R>>;
}

export interface SqlClient extends SqlExecutor {
  release(err?: Error | boolean): void;
}

export interface TransactionalSqlExecutor extends SqlExecutor {
  connect(): Promise<SqlClient>;
}

export interface PoolOptions {
  connectionString: string;
  max?: number;
  applicationName?: string;
  logger?: Pick<Console, 'error'>;
}

const TIMESTAMP_OID = 1114;
const DATE_OID = 1082;

// `timestamp without time zone` holds wall-clock time: read it into the UTC
// fields of a Date. Dates stay as YYYY-MM-DD strings.
types.setTypeParser(TIMESTAMP_OID, (value: string) => new Date(`${value.replace(' ', 'T')}Z`));
types.setTypeParser(DATE_OID, (value: string) => value);

export const DEFAULT_SCHEMA_PATH = path.resolve(__dirname, '../../sql/schema.sql');

export function createPool(options: PoolOptions): DbPool {
  const logger = options.logger ?? console;
  const pool = new Pool({
    connectionString: options.connectionString,
    max: options.max ?? 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
    application_name: options.applicationName ?? 'waste-ops-api',
  });
  pool.on('error', (err) => {
    logger.error('[pg-pool] unexpected error on idle client', err);
  });
  return pool;
}

export async function closePool(pool: DbPool): Promise<void> {
  await pool.end();
}

export function poolExecutor(pool: DbPool): TransactionalSqlExecutor {
  return {
    query: (text, values) => pool.query(text, values),
    connect: async () => {
      const client = await pool.connect();
      return {
        query: (text, values) => client.query(text, values),
        release: (err) => client.release(err),
      };
    },
  };
}

/** Run a callback inside a transaction; rolls back on error. */
export async function withTransaction<T>(
  db: TransactionalSqlExecutor,
  fn: (client: SqlClient) => Promise<T>,
): Promise<T> {
  const client = await db.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}

/** Create the waste_ops schema if it does not exist yet. */
export async function applySchema(
  db: SqlExecutor,
  schemaPath: string = DEFAULT_SCHEMA_PATH,
): Promise<void> {
  const ddl = await readFile(schemaPath, 'utf8');
  await db.query(ddl);
}
