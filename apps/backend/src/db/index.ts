import { createLogger } from '@sensor-registry/shared-utils';
import { ConnectionPool } from './pool';
import { isConnectionFault, SqliteConnectionFactory, type SqliteConnection } from './sqlite';
import { migrate } from './schema';

const logger = createLogger('Database');

export type DatabasePool = ConnectionPool<SqliteConnection>;

export interface DatabaseOptions {
  filename: string;
  poolMin: number;
  poolMax: number;
  acquireTimeoutMs: number;
  busyTimeoutMs: number;
}

/** Opens and pre-warms the pool, then brings the schema up to date. */
export async function openDatabase(options: DatabaseOptions): Promise<DatabasePool> {
  const pool = new ConnectionPool(
    new SqliteConnectionFactory({
      filename: options.filename,
      busyTimeoutMs: options.busyTimeoutMs,
    }),
    {
      minSize: options.poolMin,
      maxSize: options.poolMax,
      acquireTimeoutMs: options.acquireTimeoutMs,
      isConnectionError: isConnectionFault,
    }
  );

  try {
    await pool.start();
    await pool.withConnection((db) => migrate(db));
  } catch (error) {
    await pool.close();
    throw error;
  }

  logger.info(`Database ready (${options.filename}, pool ${options.poolMin}-${options.poolMax})`);
  return pool;
}

export async function pingDatabase(pool: DatabasePool): Promise<boolean> {
  return pool.withConnection((db) => {
    const row = db.prepare<[], { ok: number }>('SELECT 1 AS ok').get();
    return row?.ok === 1;
  });
}
