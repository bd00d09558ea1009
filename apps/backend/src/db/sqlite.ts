import Database from 'better-sqlite3';
import { anyOf, createLogger, errorCode, hasErrorCode, type ErrorPredicate } from '@sensor-registry/shared-utils';
import type { ConnectionFactory } from './pool';

const logger = createLogger('SQLite');

export type SqliteConnection = Database.Database;

export interface SqliteOptions {
  filename: string;
  busyTimeoutMs: number;
}

export const MEMORY_DATABASE = ':memory:';

/**
 * Maps a DATABASE_URL onto a SQLite filename. Accepts `file:` and `sqlite:`
 * URLs, bare filesystem paths and `:memory:`; returns null for any other
 * scheme.
 */
export function resolveSqliteFilename(url: string): string | null {
  const value = url.trim();
  if (value === MEMORY_DATABASE) return MEMORY_DATABASE;

  const scheme = /^([a-z][a-z0-9+.-]*):/i.exec(value);
  if (!scheme || /^[a-z]:[\\/]/i.test(value)) {
    return value.length > 0 ? value : null;
  }

  if (!['file', 'sqlite', 'sqlite3'].includes(scheme[1].toLowerCase())) {
    return null;
  }

  let filename = value.slice(scheme[0].length);
  if (filename.startsWith('//')) {
    filename = filename.slice(2);
  }
  if (filename === MEMORY_DATABASE) return MEMORY_DATABASE;
  return filename.length > 0 ? decodeURIComponent(filename) : null;
}

export class SqliteConnectionFactory implements ConnectionFactory<SqliteConnection> {
  constructor(private readonly options: SqliteOptions) {}

  async create(): Promise<SqliteConnection> {
    const db = new Database(this.options.filename, { timeout: this.options.busyTimeoutMs });
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    logger.debug(`Opened connection to ${this.options.filename}`);
    return db;
  }

  async destroy(db: SqliteConnection): Promise<void> {
    if (db.open) {
      db.close();
    }
  }
}

export const isUniqueViolation: ErrorPredicate = hasErrorCode('SQLITE_CONSTRAINT_UNIQUE', 'SQLITE_CONSTRAINT_PRIMARYKEY');

/** Lock contention or a lost race on a uniqueness constraint; the unit of work can be retried. */
export const isWriteConflict: ErrorPredicate = anyOf(
  hasErrorCode('SQLITE_BUSY', 'SQLITE_BUSY_SNAPSHOT', 'SQLITE_LOCKED'),
  isUniqueViolation
);

const FATAL_CODES = /^SQLITE_(IOERR|CORRUPT|NOTADB|CANTOPEN|FULL|READONLY|MISUSE)/;

/** Whether a failure leaves the connection unusable. */
export function isConnectionFault(error: unknown): boolean {
  const code = errorCode(error);
  if (code !== undefined) {
    return FATAL_CODES.test(code);
  }
  return error instanceof TypeError && error.message.includes('database connection is not open');
}
