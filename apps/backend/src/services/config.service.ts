import type { ConfigPayload, Configuration } from '@sensor-registry/shared-types';
import { createLogger, isPlainObject, isWellFormedPayload, retry } from '@sensor-registry/shared-utils';
import type { DatabasePool } from '../db';
import { isWriteConflict, type SqliteConnection } from '../db/sqlite';
import { ConflictError, NotFoundError, ValidationError } from '../lib/errors';
import { PagedSequence } from '../lib/sequence';

const logger = createLogger('ConfigStore');

export interface ConfigurationStoreOptions {
  /** Attempts for one setConfig when concurrent writers collide. */
  maxWriteAttempts?: number;
  retryDelayMs?: number;
  pageSize?: number;
  now?: () => Date;
}

interface ConfigurationRow {
  id: number;
  device_id: string;
  version: number;
  payload: string;
  active: number;
  created_at: number;
}

export function requireWellFormedPayload(payload: unknown): ConfigPayload {
  if (!isWellFormedPayload(payload)) {
    throw new ValidationError('Configuration payload must be a JSON object of JSON values');
  }
  return payload;
}

function parsePayload(text: string): ConfigPayload {
  const value: unknown = JSON.parse(text);
  if (!isPlainObject(value)) {
    throw new Error('Stored configuration payload is not an object');
  }
  return value;
}

function toConfiguration(row: ConfigurationRow): Configuration {
  return {
    id: row.id,
    deviceId: row.device_id,
    version: row.version,
    payload: parsePayload(row.payload),
    active: row.active === 1,
    createdAt: new Date(row.created_at),
  };
}

/** Status of an existing device; NotFound otherwise. */
export function requireDeviceStatus(db: SqliteConnection, deviceId: string): string {
  const row = db
    .prepare<[string], { status: string }>('SELECT status FROM devices WHERE id = ?')
    .get(deviceId);
  if (!row) {
    throw new NotFoundError(`Device ${deviceId} not found`);
  }
  return row.status;
}

/**
 * Supersedes the active configuration of a device with a new version. Must
 * run inside a write transaction.
 */
export function insertConfigurationVersion(
  db: SqliteConnection,
  deviceId: string,
  payload: ConfigPayload,
  createdAt: Date
): Configuration {
  const serialized = JSON.stringify(payload);
  const current = db
    .prepare<[string], { maxVersion: number | null }>(
      'SELECT MAX(version) AS maxVersion FROM configurations WHERE device_id = ?'
    )
    .get(deviceId);
  const version = (current?.maxVersion ?? 0) + 1;

  db.prepare('UPDATE configurations SET active = 0 WHERE device_id = ? AND active = 1').run(deviceId);
  const result = db
    .prepare(
      `INSERT INTO configurations (device_id, version, payload, active, created_at)
       VALUES (?, ?, ?, 1, ?)`
    )
    .run(deviceId, version, serialized, createdAt.getTime());

  return {
    id: Number(result.lastInsertRowid),
    deviceId,
    version,
    payload: parsePayload(serialized),
    active: true,
    createdAt,
  };
}

export class ConfigurationStore {
  private readonly maxWriteAttempts: number;
  private readonly retryDelayMs: number;
  private readonly pageSize: number;
  private readonly now: () => Date;

  constructor(
    private readonly pool: DatabasePool,
    options: ConfigurationStoreOptions = {}
  ) {
    this.maxWriteAttempts = options.maxWriteAttempts ?? 5;
    this.retryDelayMs = options.retryDelayMs ?? 10;
    this.pageSize = options.pageSize ?? 100;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Stores a new active configuration for the device at the next version.
   * Writers for the same device serialize on the write lock and the
   * (device_id, version) / single-active constraints; a collision retries
   * the whole transaction.
   */
  async setConfig(deviceId: string, payload: unknown): Promise<Configuration> {
    return retry(
      () =>
        this.pool.withConnection((db) =>
          db
            .transaction((): Configuration => {
              const status = requireDeviceStatus(db, deviceId);
              const checked = requireWellFormedPayload(payload);
              if (status === 'decommissioned') {
                throw new ConflictError(`Device ${deviceId} is decommissioned`);
              }
              return insertConfigurationVersion(db, deviceId, checked, this.now());
            })
            .immediate()
        ),
      {
        maxAttempts: this.maxWriteAttempts,
        baseDelayMs: this.retryDelayMs,
        maxDelayMs: this.retryDelayMs * 20,
        shouldRetry: isWriteConflict,
        onRetry: (error, attempt) => {
          logger.warn(`setConfig(${deviceId}) conflicted on attempt ${attempt}, retrying`, error);
        },
      }
    );
  }

  async getActiveConfig(deviceId: string): Promise<Configuration> {
    return this.pool.withConnection((db) => {
      requireDeviceStatus(db, deviceId);
      const row = db
        .prepare<[string], ConfigurationRow>(
          'SELECT * FROM configurations WHERE device_id = ? AND active = 1'
        )
        .get(deviceId);
      if (!row) {
        throw new NotFoundError(`Device ${deviceId} has no configuration`);
      }
      return toConfiguration(row);
    });
  }

  async getVersion(deviceId: string, version: number): Promise<Configuration> {
    return this.pool.withConnection((db) => {
      requireDeviceStatus(db, deviceId);
      const row = db
        .prepare<[string, number], ConfigurationRow>(
          'SELECT * FROM configurations WHERE device_id = ? AND version = ?'
        )
        .get(deviceId, version);
      if (!row) {
        throw new NotFoundError(`Device ${deviceId} has no configuration version ${version}`);
      }
      return toConfiguration(row);
    });
  }

  /** All versions of a device's configuration, oldest first. */
  async getHistory(deviceId: string): Promise<PagedSequence<Configuration, number>> {
    await this.pool.withConnection((db) => requireDeviceStatus(db, deviceId));

    return new PagedSequence<Configuration, number>(async (afterVersion, limit) => {
      const rows = await this.pool.withConnection((db) =>
        db
          .prepare<[string, number, number], ConfigurationRow>(
            `SELECT * FROM configurations
             WHERE device_id = ? AND version > ?
             ORDER BY version ASC
             LIMIT ?`
          )
          .all(deviceId, afterVersion ?? 0, limit)
      );

      const last = rows[rows.length - 1];
      return { items: rows.map(toConfiguration), next: last?.version };
    }, this.pageSize);
  }
}
