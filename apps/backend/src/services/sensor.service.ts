import type { Sensor } from '@sensor-registry/shared-types';
import { createLogger, retry } from '@sensor-registry/shared-utils';
import type { DatabasePool } from '../db';
import { isWriteConflict, type SqliteConnection } from '../db/sqlite';
import { ConflictError, NotFoundError, ValidationError } from '../lib/errors';
import { requireDeviceStatus } from './config.service';

const logger = createLogger('SensorRegistry');

const MAX_CODE_LENGTH = 128;
const MAX_NAME_LENGTH = 100;
const MAX_UNIT_LENGTH = 32;

export interface UpsertSensorInput {
  /** Identifies the channel within its device; defaults to the name. */
  code?: string;
  name: string;
  unit: string;
  scaleFactor?: number;
  offset?: number;
  rangeMin?: number | null;
  rangeMax?: number | null;
}

export interface UpsertedSensor {
  sensor: Sensor;
  created: boolean;
}

export interface SensorRegistryOptions {
  maxWriteAttempts?: number;
  retryDelayMs?: number;
  now?: () => Date;
}

interface SensorRow {
  id: number;
  device_id: string;
  code: string;
  name: string;
  unit: string;
  scale_factor: number;
  value_offset: number;
  range_min: number | null;
  range_max: number | null;
  created_at: number;
  updated_at: number;
}

interface SensorFields {
  code: string;
  name: string;
  unit: string;
  scaleFactor: number;
  offset: number;
  rangeMin: number | null;
  rangeMax: number | null;
}

function toSensor(row: SensorRow): Sensor {
  return {
    id: row.id,
    deviceId: row.device_id,
    code: row.code,
    name: row.name,
    unit: row.unit,
    scaleFactor: row.scale_factor,
    offset: row.value_offset,
    rangeMin: row.range_min,
    rangeMax: row.range_max,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function requireLabel(value: string, field: string, maxLength: number): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new ValidationError(`Sensor ${field} must not be empty`);
  }
  if (trimmed.length > maxLength) {
    throw new ValidationError(`Sensor ${field} must be at most ${maxLength} characters`);
  }
  return trimmed;
}

function requireFinite(value: number, field: string): number {
  if (!Number.isFinite(value)) {
    throw new ValidationError(`Sensor ${field} must be a finite number`);
  }
  return value;
}

function optionalFinite(value: number | null | undefined, field: string): number | null {
  return value === undefined || value === null ? null : requireFinite(value, field);
}

function normalizeSensor(input: UpsertSensorInput): SensorFields {
  const name = requireLabel(input.name, 'name', MAX_NAME_LENGTH);
  const fields: SensorFields = {
    code: requireLabel(input.code ?? name, 'code', MAX_CODE_LENGTH),
    name,
    unit: requireLabel(input.unit, 'unit', MAX_UNIT_LENGTH),
    scaleFactor: requireFinite(input.scaleFactor ?? 1, 'scaleFactor'),
    offset: requireFinite(input.offset ?? 0, 'offset'),
    rangeMin: optionalFinite(input.rangeMin, 'rangeMin'),
    rangeMax: optionalFinite(input.rangeMax, 'rangeMax'),
  };

  if (fields.rangeMin !== null && fields.rangeMax !== null && fields.rangeMin > fields.rangeMax) {
    throw new ValidationError('Sensor rangeMin must not exceed rangeMax');
  }
  return fields;
}

function findSensor(db: SqliteConnection, deviceId: string, code: string): SensorRow | undefined {
  return db
    .prepare<[string, string], SensorRow>('SELECT * FROM sensors WHERE device_id = ? AND code = ?')
    .get(deviceId, code);
}

/**
 * Measurement channels of a device: what each one reports, in which unit,
 * how raw values are scaled and the range they are expected to stay in.
 */
export class SensorRegistry {
  private readonly maxWriteAttempts: number;
  private readonly retryDelayMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly pool: DatabasePool,
    options: SensorRegistryOptions = {}
  ) {
    this.maxWriteAttempts = options.maxWriteAttempts ?? 5;
    this.retryDelayMs = options.retryDelayMs ?? 10;
    this.now = options.now ?? (() => new Date());
  }

  /** Registers a channel, or replaces every field of the one with the same code. */
  async upsert(deviceId: string, input: UpsertSensorInput): Promise<UpsertedSensor> {
    const fields = normalizeSensor(input);

    return retry(
      () =>
        this.pool.withConnection((db) =>
          db
            .transaction((): UpsertedSensor => {
              if (requireDeviceStatus(db, deviceId) === 'decommissioned') {
                throw new ConflictError(`Device ${deviceId} is decommissioned`);
              }

              const at = this.now().getTime();
              const params = {
                deviceId,
                code: fields.code,
                name: fields.name,
                unit: fields.unit,
                scaleFactor: fields.scaleFactor,
                offset: fields.offset,
                rangeMin: fields.rangeMin,
                rangeMax: fields.rangeMax,
                at,
              };
              const existing = findSensor(db, deviceId, fields.code);

              if (existing) {
                db.prepare<typeof params>(
                  `UPDATE sensors
                   SET name = @name, unit = @unit, scale_factor = @scaleFactor, value_offset = @offset,
                       range_min = @rangeMin, range_max = @rangeMax, updated_at = @at
                   WHERE device_id = @deviceId AND code = @code`
                ).run(params);
              } else {
                db.prepare<typeof params>(
                  `INSERT INTO sensors
                     (device_id, code, name, unit, scale_factor, value_offset, range_min, range_max, created_at, updated_at)
                   VALUES (@deviceId, @code, @name, @unit, @scaleFactor, @offset, @rangeMin, @rangeMax, @at, @at)`
                ).run(params);
              }

              const row = findSensor(db, deviceId, fields.code);
              if (!row) {
                throw new Error(`Sensor ${fields.code} of device ${deviceId} vanished during upsert`);
              }
              return { sensor: toSensor(row), created: existing === undefined };
            })
            .immediate()
        ),
      {
        maxAttempts: this.maxWriteAttempts,
        baseDelayMs: this.retryDelayMs,
        maxDelayMs: this.retryDelayMs * 20,
        shouldRetry: isWriteConflict,
        onRetry: (error, attempt) => {
          logger.warn(`upsert(${deviceId}/${fields.code}) conflicted on attempt ${attempt}, retrying`, error);
        },
      }
    );
  }

  async list(deviceId: string): Promise<Sensor[]> {
    return this.pool.withConnection((db) => {
      requireDeviceStatus(db, deviceId);
      return db
        .prepare<[string], SensorRow>('SELECT * FROM sensors WHERE device_id = ? ORDER BY id ASC')
        .all(deviceId)
        .map(toSensor);
    });
  }

  async get(deviceId: string, code: string): Promise<Sensor> {
    return this.pool.withConnection((db) => {
      requireDeviceStatus(db, deviceId);
      const row = findSensor(db, deviceId, code);
      if (!row) {
        throw new NotFoundError(`Device ${deviceId} has no sensor ${code}`);
      }
      return toSensor(row);
    });
  }
}
