import {
  DEVICE_STATUSES,
  type Configuration,
  type Device,
  type DeviceFilter,
  type DeviceStatus,
} from '@sensor-registry/shared-types';
import { generateDeviceId, isValidDeviceId, isValidDeviceName } from '@sensor-registry/shared-utils';
import type { DatabasePool } from '../db';
import { isUniqueViolation, type SqliteConnection } from '../db/sqlite';
import {
  ConflictError,
  DuplicateDeviceError,
  InvalidTransitionError,
  NotFoundError,
  ValidationError,
} from '../lib/errors';
import { PagedSequence } from '../lib/sequence';
import { insertConfigurationVersion, requireWellFormedPayload } from './config.service';

export interface CreateDeviceInput {
  id?: string;
  name: string;
  type: string;
  location?: string | null;
  firmware?: string | null;
  /** Stored as configuration version 1 in the same transaction. */
  config?: unknown;
}

export interface UpdateDeviceInput {
  name?: string;
  type?: string;
  status?: DeviceStatus;
  location?: string | null;
  firmware?: string | null;
}

export interface CreatedDevice {
  device: Device;
  config: Configuration | null;
}

export interface DeviceRegistryOptions {
  pageSize?: number;
  now?: () => Date;
}

interface DeviceRow {
  seq: number;
  id: string;
  name: string;
  type: string;
  location: string | null;
  firmware: string | null;
  status: string;
  created_at: number;
  last_seen_at: number | null;
}

interface DeviceCursor {
  createdAt: number;
  seq: number;
}

const SELECT_DEVICE = 'SELECT rowid AS seq, * FROM devices';

export function isDeviceStatus(value: string): value is DeviceStatus {
  return DEVICE_STATUSES.some((status) => status === value);
}

/** Status only moves toward decommissioned; a decommissioned device stays that way. */
export function canTransition(from: DeviceStatus, to: DeviceStatus): boolean {
  return from !== 'decommissioned' || to === 'decommissioned';
}

function toDevice(row: DeviceRow): Device {
  if (!isDeviceStatus(row.status)) {
    throw new Error(`Device ${row.id} has unknown status ${row.status}`);
  }
  return {
    id: row.id,
    name: row.name,
    type: row.type,
    location: row.location,
    firmware: row.firmware,
    status: row.status,
    createdAt: new Date(row.created_at),
    lastSeenAt: row.last_seen_at === null ? null : new Date(row.last_seen_at),
  };
}

function requireText(value: string, field: string): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new ValidationError(`Device ${field} must not be empty`);
  }
  return trimmed;
}

function findDevice(db: SqliteConnection, id: string): DeviceRow | undefined {
  return db.prepare<[string], DeviceRow>(`${SELECT_DEVICE} WHERE id = ?`).get(id);
}

function requireDevice(db: SqliteConnection, id: string): DeviceRow {
  const row = findDevice(db, id);
  if (!row) {
    throw new NotFoundError(`Device ${id} not found`);
  }
  return row;
}

export class DeviceRegistry {
  private readonly pageSize: number;
  private readonly now: () => Date;

  constructor(
    private readonly pool: DatabasePool,
    options: DeviceRegistryOptions = {}
  ) {
    this.pageSize = options.pageSize ?? 100;
    this.now = options.now ?? (() => new Date());
  }

  async create(input: CreateDeviceInput): Promise<CreatedDevice> {
    const id = input.id === undefined ? generateDeviceId() : input.id.trim();
    if (id.length === 0) {
      throw new ValidationError('Device id must not be empty');
    }
    if (!isValidDeviceId(id)) {
      throw new ValidationError(
        'Device id must start with a letter or digit and contain only letters, digits, ".", "_", ":" or "-" (max 128)'
      );
    }
    const name = requireText(input.name, 'name');
    if (!isValidDeviceName(name)) {
      throw new ValidationError('Device name must be 1-100 characters');
    }
    const type = requireText(input.type, 'type');
    const initialConfig = input.config === undefined ? undefined : requireWellFormedPayload(input.config);

    const createdAt = this.now();
    try {
      return await this.pool.withConnection((db) =>
        db
          .transaction((): CreatedDevice => {
            if (findDevice(db, id)) {
              throw new DuplicateDeviceError(id);
            }
            db.prepare(
              `INSERT INTO devices (id, name, type, location, firmware, status, created_at)
               VALUES (?, ?, ?, ?, ?, 'active', ?)`
            ).run(id, name, type, input.location ?? null, input.firmware ?? null, createdAt.getTime());

            const config =
              initialConfig === undefined
                ? null
                : insertConfigurationVersion(db, id, initialConfig, createdAt);

            return { device: toDevice(requireDevice(db, id)), config };
          })
          .immediate()
      );
    } catch (error) {
      // another process inserted the same id between our check and insert
      if (isUniqueViolation(error)) {
        throw new DuplicateDeviceError(id);
      }
      throw error;
    }
  }

  async get(id: string): Promise<Device> {
    return this.pool.withConnection((db) => toDevice(requireDevice(db, id)));
  }

  /** Devices in registration order; each page is read on its own lease. */
  list(filter: DeviceFilter = {}): PagedSequence<Device, DeviceCursor> {
    const status = filter.status ?? null;

    return new PagedSequence<Device, DeviceCursor>(async (cursor, limit) => {
      const rows = await this.pool.withConnection((db) =>
        db
          .prepare<
            { status: string | null; createdAt: number; seq: number; limit: number },
            DeviceRow
          >(
            `${SELECT_DEVICE}
             WHERE (@status IS NULL OR status = @status)
               AND (created_at > @createdAt OR (created_at = @createdAt AND rowid > @seq))
             ORDER BY created_at ASC, rowid ASC
             LIMIT @limit`
          )
          .all({
            status,
            createdAt: cursor?.createdAt ?? -1,
            seq: cursor?.seq ?? 0,
            limit,
          })
      );

      const last = rows[rows.length - 1];
      return {
        items: rows.map(toDevice),
        next: last ? { createdAt: last.created_at, seq: last.seq } : undefined,
      };
    }, this.pageSize);
  }

  async update(id: string, fields: UpdateDeviceInput): Promise<Device> {
    const name = fields.name === undefined ? undefined : requireText(fields.name, 'name');
    if (name !== undefined && !isValidDeviceName(name)) {
      throw new ValidationError('Device name must be 1-100 characters');
    }
    const type = fields.type === undefined ? undefined : requireText(fields.type, 'type');

    return this.pool.withConnection((db) =>
      db
        .transaction((): Device => {
          const current = toDevice(requireDevice(db, id));
          const status = fields.status ?? current.status;
          if (!canTransition(current.status, status)) {
            throw new InvalidTransitionError(current.status, status);
          }

          db.prepare(
            `UPDATE devices
             SET name = ?, type = ?, status = ?, location = ?, firmware = ?
             WHERE id = ?`
          ).run(
            name ?? current.name,
            type ?? current.type,
            status,
            fields.location === undefined ? current.location : fields.location,
            fields.firmware === undefined ? current.firmware : fields.firmware,
            id
          );

          return toDevice(requireDevice(db, id));
        })
        .immediate()
    );
  }

  /** Records a heartbeat from the device. */
  async markSeen(id: string, at: Date = this.now()): Promise<Device> {
    return this.pool.withConnection((db) =>
      db
        .transaction((): Device => {
          const current = toDevice(requireDevice(db, id));
          if (current.status === 'decommissioned') {
            throw new ConflictError(`Device ${id} is decommissioned`);
          }
          db.prepare('UPDATE devices SET last_seen_at = ? WHERE id = ?').run(at.getTime(), id);
          return toDevice(requireDevice(db, id));
        })
        .immediate()
    );
  }

  /** Hard delete, limited to decommissioned devices without configuration history. */
  async delete(id: string): Promise<void> {
    await this.pool.withConnection((db) =>
      db
        .transaction((): void => {
          const current = toDevice(requireDevice(db, id));
          if (current.status !== 'decommissioned') {
            throw new ConflictError(`Device ${id} must be decommissioned before it can be deleted`);
          }
          const history = db
            .prepare<[string], { count: number }>(
              'SELECT COUNT(*) AS count FROM configurations WHERE device_id = ?'
            )
            .get(id);
          if (history && history.count > 0) {
            throw new ConflictError(`Device ${id} has configuration history and cannot be deleted`);
          }
          db.prepare('DELETE FROM devices WHERE id = ?').run(id);
        })
        .immediate()
    );
  }
}
