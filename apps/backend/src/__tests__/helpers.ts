import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { setDefaultLogLevel } from '@sensor-registry/shared-utils';
import { openDatabase, type DatabaseOptions, type DatabasePool } from '../db';

setDefaultLogLevel('silent');

export interface TestDatabase {
  pool: DatabasePool;
  filename: string;
  cleanup(): Promise<void>;
}

/** A pooled SQLite database in a fresh temp directory. */
export async function createTestDatabase(options: Partial<DatabaseOptions> = {}): Promise<TestDatabase> {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sensor-registry-'));
  const filename = path.join(dir, 'registry.db');
  const pool = await openDatabase({
    filename,
    poolMin: 1,
    poolMax: 4,
    acquireTimeoutMs: 1000,
    busyTimeoutMs: 1000,
    ...options,
  });

  return {
    pool,
    filename,
    async cleanup() {
      await pool.close();
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}

/** Clock advancing one second per reading. */
export function steppingClock(start = Date.UTC(2026, 0, 1)): () => Date {
  let tick = 0;
  return () => new Date(start + tick++ * 1000);
}
