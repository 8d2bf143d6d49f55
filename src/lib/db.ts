// src/lib/db.ts
// PostgreSQL pool and the narrow client/lock adapters the record module consumes.

import { Pool, type PoolClient } from "pg";
import type { SqlClient } from "@/modules/records/pg.record.store";
import type { SchedulerLock } from "@/modules/records/mirrorResync.scheduler";

/** Stable key for the mirror resync advisory lock. */
export const MIRROR_RESYNC_LOCK_KEY = 734_219_001;

export function createPool(connectionString: string): Pool {
  return new Pool({ connectionString, max: 10 });
}

export function sqlClient(pool: Pool): SqlClient {
  return {
    async query(text, values) {
      const result = await pool.query(text, values);
      return { rows: result.rows, rowCount: result.rowCount };
    },
  };
}

/**
 * Session-level advisory lock. Held on one pooled connection between
 * acquire and release.
 */
export function advisoryLock(pool: Pool, key: number): SchedulerLock {
  let held: PoolClient | null = null;

  return {
    async tryAcquire() {
      const client = await pool.connect();
      try {
        const result = await client.query<{ locked: boolean }>(
          "SELECT pg_try_advisory_lock($1) AS locked",
          [key],
        );
        if (result.rows[0]?.locked) {
          held = client;
          return true;
        }
      } catch (err) {
        client.release();
        throw err;
      }
      client.release();
      return false;
    },

    async release() {
      const client = held;
      if (!client) return;
      held = null;
      try {
        await client.query("SELECT pg_advisory_unlock($1)", [key]);
      } finally {
        client.release();
      }
    },
  };
}
