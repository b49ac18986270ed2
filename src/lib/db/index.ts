/**
 * Database connection and client.
 * Lazy init: only connects when first used.
 */

import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "./schema.js";

const { Pool } = pg;

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseHandle {
  getPool(): pg.Pool;
  getDb(): Database;
  close(): Promise<void>;
}

export function createDatabaseHandle(url: string | undefined): DatabaseHandle {
  let pool: pg.Pool | null = null;
  let db: Database | null = null;

  function getPool(): pg.Pool {
    if (!pool) {
      if (!url) {
        throw new Error("DATABASE_URL is required when PERSISTENCE_DRIVER=db");
      }
      pool = new Pool({ connectionString: url });
    }
    return pool;
  }

  return {
    getPool,
    getDb() {
      if (!db) db = drizzle(getPool(), { schema });
      return db;
    },
    async close() {
      const p = pool;
      pool = null;
      db = null;
      if (p) await p.end();
    },
  };
}
