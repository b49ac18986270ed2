/**
 * Applies drizzle/*.sql in filename order, once each, tracked in _migrations.
 */

import { readFile, readdir } from "fs/promises";
import { join } from "path";
import type pg from "pg";

export const DEFAULT_MIGRATIONS_DIR = join(process.cwd(), "drizzle");

export async function runMigrations(pool: pg.Pool, dir: string = DEFAULT_MIGRATIONS_DIR): Promise<string[]> {
  const files = await readdir(dir);
  const sqlFiles = files.filter((f) => f.endsWith(".sql")).sort();
  const applied: string[] = [];
  const client = await pool.connect();
  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS "_migrations" (
        "name" text PRIMARY KEY,
        "applied_at" timestamp with time zone NOT NULL DEFAULT now()
      )
    `);
    for (const f of sqlFiles) {
      const { rows } = await client.query("SELECT 1 FROM _migrations WHERE name = $1", [f]);
      if (rows.length > 0) continue;
      const sql = await readFile(join(dir, f), "utf-8");
      await client.query(sql);
      await client.query("INSERT INTO _migrations (name) VALUES ($1)", [f]);
      console.log(`[db] migration ${f} applied`);
      applied.push(f);
    }
  } finally {
    client.release();
  }
  return applied;
}
