/**
 * Run migrations in order. Requires DATABASE_URL.
 * Usage: DATABASE_URL=postgresql://... tsx scripts/db/migrate.ts
 */

import pg from "pg";
import { runMigrations } from "../../src/lib/db/migrate.js";

const url = process.env.DATABASE_URL;
if (!url) {
  console.error("DATABASE_URL is required");
  process.exit(1);
}

async function main() {
  const pool = new pg.Pool({ connectionString: url });
  try {
    const applied = await runMigrations(pool);
    console.log(applied.length > 0 ? `Applied ${applied.length} migration(s).` : "Nothing to apply.");
  } finally {
    await pool.end();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
