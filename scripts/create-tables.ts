#!/usr/bin/env npx tsx
/**
 * Create the option_trades and stock_info tables
 *
 * Usage:
 *   POSTGRES_URL=postgresql://... npx tsx scripts/create-tables.ts
 *
 * Options:
 *   --dry-run  Print the DDL only.
 */

import "dotenv/config";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { pool } from "../src/lib/db.js";

const DRY_RUN = process.argv.includes("--dry-run");
const SCHEMA_PATH = fileURLToPath(new URL("../sql/schema.sql", import.meta.url));

async function main(): Promise<void> {
  if (!process.env.POSTGRES_URL) {
    console.error("Missing POSTGRES_URL");
    process.exit(1);
  }

  const ddl = readFileSync(SCHEMA_PATH, "utf8");
  console.log(`Schema: ${SCHEMA_PATH}`);

  if (DRY_RUN) {
    console.log(ddl);
  } else {
    await pool.query(ddl);
    console.log("✅ Tables and indexes created");
  }

  await pool.end();
}

main().catch(async (err) => {
  console.error(err);
  await pool.end();
  process.exit(1);
});
