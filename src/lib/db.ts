import { Pool } from "pg";

export const pool = new Pool({
  connectionString: process.env.POSTGRES_URL,
  max: 5,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 10000,
});

/** Query surface shared by Pool, PoolClient and in-process test doubles */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: Record<string, unknown>[] }>;
}

// Log which database URL is being used (without password)
const dbUrl = process.env.POSTGRES_URL || "";
const safeDbUrl = dbUrl.replace(/:[^:@]+@/, ":***@");
console.log(`Database URL: ${safeDbUrl}`);
