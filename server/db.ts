import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "@shared/schema";

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseHandle {
  db: Database;
  close(): Promise<void>;
}

export function createDatabase(databaseUrl: string): DatabaseHandle {
  if (!databaseUrl) {
    throw new Error("DATABASE_URL must be set to use PostgreSQL storage");
  }

  const pool = new pg.Pool({ connectionString: databaseUrl, max: 10 });
  pool.on("error", (err) => {
    console.error("[Storage] Idle PostgreSQL client error:", err.message);
  });

  return {
    db: drizzle(pool, { schema }),
    close: () => pool.end(),
  };
}
